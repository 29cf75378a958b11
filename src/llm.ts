import OpenAI from "openai";
import Groq from "groq-sdk";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
}

/** Returns the text of the first completion choice, JSON mode on. */
export type ChatCompletion = (request: ChatRequest) => Promise<string>;

export type LlmProvider = "openai" | "groq";

function toProviderMessages(messages: ChatMessage[]) {
  return messages.map((message) =>
    message.role === "system"
      ? { role: "system" as const, content: message.content }
      : { role: "user" as const, content: message.content }
  );
}

export function createChatCompletion(
  provider: LlmProvider,
  apiKey: string | undefined
): ChatCompletion {
  if (!apiKey) {
    throw new Error(
      provider === "groq"
        ? "GROQ_API_KEY environment variable is required"
        : "OPENAI_API_KEY environment variable is required"
    );
  }

  if (provider === "groq") {
    const groq = new Groq({ apiKey });
    return async ({ model, messages, temperature }) => {
      const response = await groq.chat.completions.create({
        model,
        messages: toProviderMessages(messages),
        temperature: temperature ?? 0.1,
        response_format: { type: "json_object" },
      });
      return response.choices[0]?.message?.content || "";
    };
  }

  const openai = new OpenAI({ apiKey });
  return async ({ model, messages, temperature }) => {
    const response = await openai.chat.completions.create({
      model,
      messages: toProviderMessages(messages),
      temperature: temperature ?? 0.1,
      response_format: { type: "json_object" },
    });
    return response.choices[0]?.message?.content || "";
  };
}

export function apiKeyFor(provider: LlmProvider): string | undefined {
  return provider === "groq" ? process.env.GROQ_API_KEY : process.env.OPENAI_API_KEY;
}
