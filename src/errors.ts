export type UpstreamSource = "github" | "confluence";

export type UpstreamFailureKind = "auth" | "rate_limit" | "not_found" | "network";

/**
 * A call to the change source or the documentation source failed.
 * Never raised by the analysis core; only by the adapters around it.
 */
export class UpstreamFetchError extends Error {
  readonly source: UpstreamSource;
  readonly kind: UpstreamFailureKind;
  readonly status?: number;

  constructor(
    source: UpstreamSource,
    kind: UpstreamFailureKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamFetchError";
    this.source = source;
    this.kind = kind;
    this.status = options.status;
  }
}

export function failureKindForStatus(status: number | undefined): UpstreamFailureKind {
  if (status === 401) return "auth";
  if (status === 403 || status === 429) return "rate_limit";
  if (status === 404) return "not_found";
  return "network";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  // axios keeps the status on the response
  if ("response" in error) {
    const response = error.response;
    if (
      typeof response === "object" &&
      response !== null &&
      "status" in response &&
      typeof response.status === "number"
    ) {
      return response.status;
    }
  }
  return undefined;
}

export function toUpstreamFetchError(
  source: UpstreamSource,
  error: unknown,
  context: string
): UpstreamFetchError {
  if (error instanceof UpstreamFetchError) return error;
  const status = statusOf(error);
  const kind = failureKindForStatus(status);
  const suffix = status ? ` (HTTP ${status})` : "";
  return new UpstreamFetchError(
    source,
    kind,
    `${context} failed${suffix}: ${errorMessage(error)}`,
    { status, cause: error }
  );
}
