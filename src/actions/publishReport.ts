import { errorMessage } from "../errors";
import { buildReport, renderComment, splitComment, toReportJson } from "../report";
import { createAction } from "./action";

export const publishReport = createAction({
  id: "publishReport",
  description:
    "Writes the action plan and change summary as JSON and optionally comments on the PR",
  async run(context) {
    const { state, services, signal } = context;
    const { output } = state.config;

    const report = buildReport(state);
    state.report = report;

    console.log("\n=== Publishing Report ===");
    await services.writeReport(output.path, JSON.stringify(toReportJson(report), null, 2));
    state.reportPath = output.path;
    console.log(`💾 Report saved to ${output.path}`);

    if (!output.postComment || !services.commentPublisher) {
      return context;
    }
    if (signal?.aborted) {
      console.log("Run cancelled, PR comment not posted");
      return context;
    }

    const parts = splitComment(
      renderComment(report, output.confluenceUrl),
      output.commentMaxLength
    );
    const urls: string[] = [];
    try {
      for (const part of parts) {
        urls.push(
          await services.commentPublisher.publish(state.owner, state.repo, state.pull_number, part)
        );
      }
      console.log(`💬 Posted ${urls.length} comment(s) on #${state.pull_number}`);
    } catch (error) {
      // The report file is already written; a failed comment does not undo it.
      console.error("❌ Failed to post PR comment:", errorMessage(error));
    }
    state.commentUrls = urls;

    return context;
  },
});
