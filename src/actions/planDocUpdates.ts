import { planActions } from "../analysis/planActions";
import { createAction } from "./action";

export const planDocUpdates = createAction({
  id: "planDocUpdates",
  description:
    "Plans prioritized documentation actions from the change summary and coverage results",
  async run(context) {
    const { state } = context;

    if (!state.descriptors || !state.changeSummary) {
      throw new Error("Code analysis must be performed before planning updates");
    }

    const plan = planActions(state.changeSummary, state.coverage ?? {}, state.descriptors, {
      thresholds: state.config.matchRules.thresholds,
      topicKeywords: state.config.coverage.topicKeywords,
      defaultSpaceKey: state.config.planning.defaultSpaceKey,
      audiences: state.config.planning.audiences,
    });
    state.actionPlan = plan;

    console.log("\n=== Planning Documentation Updates ===");
    console.log("Strategy:", state.changeSummary.strategyDescription);
    if (plan.length === 0) {
      console.log("No documentation updates required");
    }
    plan.forEach((action) => {
      console.log(`\n[${action.priority}] ${action.action}: ${action.pageTitle} (${action.spaceKey})`);
      console.log(`Content Strategy: ${action.contentStrategy}`);
      console.log(`Reason: ${action.reason}`);
    });

    return context;
  },
});
