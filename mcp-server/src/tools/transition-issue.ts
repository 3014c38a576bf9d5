import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema } from "./schemas.js";

const TransitionIssueInputSchema = z.object({
  issue_key: IssueKeySchema,
  transition_id: z
    .preprocess(
      (value) => (typeof value === "number" ? String(value) : value),
      z.string().min(1, "Transition ID is required"),
    )
    .describe("Transition ID (see get_transitions)"),
});

export const transitionIssueTool = defineTool({
  name: "transition_issue",
  description: "Transition an issue to a new status",
  schema: TransitionIssueInputSchema,
  handler: async (args, context) => {
    await context.services.jira.transitionIssue(args.issue_key, args.transition_id);
    return toolSuccess({ success: true, issue_key: args.issue_key });
  },
});
