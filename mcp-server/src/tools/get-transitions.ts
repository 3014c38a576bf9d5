import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema } from "./schemas.js";

export const getTransitionsTool = defineTool({
  name: "get_transitions",
  description: "Get available transitions for an issue",
  schema: z.object({ issue_key: IssueKeySchema }),
  handler: async (args, context) => {
    return toolSuccess(await context.services.jira.getTransitions(args.issue_key));
  },
});
