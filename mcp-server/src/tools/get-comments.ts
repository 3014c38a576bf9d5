import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema, MaxResultsSchema } from "./schemas.js";

const GetCommentsInputSchema = z.object({
  issue_key: IssueKeySchema,
  start_at: z.coerce
    .number()
    .int()
    .nonnegative()
    .optional()
    .default(0)
    .describe("Index of the first comment to return (0-based)"),
  max_results: MaxResultsSchema,
});

export const getCommentsTool = defineTool({
  name: "get_comments",
  description: "Get comments of a Jira issue with pagination",
  schema: GetCommentsInputSchema,
  handler: async (args, context) => {
    const page = await context.services.jira.getComments(args.issue_key, {
      startAt: args.start_at,
      maxResults: args.max_results,
    });
    return toolSuccess(page);
  },
});
