import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema } from "./schemas.js";

const AddCommentInputSchema = z.object({
  issue_key: IssueKeySchema,
  comment: z.string().min(1, "Comment text is required").describe("Comment text"),
});

// Not idempotent: every call posts a new comment.
export const addCommentTool = defineTool({
  name: "add_comment",
  description: "Add a comment to a Jira issue",
  schema: AddCommentInputSchema,
  handler: async (args, context) => {
    const comment = await context.services.jira.addComment(args.issue_key, args.comment);
    return toolSuccess(comment);
  },
});
