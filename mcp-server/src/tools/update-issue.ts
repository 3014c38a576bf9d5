import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema } from "./schemas.js";

const UpdateIssueInputSchema = z.object({
  issue_key: IssueKeySchema,
  fields: z.record(z.unknown()).describe("Fields to update"),
});

export const updateIssueTool = defineTool({
  name: "update_issue",
  description: "Update fields of an existing Jira issue",
  schema: UpdateIssueInputSchema,
  handler: async (args, context) => {
    await context.services.jira.updateIssue(args.issue_key, args.fields);
    return toolSuccess({ success: true, issue_key: args.issue_key });
  },
});
