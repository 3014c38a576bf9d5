import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { IssueKeySchema } from "./schemas.js";

const GetIssueInputSchema = z.object({
  issue_key: IssueKeySchema,
});

export const getIssueTool = defineTool({
  name: "get_issue",
  description: "Get a Jira issue by its key (e.g., PROJ-123)",
  schema: GetIssueInputSchema,
  handler: async (args, context) => {
    const issue = await context.services.jira.getIssue(args.issue_key);
    return toolSuccess(issue);
  },
});
