import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";

const CreateIssueInputSchema = z.object({
  project_key: z.string().min(1, "Project key is required").describe("Project key (e.g., PROJ)"),
  summary: z.string().min(1, "Summary is required").describe("Issue summary/title"),
  issue_type: z.string().min(1, "Issue type is required").describe("Issue type (e.g., Bug, Task, Story)"),
  description: z.string().optional().describe("Issue description"),
});

export const createIssueTool = defineTool({
  name: "create_issue",
  description: "Create a new Jira issue",
  schema: CreateIssueInputSchema,
  handler: async (args, context) => {
    const issue = await context.services.jira.createIssue({
      projectKey: args.project_key,
      summary: args.summary,
      issueType: args.issue_type,
      description: args.description,
    });
    return toolSuccess(issue);
  },
});
