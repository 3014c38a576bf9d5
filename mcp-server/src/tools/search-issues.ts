import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";
import { MaxResultsSchema } from "./schemas.js";

const SearchIssuesInputSchema = z.object({
  jql: z.string().min(1, "JQL query is required").describe("JQL query string"),
  max_results: MaxResultsSchema,
});

export const searchIssuesTool = defineTool({
  name: "search_issues",
  description: "Search Jira issues using JQL (Jira Query Language)",
  schema: SearchIssuesInputSchema,
  handler: async (args, context) => {
    const result = await context.services.jira.searchIssues(args.jql, args.max_results);
    return toolSuccess(result);
  },
});
