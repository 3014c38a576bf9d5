import { z } from "zod";
import { defineTool, toolSuccess } from "./tool-utils.js";

export const getProjectsTool = defineTool({
  name: "get_projects",
  description: "Get all accessible Jira projects",
  schema: z.object({}),
  handler: async (_args, context) => {
    return toolSuccess(await context.services.jira.getProjects());
  },
});
