import type { McpTool } from "./types.js";
import { getIssueTool } from "./get-issue.js";
import { searchIssuesTool } from "./search-issues.js";
import { createIssueTool } from "./create-issue.js";
import { updateIssueTool } from "./update-issue.js";
import { addCommentTool } from "./add-comment.js";
import { getCommentsTool } from "./get-comments.js";
import { getProjectsTool } from "./get-projects.js";
import { transitionIssueTool } from "./transition-issue.js";
import { getTransitionsTool } from "./get-transitions.js";

export function createDefaultTools(): McpTool[] {
  return [
    getIssueTool,
    searchIssuesTool,
    createIssueTool,
    updateIssueTool,
    addCommentTool,
    getCommentsTool,
    getProjectsTool,
    transitionIssueTool,
    getTransitionsTool,
  ];
}
