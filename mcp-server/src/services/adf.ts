import type { AdfDocument } from "./types.js";

/**
 * Wrap plain text in the Atlassian Document Format envelope that Jira REST v3
 * requires for rich-text fields (descriptions, comment bodies).
 * @see https://developer.atlassian.com/cloud/jira/platform/apis/document/structure/
 */
export function toAdfDocument(text: string): AdfDocument {
  return {
    type: "doc",
    version: 1,
    content: [{ type: "paragraph", content: [{ type: "text", text }] }],
  };
}
