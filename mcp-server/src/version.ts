export const SERVER_NAME = "jira-mcp";
export const SERVER_VERSION = "1.0.0";
