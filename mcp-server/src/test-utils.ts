import { vi, type Mock } from "vitest";
import type { IJiraService } from "./services/types.js";
import type { Logger } from "./logger.js";
import type { McpToolContext, ToolError, ToolResult } from "./tools/types.js";

export type MockJiraService = { [K in keyof IJiraService]: Mock<IJiraService[K]> };
export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export interface MockToolContext extends McpToolContext {
  services: { jira: MockJiraService };
  logger: MockLogger;
}

export const TEST_ISSUE = {
  id: "10001",
  key: "TEST-1",
  fields: { summary: "Test issue", status: { name: "To Do" } },
};

export function createMockJiraService(): MockJiraService {
  return {
    getIssue: vi.fn<IJiraService["getIssue"]>().mockResolvedValue(TEST_ISSUE),
    searchIssues: vi.fn<IJiraService["searchIssues"]>().mockResolvedValue({
      startAt: 0,
      maxResults: 50,
      total: 1,
      issues: [TEST_ISSUE],
    }),
    createIssue: vi.fn<IJiraService["createIssue"]>().mockResolvedValue({
      id: "10002",
      key: "TEST-2",
      self: "https://test.atlassian.net/rest/api/3/issue/10002",
    }),
    updateIssue: vi.fn<IJiraService["updateIssue"]>().mockResolvedValue(undefined),
    addComment: vi.fn<IJiraService["addComment"]>().mockResolvedValue({ id: "20001" }),
    getComments: vi.fn<IJiraService["getComments"]>().mockResolvedValue({
      startAt: 0,
      maxResults: 50,
      total: 0,
      isLast: true,
      values: [],
    }),
    getProjects: vi.fn<IJiraService["getProjects"]>().mockResolvedValue([{ id: "10000", key: "TEST", name: "Test Project" }]),
    transitionIssue: vi.fn<IJiraService["transitionIssue"]>().mockResolvedValue(undefined),
    getTransitions: vi.fn<IJiraService["getTransitions"]>().mockResolvedValue({
      transitions: [{ id: "31", name: "Done" }],
    }),
  };
}

export function createMockLogger(): MockLogger {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<Logger["debug"]>(),
  };
}

export function createMockContext(): MockToolContext {
  return {
    services: { jira: createMockJiraService() },
    logger: createMockLogger(),
  };
}

export function errorOf(result: ToolResult): ToolError {
  if (result.ok) {
    throw new Error(`Expected an error result, got ${JSON.stringify(result.data)}`);
  }
  return result.error;
}

export function dataOf(result: ToolResult): unknown {
  if (!result.ok) {
    throw new Error(`Expected a success result, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}
