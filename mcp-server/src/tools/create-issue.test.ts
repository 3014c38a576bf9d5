import { describe, it, expect, beforeEach } from "vitest";
import { createMockContext, dataOf, errorOf, type MockToolContext } from "../test-utils.js";
import { createIssueTool } from "./create-issue.js";

describe("createIssueTool", () => {
  let context: MockToolContext;

  beforeEach(() => {
    context = createMockContext();
  });

  it("maps snake_case arguments onto the client input", async () => {
    await createIssueTool.handler(
      { project_key: "TEST", summary: "New issue", issue_type: "Bug", description: "Broken" },
      context,
    );

    expect(context.services.jira.createIssue).toHaveBeenCalledWith({
      projectKey: "TEST",
      summary: "New issue",
      issueType: "Bug",
      description: "Broken",
    });
  });

  it("leaves description undefined when omitted", async () => {
    await createIssueTool.handler({ project_key: "TEST", summary: "New issue", issue_type: "Task" }, context);

    expect(context.services.jira.createIssue).toHaveBeenCalledWith({
      projectKey: "TEST",
      summary: "New issue",
      issueType: "Task",
      description: undefined,
    });
  });

  it("returns the created issue", async () => {
    const result = await createIssueTool.handler({ project_key: "TEST", summary: "New issue", issue_type: "Task" }, context);

    expect(dataOf(result)).toEqual({
      id: "10002",
      key: "TEST-2",
      self: "https://test.atlassian.net/rest/api/3/issue/10002",
    });
  });

  it("reports every missing required field", async () => {
    const result = await createIssueTool.handler({ summary: "New issue" }, context);

    expect(errorOf(result)).toEqual({
      kind: "validation",
      message: "Validation failed: project_key: Required; issue_type: Required",
    });
    expect(context.services.jira.createIssue).not.toHaveBeenCalled();
  });
});
