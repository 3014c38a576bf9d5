import { describe, it, expect } from "vitest";
import { parseConfig, toJiraSettings } from "../src/config.js";

describe("parseConfig", () => {
  const validEnv = {
    JIRA_URL: "https://test.atlassian.net",
    JIRA_USERNAME: "test@example.com",
    JIRA_API_TOKEN: "test-secret",
  };

  it("returns frozen config with defaults for minimal valid env", () => {
    const config = parseConfig(validEnv);
    expect(config.JIRA_TIMEOUT).toBe(30);
    expect(config.MCP_TRANSPORT).toBe("stdio");
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.MCP_PATH).toBe("/mcp");
    expect(config.JIRA_USERNAME).toBe("test@example.com");
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("coerces PORT and JIRA_TIMEOUT from strings", () => {
    const config = parseConfig({ ...validEnv, PORT: "3000", JIRA_TIMEOUT: "5" });
    expect(config.PORT).toBe(3000);
    expect(config.JIRA_TIMEOUT).toBe(5);
  });

  it("uses custom values when provided", () => {
    const config = parseConfig({
      ...validEnv,
      MCP_TRANSPORT: "http",
      HOST: "127.0.0.1",
      MCP_PATH: "/api/mcp",
    });
    expect(config.MCP_TRANSPORT).toBe("http");
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.MCP_PATH).toBe("/api/mcp");
  });

  it("throws when JIRA_URL is missing", () => {
    expect(() => parseConfig({ JIRA_USERNAME: "u", JIRA_API_TOKEN: "t" })).toThrow();
  });

  it("throws when JIRA_URL is not a URL", () => {
    expect(() => parseConfig({ ...validEnv, JIRA_URL: "not a url" })).toThrow("JIRA_URL must be a valid URL");
  });

  it("throws when JIRA_API_TOKEN is empty", () => {
    expect(() => parseConfig({ ...validEnv, JIRA_API_TOKEN: "" })).toThrow("JIRA_API_TOKEN is required");
  });

  it("rejects a non-positive timeout", () => {
    expect(() => parseConfig({ ...validEnv, JIRA_TIMEOUT: "0" })).toThrow();
  });

  it("rejects an unknown transport", () => {
    expect(() => parseConfig({ ...validEnv, MCP_TRANSPORT: "sse" })).toThrow();
  });
});

describe("toJiraSettings", () => {
  it("strips trailing slashes from the base URL", () => {
    const settings = toJiraSettings(
      parseConfig({
        JIRA_URL: "https://test.atlassian.net//",
        JIRA_USERNAME: "test@example.com",
        JIRA_API_TOKEN: "test-secret",
        JIRA_TIMEOUT: "10",
      }),
    );

    expect(settings).toEqual({
      baseUrl: "https://test.atlassian.net",
      username: "test@example.com",
      apiToken: "test-secret",
      timeoutSeconds: 10,
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });
});
