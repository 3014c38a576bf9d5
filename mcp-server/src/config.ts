import { z } from "zod";
import type { JiraSettings } from "./services/types.js";

const ConfigSchema = z.object({
  JIRA_URL: z.string().url("JIRA_URL must be a valid URL"),
  JIRA_USERNAME: z.string().min(1, "JIRA_USERNAME is required"),
  JIRA_API_TOKEN: z.string().min(1, "JIRA_API_TOKEN is required"),
  JIRA_TIMEOUT: z.coerce.number().int().positive().default(30),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  PORT: z.coerce.number().default(8080),
  HOST: z.string().default("0.0.0.0"),
  MCP_PATH: z.string().default("/mcp"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return Object.freeze(ConfigSchema.parse(env));
}

export function toJiraSettings(config: AppConfig): JiraSettings {
  return Object.freeze({
    baseUrl: config.JIRA_URL.replace(/\/+$/, ""),
    username: config.JIRA_USERNAME,
    apiToken: config.JIRA_API_TOKEN,
    timeoutSeconds: config.JIRA_TIMEOUT,
  });
}
