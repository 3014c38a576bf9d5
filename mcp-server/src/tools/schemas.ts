import { z } from "zod";

export const IssueKeySchema = z
  .string()
  .min(1, "Issue key is required")
  .describe("The issue key (e.g., PROJ-123)");

// Numeric strings are accepted.
export const MaxResultsSchema = z.coerce
  .number()
  .int()
  .positive()
  .optional()
  .default(50)
  .describe("Maximum results to return");
