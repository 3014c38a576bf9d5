import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["mcp-server/**/*.test.ts", "e2e/**/*.test.ts"],
    environment: "node",
  },
});
