import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["query-engine/src/**/*.test.ts", "search-api/src/**/*.test.ts"],
    environment: "node",
  },
});
