import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.test.ts"],
    environment: "node",
    // Day grouping and range parsing read local time
    env: { TZ: "UTC", LOG_LEVEL: "silent" },
  },
});
