import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    name: "unit",
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
