import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["benchmarks/**/*.test.ts"],
    env: {
      LOG_JSON: "1",
      LOG_LEVEL: "silent",
    },
  },
});
