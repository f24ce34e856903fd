import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/specs/**/*.spec.ts"],
    environment: "node",
    testTimeout: 20000,
    hookTimeout: 20000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
