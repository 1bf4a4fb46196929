import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "manifest-audit",
    include: ["apps/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
