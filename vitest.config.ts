import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      DOMAINKIT_LOG_LEVEL: "silent",
    },
    pool: "forks",
  },
});
