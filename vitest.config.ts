import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    // The CLI and stdio tests start tsx child processes.
    testTimeout: 20_000,
  },
});
