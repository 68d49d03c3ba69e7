import { defineConfig } from "vitest/config";

// Unit tests only: every embedding / LLM collaborator is replaced by an
// in-process fake, so nothing here reaches the network.
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10000,
    restoreMocks: true,
  },
});
