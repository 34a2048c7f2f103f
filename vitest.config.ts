import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // Fixture sources are inputs to the extractor, not tests
    exclude: ["test/fixtures/**", "node_modules/**"],
    environment: "node",
    testTimeout: 15_000,
  },
});
