import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/tests/**/*.spec.ts"],
    environment: "node",
    testTimeout: 10_000
  }
});
