import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/api/tests/**/*.test.ts"],
    environment: "node"
  }
});
