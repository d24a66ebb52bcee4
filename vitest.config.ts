import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["filingrag/tests/**/*.test.ts"],
    environment: "node"
  }
});
