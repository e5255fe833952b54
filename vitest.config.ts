import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["docmind/tests/**/*.test.ts"],
    environment: "node"
  }
});
