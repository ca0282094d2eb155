import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.spec.ts"],
    exclude: ["node_modules/**", "dist/**"],
    env: { KEYLINE_LOG: "silent" }
  }
});
