import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  {
    test: {
      name: "core",
      root: "./packages/core",
      environment: "node",
      include: ["tests/**/*.test.ts"],
      exclude: ["**/node_modules/**", "**/dist/**"],
    },
  },
]);
