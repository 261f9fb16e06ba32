import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.{spec,test}.mts"],
    environment: "node"
  }
});
