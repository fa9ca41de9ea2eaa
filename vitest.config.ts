import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/sources/**/*.spec.ts"],
    environment: "node",
    env: {
      RT_LOG_LEVEL: "silent"
    }
  }
});
