import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["listener-service/tests/**/*.spec.ts"],
    reporters: ["default"],
    testTimeout: 10_000
  }
});
