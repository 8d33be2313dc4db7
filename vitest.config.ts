import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/client/src/**/*.test.ts"],
    environment: "node",
  },
});
