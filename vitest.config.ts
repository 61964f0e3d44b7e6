import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["bridge/src/**/*.test.ts"],
  },
});
