import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@ordkit/core",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});
