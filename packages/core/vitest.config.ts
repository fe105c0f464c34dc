import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapecodec/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
