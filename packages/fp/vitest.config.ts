import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapecodec/fp",
    include: ["src/**/*.test.ts"],
  },
});
