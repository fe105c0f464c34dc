import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapecodec/json",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
