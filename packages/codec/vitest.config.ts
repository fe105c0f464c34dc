import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapecodec/codec",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
