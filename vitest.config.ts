import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cascade/tests/**/*.test.ts", "exporters/tests/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
  },
});
