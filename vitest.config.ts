// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,          // describe/test/expect without imports
    environment: "jsdom",   // the results panel renders into a DOM
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"]
  }
});
