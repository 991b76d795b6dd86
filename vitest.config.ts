import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    // Plain output for formatter and CLI assertions; colors.test.ts opts back in
    env: { NO_COLOR: "1" },
  },
});
