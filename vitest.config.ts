import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["domain/**/*.test.ts", "platform/**/*.test.ts"],
    globals: false,
  },
});
