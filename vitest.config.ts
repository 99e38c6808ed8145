import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      PRESENCE_LOG_STYLE: "hidden",
    },
  },
});
