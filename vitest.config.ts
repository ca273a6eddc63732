import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["internal/**/*.test.ts"],
    environment: "node",
    clearMocks: true,
  },
});
