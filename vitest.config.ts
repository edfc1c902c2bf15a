import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["etl-service/test/**/*.test.ts"],
    restoreMocks: true,
  },
});
