import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["qa-audit-backend/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
