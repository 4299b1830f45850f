import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // host-zone defaults are asserted as UTC; zone-specific tests pass a zone
    env: { TZ: "UTC" },
  },
});
