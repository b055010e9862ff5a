import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Image decoding and PDF encoding run in-process and can be slow on CI
    testTimeout: 20000,
  },
});
