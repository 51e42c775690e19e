/**
 * Vitest Configuration: @dualmap/contracts
 *
 * Pure TypeScript tests. No database, no network.
 * These tests cover the declaration helpers and the Zod field schemas.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
