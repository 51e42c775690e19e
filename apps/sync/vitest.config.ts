/**
 * Vitest Configuration: @dualmap/sync
 *
 * Runs the domain through the mapper on in-memory storage.
 * No database is needed.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
