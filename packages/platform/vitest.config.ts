/**
 * Vitest Configuration: @dualmap/platform
 *
 * Unit tests for the mapping engine. Storage runs in memory; the
 * Drizzle adapter is checked through the SQL it builds, never against
 * a live database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
