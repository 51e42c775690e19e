/**
 * Vitest Configuration: @dualmap/domain
 *
 * Tests for the sample entity definitions.
 * Validates that entity structures conform to the contracts.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
