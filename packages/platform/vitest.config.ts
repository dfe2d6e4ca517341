/**
 * Vitest Configuration: @keepsync/platform
 *
 * Unit tests for the relation engine, entity records and adapters.
 * Storage runs against the in-memory DatabaseClient; nothing here
 * needs a real database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
