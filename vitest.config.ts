// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for unit tests (no infrastructure required).
 * Scope: Node environment, tsconfig path aliases, shared setup file. Does not start servers.
 * Invariants: Coverage disabled by default; every test runs in-process.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: Uses vite-tsconfig-paths for `@/` resolution; `@tests` aliased explicitly.
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/index.ts", "**/*.config.*"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});
