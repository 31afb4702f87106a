// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package and service.
 * Scope: Unit and in-process integration tests only. Does not start chains, databases or network servers.
 * Invariants: Tests run from TypeScript sources; workspace imports resolve through tsconfig paths.
 * Side-effects: none
 * Notes: Uses vite-tsconfig-paths so `@attestor/*` resolves to package sources without a build.
 * Links: tsconfig.json
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "dist/", "**/*.d.ts", "**/index.ts"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
});
