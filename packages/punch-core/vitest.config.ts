// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/vitest.config`
 * Purpose: Vitest configuration for punch-core package tests.
 * Scope: Package-local tests only.
 * Invariants:
 *   - Tests only import from this package (relative ./src)
 *   - No browser, filesystem or network in unit tests
 * Side-effects: none
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "punch-core",
    globals: true,
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
  },
});
