// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/vitest.config`
 * Purpose: Vitest configuration for punch-agent service tests.
 * Scope: Package-local tests only.
 * Invariants:
 *   - Tests import ./src, @gusto-punch/core and tests/_fakes only
 *   - No real browser or remote network; playwright-core is mocked, files go to a temp dir
 * Side-effects: none
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "punch-agent",
    globals: true,
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
  },
});
