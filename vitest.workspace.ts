// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.workspace`
 * Purpose: Vitest workspace configuration for monorepo test discovery.
 * Scope: Discovers package-local and service-local vitest configs.
 * Invariants:
 *   - Core tests in packages/<pkg>/tests/** only import that package
 *   - Service tests may import @gusto-punch/core through its package exports
 * Side-effects: none
 * Links: packages/punch-core/vitest.config.ts, services/punch-agent/vitest.config.ts
 * @public
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "./packages/*/vitest.config.ts",
  "./services/*/vitest.config.ts",
]);
