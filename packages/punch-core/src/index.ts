// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core`
 * Purpose: Clock state, menu model, port interfaces and the punch service.
 * Scope: Pure domain. Does not contain adapters or I/O.
 * Invariants:
 * - FORBIDDEN: playwright-core, pino, node:fs, node:http
 * - ALLOWED: ports, pure functions, orchestration over ports
 * Side-effects: none
 * @public
 */

export { errorMessage, type LoggerLike } from "./logger.js";
export {
  buildMenuView,
  ELAPSED_PLACEHOLDER,
  elapsedLabel,
  FIXED_MENU_ITEMS,
  type FixedMenuItemId,
  formatElapsed,
  isActionEnabled,
  type MenuActions,
  type MenuItem,
  type MenuView,
  menuActions,
  statusTitle,
  TITLE_BY_STATUS,
} from "./menu.js";
export * from "./ports/index.js";
export { SerialExecutor } from "./serial-executor.js";
export {
  type ClockOutcome,
  type OperationResult,
  PunchService,
  type PunchServiceDeps,
  type PunchSnapshot,
  type RestartOutcome,
  type SetupOutcome,
  type StatusOutcome,
} from "./services/punch-service.js";
export {
  CLOCK_STATUSES,
  type ClockState,
  type ClockStatus,
  type Credentials,
  PUNCH_ACTIONS,
  type PunchAction,
} from "./types.js";
