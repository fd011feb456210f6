// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters`
 * Purpose: Adapter barrel: concrete implementations of the core ports.
 * Scope: Re-exports only. Imported by bootstrap/container.ts.
 * Side-effects: none
 * @internal
 */

export {
  OsascriptNotifier,
  OsascriptPrompter,
} from "./desktop/osascript.js";
export {
  ConsoleNotifier,
  NonInteractivePrompter,
  TerminalPrompter,
} from "./desktop/terminal.js";
export {
  type PlaywrightPortalConfig,
  PlaywrightPortalDriver,
} from "./portal/playwright-portal.js";
export { JsonCredentialStore } from "./storage/json-credential-store.js";
export { JsonTimerStateStore } from "./storage/json-timer-store.js";
export { SystemClock } from "./time/system-clock.js";
