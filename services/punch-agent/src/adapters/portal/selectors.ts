// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/portal/selectors`
 * Purpose: Every portal URL, selector and wait budget in one place.
 * Scope: Constants only.
 * Notes: The portal markup is unversioned. When a punch starts failing, this is the file to update.
 * @internal
 */

import type { PunchAction } from "@gusto-punch/core";

export const PORTAL_PATHS = {
  login: "/login",
  dashboard: "/dashboard",
} as const;

export const CLOCK_BUTTON: Readonly<Record<PunchAction, string>> = {
  in: "[data-dd-action-name='Clock in']",
  out: "[data-dd-action-name='Clock out']",
};

export const SELECTORS = {
  anyClockButton: `${CLOCK_BUTTON.in}, ${CLOCK_BUTTON.out}`,
  emailInput: "input[name='email']",
  passwordInput: "input[type='password']",
  submitButton: "button[type='submit']",
  rememberCheckbox: "input[type='checkbox'][name='remember']",
  codeInput: "input[name='code']",
  rememberDeviceButton: "button:has-text('Remember this device')",
} as const;

/** Wait budgets in milliseconds. */
export interface PortalTimeouts {
  alreadyLoggedIn: number;
  emailField: number;
  passwordField: number;
  rememberCheckbox: number;
  verificationField: number;
  rememberDevicePage: number;
  loginVerified: number;
  statusButton: number;
  punchButton: number;
  navigation: number;
  /** Pause after a form step so the next view can render */
  settle: number;
}

export const DEFAULT_TIMEOUTS: PortalTimeouts = {
  alreadyLoggedIn: 3_000,
  emailField: 3_000,
  passwordField: 5_000,
  rememberCheckbox: 3_000,
  verificationField: 5_000,
  rememberDevicePage: 5_000,
  loginVerified: 10_000,
  statusButton: 5_000,
  punchButton: 10_000,
  navigation: 30_000,
  settle: 1_000,
};

export const DESKTOP_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

export const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";
