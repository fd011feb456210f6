// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/portal-driver`
 * Purpose: Browser-automation port for the payroll portal.
 * Scope: Defines the session contract (login, status detection, punch). Does not contain implementations.
 * Invariants:
 * - Only one caller drives a session at a time (enforced by PunchService via SerialExecutor)
 * - isAlive() and close() never throw
 * - login() reports expected failures as LoginResult, throws only on driver faults
 * Side-effects: none (interface definition only)
 * Notes: The portal DOM is unversioned; selectors live in the adapter, not here.
 * Links: services/punch-agent/src/adapters/portal/playwright-portal.ts
 * @public
 */

import type { ClockStatus, Credentials, PunchAction } from "../types.js";

/**
 * Supplies the one-time verification code when the portal asks for one.
 * Resolves to null when the user cancels.
 */
export type VerificationCodeSource = () => Promise<string | null>;

export const LOGIN_FAILURE_REASONS = [
  "no_password_field",
  "verification_cancelled",
  "verification_empty",
  "not_verified",
] as const;

export type LoginFailureReason = (typeof LOGIN_FAILURE_REASONS)[number];

export type LoginResult =
  | { readonly ok: true; readonly alreadyLoggedIn: boolean }
  | { readonly ok: false; readonly reason: LoginFailureReason };

export type PunchOutcome = "punched" | "button_missing";

export interface PortalSession {
  isAlive(): Promise<boolean>;
  login(
    credentials: Credentials,
    requestCode: VerificationCodeSource
  ): Promise<LoginResult>;
  openDashboard(): Promise<void>;
  /** Reads clock status from the page currently loaded. */
  detectStatus(): Promise<ClockStatus>;
  punch(action: PunchAction): Promise<PunchOutcome>;
  close(): Promise<void>;
}

export interface PortalDriverPort {
  open(): Promise<PortalSession>;
}

/**
 * Port-level error thrown when the browser cannot be started.
 */
export class PortalLaunchError extends Error {
  constructor(message: string, cause?: unknown) {
    super(`Browser session could not be started: ${message}`, { cause });
    this.name = "PortalLaunchError";
  }
}

export function isPortalLaunchError(
  error: unknown
): error is PortalLaunchError {
  return error instanceof Error && error.name === "PortalLaunchError";
}
