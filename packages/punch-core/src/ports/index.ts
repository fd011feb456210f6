// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/ports`
 * Purpose: Port barrel: canonical import surface for all port interfaces.
 * Scope: Re-exports only. No implementations.
 * Side-effects: none
 * @public
 */

export type { Clock } from "./clock.port.js";
export {
  NOTIFICATION_TITLE,
  type NotifierPort,
  type PrompterPort,
  type PromptRequest,
} from "./desktop.port.js";
export {
  isPortalLaunchError,
  LOGIN_FAILURE_REASONS,
  type LoginFailureReason,
  type LoginResult,
  type PortalDriverPort,
  PortalLaunchError,
  type PortalSession,
  type PunchOutcome,
  type VerificationCodeSource,
} from "./portal-driver.port.js";
export {
  CredentialFileError,
  type CredentialStorePort,
  isCredentialFileError,
  type TimerStatePort,
} from "./storage.port.js";
