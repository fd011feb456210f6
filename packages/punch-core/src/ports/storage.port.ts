// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/storage`
 * Purpose: Persistence ports for credentials and the clock-in timestamp.
 * Scope: Defines load/save contracts. Does not contain implementations.
 * Invariants:
 * - CredentialStorePort.load() returns null for a missing file, throws CredentialFileError for a broken one
 * - TimerStatePort.save(null) clears the stored timestamp
 * Side-effects: none (interface definition only)
 * Links: services/punch-agent/src/adapters/storage/
 * @public
 */

import type { Credentials } from "../types.js";

export interface CredentialStorePort {
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<void>;
}

export interface TimerStatePort {
  load(): Promise<Date | null>;
  save(clockedInAt: Date | null): Promise<void>;
}

/**
 * Port-level error thrown when the credential file exists but cannot be used.
 */
export class CredentialFileError extends Error {
  constructor(
    public readonly path: string,
    detail: string
  ) {
    super(`Error loading configuration: ${detail}`);
    this.name = "CredentialFileError";
  }
}

export function isCredentialFileError(
  error: unknown
): error is CredentialFileError {
  return error instanceof Error && error.name === "CredentialFileError";
}
