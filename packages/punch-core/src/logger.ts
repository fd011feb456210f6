// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/logger`
 * Purpose: Minimal structured logger contract so core stays free of pino.
 * Scope: Interface only. Compatible with pino's Logger type.
 * Side-effects: none
 * @public
 */

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
