// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/types`
 * Purpose: Clock state type definitions and constants (logic-free).
 * Scope: Defines ClockStatus, PunchAction, Credentials, ClockState. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, and interfaces
 * - status "out" | "unknown" implies clockedInAt === null once persisted
 * Side-effects: none (constants and types only)
 * Links: packages/punch-core/src/menu.ts
 * @public
 */

/**
 * Clock status as last observed on the portal dashboard.
 * "unknown" until the first successful detection or click.
 */
export const CLOCK_STATUSES = ["in", "out", "unknown"] as const;

export type ClockStatus = (typeof CLOCK_STATUSES)[number];

/** A single punch on the portal: the Clock in or Clock out button. */
export const PUNCH_ACTIONS = ["in", "out"] as const;

export type PunchAction = (typeof PUNCH_ACTIONS)[number];

/** Portal login pair, kept in the local config file. */
export interface Credentials {
  readonly email: string;
  readonly password: string;
}

export interface ClockState {
  readonly status: ClockStatus;
  /** Start of the current shift; null unless status is "in" */
  readonly clockedInAt: Date | null;
}
