// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Provides current time to the service layer. Does not handle timezone conversion.
 * Side-effects: none (interface only)
 * @public
 */

export interface Clock {
  now(): Date;
}
