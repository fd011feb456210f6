// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/time/system-clock`
 * Purpose: System clock implementation for real-world time access
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port
 * @internal
 */

import type { Clock } from "@gusto-punch/core";

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
