// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/storage/json-timer-store`
 * Purpose: TimerStatePort backed by `{"clock_in_time": <epoch seconds> | null}`.
 * Scope: Epoch-seconds conversion and shape validation.
 * Invariants:
 * - Fractional seconds are kept to the millisecond
 * - load() never returns an Invalid Date; out-of-range values throw
 * Side-effects: IO (filesystem)
 * @internal
 */

import type { TimerStatePort } from "@gusto-punch/core";
import { z } from "zod";

import { MISSING, readJsonFile, writeJsonFile } from "./json-file.js";

// Date holds at most 8.64e15 ms either side of the epoch
const MAX_EPOCH_SECONDS = 8.64e12;

const TimerFileSchema = z.object({
  clock_in_time: z
    .number()
    .finite()
    .min(-MAX_EPOCH_SECONDS)
    .max(MAX_EPOCH_SECONDS)
    .nullable()
    .optional(),
});

export class JsonTimerStateStore implements TimerStatePort {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Date | null> {
    const raw = await readJsonFile(this.filePath);
    if (raw === MISSING) {
      return null;
    }
    const { clock_in_time: seconds } = TimerFileSchema.parse(raw);
    return seconds ? new Date(Math.round(seconds * 1000)) : null;
  }

  async save(clockedInAt: Date | null): Promise<void> {
    await writeJsonFile(this.filePath, {
      clock_in_time: clockedInAt ? clockedInAt.getTime() / 1000 : null,
    });
  }
}
