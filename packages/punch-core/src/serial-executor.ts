// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/serial-executor`
 * Purpose: Runs async tasks one at a time in submission order.
 * Scope: Single-process mutual exclusion for the browser session. Does not time out tasks.
 * Invariants:
 * - At most one task is running at any moment
 * - A rejected task never blocks the tasks queued behind it
 * Side-effects: none
 * @public
 */

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  private release(): void {
    this.pending -= 1;
  }
}
