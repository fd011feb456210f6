// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/observability/logger`
 * Purpose: Pino logger factory - JSON lines to stderr and the log file.
 * Scope: Create configured pino loggers. Does not format output (pipe to pino-pretty if desired).
 * Invariants:
 * - Never writes to stdout; stdout carries menu-plugin and CLI output
 * - Silent under Vitest / NODE_ENV=test
 * - Safe to call at module scope (no env validation)
 * Side-effects: IO (opens the log file when one is given)
 * Notes: Use makeNoopLogger for tests.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  serviceName?: string;
  /** Append JSON lines here as well as to stderr */
  logFile?: string;
  bindings?: Record<string, unknown>;
}

const destinations: pino.DestinationStream[] = [];

export function makeLogger(options: LoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";

  const config: pino.LoggerOptions = {
    level,
    enabled: !(isVitest || nodeEnv === "test"),
    base: {
      ...options.bindings,
      app: "gusto-punch",
      service: options.serviceName ?? "punch-agent",
    },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  const streams: pino.StreamEntry[] = [
    { level: "debug", stream: track(pino.destination({ dest: 2, sync: true })) },
  ];
  if (options.logFile && config.enabled) {
    streams.push({
      level: "debug",
      stream: track(
        pino.destination({ dest: options.logFile, mkdir: true, sync: true })
      ),
    });
  }

  return pino(config, pino.multistream(streams));
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Flushes buffered file output before the process exits. */
export function flushLogger(): void {
  for (const stream of destinations) {
    if ("flushSync" in stream && typeof stream.flushSync === "function") {
      stream.flushSync();
    }
  }
}

function track<T extends pino.DestinationStream>(stream: T): T {
  destinations.push(stream);
  return stream;
}
