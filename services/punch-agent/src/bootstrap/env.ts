// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - Every file path defaults under the user's home directory
 * - PORTAL_BASE_URL must be a URL; trailing slashes are stripped
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: services/punch-agent/src/bootstrap/container.ts
 * @internal
 */

import { homedir } from "node:os";
import path from "node:path";

import { z } from "zod";

const home = (file: string): string => path.join(homedir(), file);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  /** Portal origin; login and dashboard paths are appended */
  PORTAL_BASE_URL: z
    .string()
    .url("PORTAL_BASE_URL must be a valid URL")
    .default("https://app.gusto.com")
    .transform((url) => url.replace(/\/+$/, "")),

  /** Stored credentials (treat as secret - never log) */
  PUNCH_CONFIG_FILE: z.string().min(1).default(home(".gusto_punch_config.json")),

  /** Persisted clock-in timestamp */
  PUNCH_TIMER_FILE: z.string().min(1).default(home(".gusto_punch_timer.json")),

  /** Persistent browser profile (cookies, remembered device) */
  PUNCH_PROFILE_DIR: z
    .string()
    .min(1)
    .default(home(".gusto_punch_chrome_profile")),

  /** JSON log file, in addition to stderr */
  PUNCH_LOG_FILE: z.string().min(1).default(home(".gusto_clock.log")),

  /** Installed browser channel used by playwright-core (no download) */
  BROWSER_CHANNEL: z.string().min(1).default("chrome"),

  /** Explicit browser binary; overrides BROWSER_CHANNEL when set */
  BROWSER_EXECUTABLE_PATH: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),

  BROWSER_HEADLESS: booleanFlag.default("true"),

  /** Elapsed-label refresh period */
  TICK_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(60),

  /** Loopback control server port (default: 47115) */
  CONTROL_PORT: z.coerce.number().int().min(1).max(65535).default(47115),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: punch-agent) */
  SERVICE_NAME: z.string().default("punch-agent"),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Thrown when process.env does not satisfy EnvSchema.
 */
export class EnvValidationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid environment configuration:\n${issues.join("\n")}`);
    this.name = "EnvValidationError";
  }
}

export function isEnvValidationError(
  error: unknown
): error is EnvValidationError {
  return error instanceof Error && error.name === "EnvValidationError";
}

/**
 * Parses an env record without caching. Used by env() and tests.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new EnvValidationError(
      result.error.errors.map((e) => `  ${e.path.join(".")}: ${e.message}`)
    );
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
