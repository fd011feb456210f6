// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module.
 * @internal
 */

export const REDACT_PATHS = [
  // Portal login
  "email",
  "password",
  "code",
  "credentials.email",
  "credentials.password",
  "*.password",
  // Session material
  "cookie",
  "cookies",
  "headers.cookie",
  "token",
];
