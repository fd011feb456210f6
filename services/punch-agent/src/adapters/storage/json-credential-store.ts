// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/storage/json-credential-store`
 * Purpose: CredentialStorePort backed by a JSON file readable only by the owner.
 * Scope: Load/validate/save the email + password pair. Does not encrypt.
 * Invariants:
 * - Missing file loads as null; malformed file throws CredentialFileError
 * - A file without both fields counts as not configured (null)
 * - Written with mode 0600
 * Side-effects: IO (filesystem)
 * Links: packages/punch-core/src/ports/storage.port.ts
 * @internal
 */

import {
  CredentialFileError,
  type Credentials,
  type CredentialStorePort,
  errorMessage,
} from "@gusto-punch/core";
import { z } from "zod";

import { MISSING, readJsonFile, writeJsonFile } from "./json-file.js";

const StoredConfigSchema = z
  .object({
    email: z.string().optional(),
    password: z.string().optional(),
  })
  .passthrough();

export class JsonCredentialStore implements CredentialStorePort {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Credentials | null> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (err) {
      throw new CredentialFileError(this.filePath, errorMessage(err));
    }
    if (raw === MISSING) {
      return null;
    }

    const parsed = StoredConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CredentialFileError(
        this.filePath,
        parsed.error.errors.map((e) => e.message).join("; ")
      );
    }

    const { email, password } = parsed.data;
    if (!email || !password) {
      return null;
    }
    return { email, password };
  }

  async save(credentials: Credentials): Promise<void> {
    await writeJsonFile(
      this.filePath,
      { email: credentials.email, password: credentials.password },
      0o600
    );
  }
}
