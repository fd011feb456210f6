// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/storage/json-file`
 * Purpose: Small JSON read/write helpers shared by the file-backed stores.
 * Scope: Missing-file detection, parent directory creation, file mode, atomic replace. Does not validate shape.
 * Side-effects: IO (filesystem)
 * @internal
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/** The sentinel returned when the file does not exist. */
export const MISSING = Symbol("missing");

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Reads and parses a JSON file.
 * Throws on unreadable or malformed content.
 */
export async function readJsonFile(
  filePath: string
): Promise<unknown | typeof MISSING> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) {
      return MISSING;
    }
    throw err;
  }
  return JSON.parse(raw);
}

/**
 * Writes JSON through a temp file renamed over the target, so the content
 * never lands in a file with a wider mode than requested.
 */
export async function writeJsonFile(
  filePath: string,
  value: unknown,
  mode = 0o644
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await rm(tempPath, { force: true });
  try {
    // wx: the mode applies because the file is always created here
    await writeFile(tempPath, `${JSON.stringify(value)}\n`, {
      mode,
      flag: "wx",
    });
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
