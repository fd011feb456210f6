// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/tests/json-stores.test`
 * Purpose: Unit tests for the JSON credential and timer stores.
 * Scope: Real files under a per-test temp directory.
 * @internal
 */

import {
  link,
  mkdtemp,
  readdir,
  readFile,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { isCredentialFileError } from "@gusto-punch/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { JsonCredentialStore } from "../src/adapters/storage/json-credential-store.js";
import { JsonTimerStateStore } from "../src/adapters/storage/json-timer-store.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "punch-store-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const fileMode = async (file: string): Promise<number> =>
  (await stat(file)).mode & 0o777;

describe("JsonCredentialStore", () => {
  it("loads null when no file exists", async () => {
    const store = new JsonCredentialStore(path.join(dir, "config.json"));

    await expect(store.load()).resolves.toBeNull();
  });

  it("saves owner-only JSON and loads it back", async () => {
    const file = path.join(dir, "nested", "config.json");
    const store = new JsonCredentialStore(file);

    await store.save({ email: "worker@example.com", password: "test-password" });

    expect(await readFile(file, "utf8")).toBe(
      '{"email":"worker@example.com","password":"test-password"}\n'
    );
    expect(await fileMode(file)).toBe(0o600);
    await expect(store.load()).resolves.toEqual({
      email: "worker@example.com",
      password: "test-password",
    });
  });

  it("tightens the mode of an existing file", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, "{}\n", { mode: 0o644 });

    await new JsonCredentialStore(file).save({
      email: "worker@example.com",
      password: "test-password",
    });

    expect(await fileMode(file)).toBe(0o600);
  });

  it("replaces an existing file instead of writing into it", async () => {
    const file = path.join(dir, "config.json");
    const previous = path.join(dir, "previous.json");
    await writeFile(file, "{}\n", { mode: 0o644 });
    await link(file, previous);

    await new JsonCredentialStore(file).save({
      email: "worker@example.com",
      password: "test-password",
    });

    expect(await readFile(previous, "utf8")).toBe("{}\n");
    expect((await readdir(dir)).sort()).toEqual(["config.json", "previous.json"]);
  });

  it("treats a file missing either field as not configured", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, '{"email":"worker@example.com"}');

    await expect(new JsonCredentialStore(file).load()).resolves.toBeNull();
  });

  it("ignores unknown keys", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(
      file,
      '{"email":"worker@example.com","password":"test-password","theme":"dark"}'
    );

    await expect(new JsonCredentialStore(file).load()).resolves.toEqual({
      email: "worker@example.com",
      password: "test-password",
    });
  });

  it("throws CredentialFileError for malformed JSON", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, "not json");

    const error = await new JsonCredentialStore(file)
      .load()
      .catch((err: unknown) => err);

    expect(isCredentialFileError(error)).toBe(true);
    expect(error).toHaveProperty("path", file);
    expect(error).toHaveProperty(
      "message",
      expect.stringMatching(/^Error loading configuration: /)
    );
  });

  it("throws CredentialFileError when the JSON is not an object", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, "[]");

    await expect(new JsonCredentialStore(file).load()).rejects.toThrow(
      "Error loading configuration: Expected object, received array"
    );
  });
});

describe("JsonTimerStateStore", () => {
  it("loads null when no file exists", async () => {
    const store = new JsonTimerStateStore(path.join(dir, "timer.json"));

    await expect(store.load()).resolves.toBeNull();
  });

  it("stores the clock-in time as epoch seconds", async () => {
    const file = path.join(dir, "timer.json");
    const store = new JsonTimerStateStore(file);
    const clockedInAt = new Date("2024-01-01T10:00:00.500Z");

    await store.save(clockedInAt);

    expect(await readFile(file, "utf8")).toBe(
      '{"clock_in_time":1704103200.5}\n'
    );
    await expect(store.load()).resolves.toEqual(clockedInAt);
  });

  it("stores null when clocked out", async () => {
    const file = path.join(dir, "timer.json");
    const store = new JsonTimerStateStore(file);

    await store.save(null);

    expect(await readFile(file, "utf8")).toBe('{"clock_in_time":null}\n');
    await expect(store.load()).resolves.toBeNull();
  });

  it("reads whole-second timestamps", async () => {
    const file = path.join(dir, "timer.json");
    await writeFile(file, '{"clock_in_time": 1700000000}');

    await expect(new JsonTimerStateStore(file).load()).resolves.toEqual(
      new Date(1_700_000_000_000)
    );
  });

  it("treats a missing key as no timer", async () => {
    const file = path.join(dir, "timer.json");
    await writeFile(file, "{}");

    await expect(new JsonTimerStateStore(file).load()).resolves.toBeNull();
  });

  it("rejects a timestamp beyond the representable date range", async () => {
    const file = path.join(dir, "timer.json");
    await writeFile(file, '{"clock_in_time":1e20}');

    await expect(new JsonTimerStateStore(file).load()).rejects.toThrow();
  });

  it("rejects a non-numeric timestamp", async () => {
    const file = path.join(dir, "timer.json");
    await writeFile(file, '{"clock_in_time":"yesterday"}');

    await expect(new JsonTimerStateStore(file).load()).rejects.toThrow();
  });
});
