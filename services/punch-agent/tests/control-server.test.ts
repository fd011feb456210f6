// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/tests/control-server.test`
 * Purpose: Tests for the loopback control server and its HTTP client.
 * Scope: Real server on an ephemeral 127.0.0.1 port over a PunchService with stub ports.
 * @internal
 */

import type { Server } from "node:http";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ControlClient,
  isControlRequestError,
} from "../src/cli/client.js";
import {
  closeServer,
  createControlServer,
  type HealthState,
  listen,
} from "../src/control-server.js";
import { makeNoopLogger } from "../src/observability/logger.js";
import { makeStubService, type StubServiceHarness } from "./_fakes/service.js";

describe("control server", () => {
  let harness: StubServiceHarness;
  let health: HealthState;
  let server: Server;
  let baseUrl: string;
  let client: ControlClient;
  let quitRequested: Promise<void>;

  beforeEach(async () => {
    harness = makeStubService();
    await harness.service.start();
    health = { ready: true };

    let onQuit = (): void => {};
    quitRequested = new Promise((resolve) => {
      onQuit = resolve;
    });

    server = createControlServer({
      service: harness.service,
      health,
      onQuit: () => onQuit(),
      logger: makeNoopLogger(),
    });
    const { port } = await listen(server, 0);
    baseUrl = `http://127.0.0.1:${port}`;
    client = new ControlClient(port);
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it("answers liveness", async () => {
    const res = await fetch(`${baseUrl}/livez`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("ok");
  });

  it("answers readiness from the health state", async () => {
    expect((await fetch(`${baseUrl}/readyz`)).status).toBe(200);

    health.ready = false;
    const res = await fetch(`${baseUrl}/readyz`);

    expect(res.status).toBe(503);
    expect(await res.text()).toBe("not ready");
  });

  it("returns the current snapshot", async () => {
    const res = await fetch(`${baseUrl}/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "out",
      clockedInAt: null,
      configured: true,
      view: {
        title: "⏱☒",
        actions: { in: true, out: false },
        elapsedLabel: "Time Clocked: --:--",
        configured: true,
        items: [
          { id: "check-status", label: "Check Status" },
          { id: "setup", label: "Setup" },
          { id: "restart-session", label: "Restart Session" },
          { id: "quit", label: "Quit" },
        ],
      },
    });
  });

  it("runs clock actions and returns outcome plus snapshot", async () => {
    const res = await fetch(`${baseUrl}/clock-in`, { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      outcome: "punched",
      snapshot: { status: "in", clockedInAt: "2024-01-01T10:00:00.000Z" },
    });
    expect(harness.driver.latest?.punches).toEqual(["in"]);
  });

  it("rejects the wrong method", async () => {
    expect((await fetch(`${baseUrl}/clock-in`)).status).toBe(405);
    expect((await fetch(`${baseUrl}/status`, { method: "POST" })).status).toBe(
      405
    );
  });

  it("returns 404 for unknown paths", async () => {
    expect((await fetch(`${baseUrl}/clock-sideways`)).status).toBe(404);
  });

  it("acknowledges quit before calling onQuit", async () => {
    const res = await fetch(`${baseUrl}/quit`, { method: "POST" });

    expect(res.status).toBe(202);
    expect(await res.json()).toMatchObject({ outcome: "stopping" });
    await quitRequested;
  });

  describe("ControlClient", () => {
    it("reads a validated snapshot", async () => {
      const snapshot = await client.snapshot();

      expect(snapshot?.status).toBe("out");
      expect(snapshot?.view.title).toBe("⏱☒");
    });

    it("posts actions", async () => {
      await client.action("/clock-in");
      const response = await client.action("/clock-out");

      expect(response?.outcome).toBe("punched");
      expect(response?.snapshot.status).toBe("out");
      expect(harness.driver.latest?.punches).toEqual(["in", "out"]);
    });

    it("reports an action that is already in effect", async () => {
      const response = await client.action("/clock-out");

      expect(response?.outcome).toBe("disabled");
      expect(harness.notifier.messages).toContain("Info: Already clocked out");
    });

    it("asks the agent to quit", async () => {
      await expect(client.quit()).resolves.toBe(true);
      await quitRequested;
    });
  });
});

describe("ControlClient without an agent", () => {
  it("returns null when nothing is listening", async () => {
    const idle = createControlServer({
      service: makeStubService().service,
      health: { ready: false },
      onQuit: () => {},
      logger: makeNoopLogger(),
    });
    const { port } = await listen(idle, 0);
    await closeServer(idle);
    const client = new ControlClient(port);

    await expect(client.snapshot()).resolves.toBeNull();
    await expect(client.action("/check-status")).resolves.toBeNull();
    await expect(client.quit()).resolves.toBe(false);
  });

  it("throws ControlRequestError on an error status", async () => {
    const client = new ControlClient(
      47115,
      async () => new Response("internal error", { status: 500 })
    );

    const error = await client.snapshot().catch((err: unknown) => err);

    expect(isControlRequestError(error)).toBe(true);
    expect(error).toHaveProperty("message", "Agent responded 500 to /status");
  });

  it("rejects a malformed snapshot", async () => {
    const client = new ControlClient(
      47115,
      async () => Response.json({ status: "sideways" })
    );

    await expect(client.snapshot()).rejects.toThrow();
  });
});
