// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/cli/client`
 * Purpose: HTTP client for the running agent's loopback control server.
 * Scope: Request/response validation only. Does not start the agent or fall back to local execution.
 * Invariants:
 * - Connection failure → null (agent not running); any HTTP error status → ControlRequestError
 * - Every response body is validated with Zod before use
 * Side-effects: IO (HTTP to 127.0.0.1)
 * Links: services/punch-agent/src/control-server.ts
 * @internal
 */

import {
  CLOCK_STATUSES,
  type PunchSnapshot,
} from "@gusto-punch/core";
import { z } from "zod";

import { type ActionRoute, CONTROL_HOST } from "../control-server.js";

const MenuItemSchema = z.object({
  id: z.enum(["check-status", "setup", "restart-session", "quit"]),
  label: z.string(),
});

export const SnapshotSchema: z.ZodType<PunchSnapshot> = z.object({
  status: z.enum(CLOCK_STATUSES),
  clockedInAt: z.string().nullable(),
  configured: z.boolean(),
  view: z.object({
    title: z.string(),
    actions: z.object({ in: z.boolean(), out: z.boolean() }),
    elapsedLabel: z.string(),
    configured: z.boolean(),
    items: z.array(MenuItemSchema),
  }),
});

const ActionResponseSchema = z.object({
  outcome: z.string(),
  snapshot: SnapshotSchema,
});

export type ActionResponse = z.infer<typeof ActionResponseSchema>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Snapshot reads should answer quickly; actions may wait on a login. */
const SNAPSHOT_TIMEOUT_MS = 2000;

export class ControlRequestError extends Error {
  constructor(
    public readonly path: string,
    public readonly status: number
  ) {
    super(`Agent responded ${status} to ${path}`);
    this.name = "ControlRequestError";
  }
}

export function isControlRequestError(
  error: unknown
): error is ControlRequestError {
  return error instanceof Error && error.name === "ControlRequestError";
}

export class ControlClient {
  private readonly baseUrl: string;

  constructor(
    port: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = `http://${CONTROL_HOST}:${port}`;
  }

  async snapshot(): Promise<PunchSnapshot | null> {
    const body = await this.request("/status", {
      method: "GET",
      signal: AbortSignal.timeout(SNAPSHOT_TIMEOUT_MS),
    });
    return body === null ? null : SnapshotSchema.parse(body);
  }

  async action(route: ActionRoute): Promise<ActionResponse | null> {
    const body = await this.request(route, { method: "POST" });
    return body === null ? null : ActionResponseSchema.parse(body);
  }

  /** Asks the agent to stop. false when no agent answered. */
  async quit(): Promise<boolean> {
    const body = await this.request("/quit", { method: "POST" });
    return body !== null;
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch {
      // ECONNREFUSED or timeout: nothing is listening
      return null;
    }
    if (!res.ok) {
      throw new ControlRequestError(path, res.status);
    }
    return res.json();
  }
}
