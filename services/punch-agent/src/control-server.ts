// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/control-server`
 * Purpose: Loopback HTTP surface for the menu plugin and CLI to drive the running agent.
 * Scope: /livez, /readyz, /status and POST actions mapped onto PunchService. Does not contain business logic.
 * Invariants:
 * - Binds 127.0.0.1 only
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - Action responses are `{ outcome, snapshot }` JSON
 * - Unknown path → 404, known path with wrong method → 405
 * Side-effects: Binds HTTP server to CONTROL_PORT
 * Links: services/punch-agent/src/cli/client.ts
 * @internal
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";

import type { OperationResult, PunchService } from "@gusto-punch/core";

import type { Logger } from "./observability/logger.js";

export interface HealthState {
  ready: boolean;
}

export const CONTROL_HOST = "127.0.0.1";

export const ACTION_ROUTES = {
  "/clock-in": (service) => service.clockIn(),
  "/clock-out": (service) => service.clockOut(),
  "/check-status": (service) => service.checkStatus(),
  "/restart-session": (service) => service.restartSession(),
  "/setup": (service) => service.setup(),
} satisfies Record<
  string,
  (service: PunchService) => Promise<OperationResult<string>>
>;

export type ActionRoute = keyof typeof ACTION_ROUTES;

const GET_ROUTES = new Set(["/livez", "/readyz", "/status"]);

function isActionRoute(path: string): path is ActionRoute {
  return Object.hasOwn(ACTION_ROUTES, path);
}

export interface ControlServerDeps {
  service: PunchService;
  health: HealthState;
  /** Invoked after the /quit response has been sent */
  onQuit: () => void;
  logger: Logger;
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function createControlServer(deps: ControlServerDeps): Server {
  const { service, health, onQuit, logger } = deps;

  const route = async (
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> => {
    const path = new URL(req.url ?? "/", `http://${CONTROL_HOST}`).pathname;
    const method = req.method ?? "GET";

    if (GET_ROUTES.has(path)) {
      if (method !== "GET") {
        sendText(res, 405, "method not allowed");
      } else if (path === "/livez") {
        sendText(res, 200, "ok");
      } else if (path === "/readyz") {
        if (health.ready) {
          sendText(res, 200, "ok");
        } else {
          sendText(res, 503, "not ready");
        }
      } else {
        sendJson(res, 200, service.snapshot());
      }
      return;
    }

    if (path === "/quit" || isActionRoute(path)) {
      if (method !== "POST") {
        sendText(res, 405, "method not allowed");
        return;
      }
      if (path === "/quit") {
        res.once("finish", onQuit);
        sendJson(res, 202, { outcome: "stopping", snapshot: service.snapshot() });
        return;
      }
      logger.info({ path }, "Control action received");
      const result = await ACTION_ROUTES[path](service);
      sendJson(res, 200, result);
      return;
    }

    sendText(res, 404, "not found");
  };

  return createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      logger.error({ err, url: req.url }, "Control request failed");
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal error" });
      } else {
        res.end();
      }
    });
  });
}

export function listen(
  server: Server,
  port: number,
  host: string = CONTROL_HOST
): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Control server did not bind a TCP port"));
        return;
      }
      resolve(address);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
