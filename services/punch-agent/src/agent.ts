// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/agent`
 * Purpose: Long-running agent lifecycle: control server, service start, elapsed-time ticker.
 * Scope: Starts and stops the pieces in order. Does not install signal handlers (main.ts owns the process).
 * Invariants:
 *   - Control server binds before the service starts so the menu can show a starting agent
 *   - ready=true only after PunchService.start() resolves
 *   - stop() is idempotent; the browser session is closed last
 * Side-effects: IO (HTTP listener, timers, browser via the service)
 * Links: services/punch-agent/src/main.ts, services/punch-agent/src/control-server.ts
 * @internal
 */

import type { Server } from "node:http";

import type { PunchService } from "@gusto-punch/core";

import {
  closeServer,
  createControlServer,
  type HealthState,
  listen,
} from "./control-server.js";
import type { Logger } from "./observability/logger.js";

export interface AgentOptions {
  service: PunchService;
  logger: Logger;
  controlPort: number;
  tickIntervalMs: number;
  /** Called when a client posts /quit */
  onQuit: () => void;
}

export interface RunningAgent {
  readonly port: number;
  readonly health: HealthState;
  stop(): Promise<void>;
}

export async function startAgent(options: AgentOptions): Promise<RunningAgent> {
  const { service, logger, controlPort, tickIntervalMs, onQuit } = options;

  const health: HealthState = { ready: false };
  const server: Server = createControlServer({
    service,
    health,
    onQuit,
    logger: logger.child({ component: "control-server" }),
  });

  let port: number;
  try {
    ({ port } = await listen(server, controlPort));
  } catch (err) {
    throw new Error(
      `Control port ${controlPort} is unavailable; is another agent already running?`,
      { cause: err }
    );
  }
  logger.info({ port }, "Control server listening");

  let ticker: NodeJS.Timeout | undefined;
  let stopped = false;

  const stop = async (): Promise<void> => {
    if (stopped) {
      return;
    }
    stopped = true;
    health.ready = false;
    clearInterval(ticker);
    await closeServer(server);
    await service.shutdown();
    logger.info({}, "Agent stopped");
  };

  try {
    await service.start();
  } catch (err) {
    await stop();
    throw err;
  }

  ticker = setInterval(() => {
    const view = service.tick();
    logger.debug({ title: view.title, elapsed: view.elapsedLabel }, "tick");
  }, tickIntervalMs);
  ticker.unref();

  health.ready = true;
  logger.info(
    { port, tickIntervalMs, configured: service.isConfigured() },
    "Agent ready"
  );

  return { port, health, stop };
}
