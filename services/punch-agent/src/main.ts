// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/main`
 * Purpose: Process entry point for the `gusto-punch` CLI and the long-running agent.
 * Scope: Reads env, builds the logger and hands off to runCli. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - `run` handles SIGTERM/SIGINT and POST /quit for graceful shutdown
 *   - One-shot commands always close their browser session before exiting
 *   - Logger is flushed before every process.exit
 * Side-effects: IO (process signals, stdout/stderr, exit code)
 * Links: services/punch-agent/src/cli/commands.ts, services/punch-agent/src/agent.ts
 * @public
 */

import type { OperationResult, PunchService } from "@gusto-punch/core";

import { type RunningAgent, startAgent } from "./agent.js";
import { createContainer } from "./bootstrap/container.js";
import { type Env, env, isEnvValidationError } from "./bootstrap/env.js";
import { ControlClient } from "./cli/client.js";
import { type LocalRunOptions, runCli } from "./cli/commands.js";
import type { CliInvocation } from "./menubar/render.js";
import { flushLogger, type Logger, makeLogger } from "./observability/logger.js";

function currentInvocation(): CliInvocation {
  return {
    command: process.execPath,
    args: [...process.execArgv, ...process.argv.slice(1, 2)],
  };
}

async function runLocal<O extends string>(
  config: Env,
  logger: Logger,
  task: (service: PunchService) => Promise<OperationResult<O>>,
  options: LocalRunOptions
): Promise<OperationResult<O>> {
  const { service } = createContainer(config, logger.child({ mode: "one-shot" }));
  try {
    if (options.start) {
      await service.start();
    }
    return await task(service);
  } finally {
    await service.shutdown();
  }
}

function runAgent(config: Env, logger: Logger): Promise<number> {
  const { service } = createContainer(config, logger);

  return new Promise<number>((resolve) => {
    let running: RunningAgent | null = null;
    let shuttingDown = false;

    const shutdown = async (reason: string): Promise<void> => {
      if (shuttingDown) {
        logger.warn({ reason }, "Shutdown already in progress");
        return;
      }
      shuttingDown = true;
      logger.info({ reason }, "Shutting down");

      try {
        // Before start() resolves only the browser session needs closing
        await (running ? running.stop() : service.shutdown());
        resolve(0);
      } catch (err) {
        logger.error({ err }, "Error during shutdown");
        resolve(1);
      }
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    logger.info(
      { controlPort: config.CONTROL_PORT, logLevel: config.LOG_LEVEL },
      "Starting punch agent"
    );

    startAgent({
      service,
      logger,
      controlPort: config.CONTROL_PORT,
      tickIntervalMs: config.TICK_INTERVAL_SECONDS * 1000,
      onQuit: () => shutdown("quit"),
    }).then(
      (agent) => {
        running = agent;
      },
      (err: unknown) => {
        logger.fatal({ err }, "Agent failed to start");
        resolve(1);
      }
    );
  });
}

/** Resolves once earlier writes to a piped stdout have been handed off. */
function drainStdout(): Promise<void> {
  return new Promise((resolve) => {
    process.stdout.write("", () => resolve());
  });
}

async function main(): Promise<number> {
  const config = env();
  const logger = makeLogger({
    level: config.LOG_LEVEL,
    serviceName: config.SERVICE_NAME,
    logFile: config.PUNCH_LOG_FILE,
  });

  const code = await runCli(process.argv.slice(2), {
    client: new ControlClient(config.CONTROL_PORT),
    runLocal: (task, options) => runLocal(config, logger, task, options),
    runAgent: () => runAgent(config, logger),
    invocation: currentInvocation(),
    io: {
      out: (text) => process.stdout.write(text),
      err: (text) => process.stderr.write(text),
    },
  });
  await drainStdout();
  return code;
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main().then(
  (code) => {
    flushLogger();
    process.exit(code);
  },
  (err: unknown) => {
    if (isEnvValidationError(err)) {
      process.stderr.write(`${err.message}\n`);
    }
    bootLogger.fatal({ err }, "Fatal error");
    flushLogger();
    process.exit(1);
  }
);
