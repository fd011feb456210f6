// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/cli/commands`
 * Purpose: Subcommand dispatch for the `gusto-punch` CLI.
 * Scope: Routes each command to the running agent, or to a one-shot local service when none answers.
 * Invariants:
 * - `menu` always exits 0 and always prints plugin output (offline menu when the agent is down)
 * - Exit code 0 when the requested state holds afterwards, 1 otherwise
 * - Only `run` starts a long-lived agent
 * Side-effects: IO (writes to the injected streams; agent or browser via deps)
 * Links: services/punch-agent/src/main.ts, services/punch-agent/src/cli/client.ts
 * @internal
 */

import { parseArgs } from "node:util";

import {
  errorMessage,
  type OperationResult,
  type PunchService,
  type PunchSnapshot,
} from "@gusto-punch/core";

import type { ActionRoute } from "../control-server.js";
import {
  type CliInvocation,
  renderMenu,
  renderOffline,
} from "../menubar/render.js";
import type { ActionResponse } from "./client.js";

export interface AgentClient {
  snapshot(): Promise<PunchSnapshot | null>;
  action(route: ActionRoute): Promise<ActionResponse | null>;
  quit(): Promise<boolean>;
}

export interface LocalRunOptions {
  /** Load state and open the session before the task */
  start: boolean;
}

/** Runs a task against a short-lived in-process service, then shuts it down. */
export type LocalRunner = <O extends string>(
  task: (service: PunchService) => Promise<OperationResult<O>>,
  options: LocalRunOptions
) => Promise<OperationResult<O>>;

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  client: AgentClient;
  runLocal: LocalRunner;
  /** Starts the long-running agent; resolves with its exit code once it stops */
  runAgent: () => Promise<number>;
  invocation: CliInvocation;
  io: CliIo;
}

interface ServiceCommand {
  route: ActionRoute;
  task: (service: PunchService) => Promise<OperationResult<string>>;
  start: boolean;
}

const SERVICE_COMMANDS: ReadonlyMap<string, ServiceCommand> = new Map<
  string,
  ServiceCommand
>([
  ["in", { route: "/clock-in", task: (s) => s.clockIn(), start: true }],
  ["out", { route: "/clock-out", task: (s) => s.clockOut(), start: true }],
  [
    "status",
    { route: "/check-status", task: (s) => s.checkStatus(), start: true },
  ],
  [
    "restart",
    { route: "/restart-session", task: (s) => s.restartSession(), start: true },
  ],
  // setup replaces credentials, so the local service skips start()
  ["setup", { route: "/setup", task: (s) => s.setup(), start: false }],
]);

const SUCCESS_OUTCOMES: ReadonlySet<string> = new Set([
  "punched",
  "already",
  "disabled",
  "ok",
  "configured",
]);

export const USAGE = `Usage: gusto-punch <command>

Commands:
  run        Start the menu agent (browser session, timer, control server)
  in         Clock in
  out        Clock out
  status     Check the current clock status on the portal
  restart    Restart the browser session
  setup      Enter and verify portal credentials
  menu       Print xbar / SwiftBar plugin output
  quit       Stop the running agent
`;

export function formatSnapshot(snapshot: PunchSnapshot): string {
  const lines = [
    `Status: clocked ${snapshot.status} ${snapshot.view.title}`,
    snapshot.view.elapsedLabel,
  ];
  if (!snapshot.configured) {
    lines.push("Setup required");
  }
  return `${lines.join("\n")}\n`;
}

function exitCodeFor(outcome: string): number {
  return SUCCESS_OUTCOMES.has(outcome) ? 0 : 1;
}

async function runServiceCommand(
  command: ServiceCommand,
  deps: CliDeps
): Promise<number> {
  const remote = await deps.client.action(command.route);
  const result =
    remote ??
    (await deps.runLocal(command.task, { start: command.start }));

  deps.io.out(`Outcome: ${result.outcome}\n${formatSnapshot(result.snapshot)}`);
  return exitCodeFor(result.outcome);
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: { help: { type: "boolean", short: "h" } },
    allowPositionals: true,
  });
}

export async function runCli(
  argv: readonly string[],
  deps: CliDeps
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    deps.io.err(`${errorMessage(err)}\n${USAGE}`);
    return 1;
  }

  const [command, ...extra] = parsed.positionals;
  if (parsed.values.help || command === undefined || command === "help") {
    deps.io.out(USAGE);
    return 0;
  }
  if (extra.length > 0) {
    deps.io.err(`Unexpected arguments: ${extra.join(" ")}\n${USAGE}`);
    return 1;
  }

  switch (command) {
    case "run":
      return deps.runAgent();

    case "menu": {
      let snapshot: PunchSnapshot | null = null;
      try {
        snapshot = await deps.client.snapshot();
      } catch (err) {
        deps.io.err(`Agent status unavailable: ${errorMessage(err)}\n`);
      }
      deps.io.out(
        snapshot
          ? renderMenu(snapshot.view, deps.invocation)
          : renderOffline(deps.invocation)
      );
      return 0;
    }

    case "quit": {
      const stopped = await deps.client.quit();
      deps.io.out(
        stopped ? "Punch agent stopping\n" : "Punch agent is not running\n"
      );
      return 0;
    }
  }

  const serviceCommand = SERVICE_COMMANDS.get(command);
  if (!serviceCommand) {
    deps.io.err(`Unknown command: ${command}\n${USAGE}`);
    return 1;
  }
  return runServiceCommand(serviceCommand, deps);
}
