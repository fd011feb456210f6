// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/menubar/render`
 * Purpose: Renders the menu view as xbar / SwiftBar plugin output.
 * Scope: Text formatting only. Does not fetch state or run commands.
 * Invariants:
 * - First line is the menu-bar title; `---` separates sections
 * - Disabled clock actions are grey and carry no command
 * - Every command re-invokes this CLI with one subcommand and refreshes the plugin
 * Side-effects: none
 * Notes: Line format is `label | key=value ...`; values with spaces or quotes are double-quoted.
 * Links: https://github.com/matryer/xbar-plugins/blob/main/CONTRIBUTING.md
 * @public
 */

import {
  type FixedMenuItemId,
  type MenuView,
  type PunchAction,
  statusTitle,
} from "@gusto-punch/core";

/** How the menu plugin should launch this CLI. */
export interface CliInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

export const CLI_COMMAND_BY_ITEM: Readonly<Record<FixedMenuItemId, string>> = {
  "check-status": "status",
  setup: "setup",
  "restart-session": "restart",
  quit: "quit",
};

const ACTION_LABEL: Readonly<Record<PunchAction, string>> = {
  in: "Clock In",
  out: "Clock Out",
};

const SEPARATOR = "---";

function quote(value: string): string {
  return /[\s"|]/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value;
}

export function commandParams(
  invocation: CliInvocation,
  subcommand: string
): string {
  const params = [...invocation.args, subcommand].map(
    (arg, index) => `param${index + 1}=${quote(arg)}`
  );
  return [
    `shell=${quote(invocation.command)}`,
    ...params,
    "terminal=false",
    "refresh=true",
  ].join(" ");
}

function commandLine(
  label: string,
  invocation: CliInvocation,
  subcommand: string
): string {
  return `${label} | ${commandParams(invocation, subcommand)}`;
}

export function renderMenu(view: MenuView, invocation: CliInvocation): string {
  const lines: string[] = [view.title, SEPARATOR];

  for (const action of ["in", "out"] as const) {
    lines.push(
      view.actions[action]
        ? commandLine(ACTION_LABEL[action], invocation, action)
        : `${ACTION_LABEL[action]} | color=gray`
    );
  }

  lines.push(SEPARATOR, view.elapsedLabel);
  if (!view.configured) {
    lines.push("Setup required | color=red");
  }

  lines.push(SEPARATOR);
  for (const item of view.items) {
    lines.push(commandLine(item.label, invocation, CLI_COMMAND_BY_ITEM[item.id]));
  }

  return `${lines.join("\n")}\n`;
}

/** Output when the agent cannot be reached. */
export function renderOffline(invocation: CliInvocation): string {
  return `${[
    statusTitle("unknown"),
    SEPARATOR,
    "Punch agent not running | color=gray",
    commandLine("Start Agent", invocation, "run"),
  ].join("\n")}\n`;
}
