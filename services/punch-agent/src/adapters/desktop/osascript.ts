// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/desktop/osascript`
 * Purpose: macOS notifications, alerts and text dialogs through `osascript`.
 * Scope: AppleScript generation, escaping, dialog output parsing. Does not run on other platforms.
 * Invariants:
 * - Every interpolated string goes through appleScriptString()
 * - A cancelled dialog (AppleScript error -128) resolves null, any other failure rejects
 * - Notification failures are logged, never thrown into the caller's operation
 * Side-effects: IO (spawns osascript)
 * Links: packages/punch-core/src/ports/desktop.port.ts
 * @internal
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import {
  NOTIFICATION_TITLE,
  type NotifierPort,
  type PrompterPort,
  type PromptRequest,
} from "@gusto-punch/core";

import type { Logger } from "../../observability/logger.js";

const execFileAsync = promisify(execFile);

export type OsascriptRunner = (script: string) => Promise<string>;

export const runOsascript: OsascriptRunner = async (script) => {
  const { stdout } = await execFileAsync("osascript", ["-e", script]);
  return stdout;
};

/** Modal alerts dismiss themselves after this many seconds. */
const ALERT_GIVE_UP_SECONDS = 120;

export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function notificationScript(subtitle: string, message: string): string {
  return `display notification ${appleScriptString(message)} with title ${appleScriptString(NOTIFICATION_TITLE)} subtitle ${appleScriptString(subtitle)}`;
}

export function alertScript(message: string): string {
  return `display alert ${appleScriptString(NOTIFICATION_TITLE)} message ${appleScriptString(message)} giving up after ${ALERT_GIVE_UP_SECONDS}`;
}

export function dialogScript(request: PromptRequest): string {
  const ok = appleScriptString(request.okLabel);
  const parts = [
    `display dialog ${appleScriptString(request.message)}`,
    `default answer ""`,
    `with title ${appleScriptString(request.title)}`,
    `buttons {"Cancel", ${ok}}`,
    `default button ${ok}`,
    `cancel button "Cancel"`,
  ];
  if (request.secure) {
    parts.push("with hidden answer");
  }
  return parts.join(" ");
}

/** Extracts the typed text from `display dialog` output. */
export function parseDialogOutput(stdout: string): string | null {
  const match = /text returned:([\s\S]*)$/.exec(stdout.trimEnd());
  return match?.[1] === undefined ? null : match[1].trim();
}

function isUserCancelled(error: unknown): boolean {
  return (
    error instanceof Error &&
    "stderr" in error &&
    typeof error.stderr === "string" &&
    error.stderr.includes("(-128)")
  );
}

export class OsascriptNotifier implements NotifierPort {
  constructor(
    private readonly logger: Logger,
    private readonly run: OsascriptRunner = runOsascript
  ) {}

  async notify(subtitle: string, message: string): Promise<void> {
    await this.exec(notificationScript(subtitle, message));
  }

  async alert(message: string): Promise<void> {
    await this.exec(alertScript(message));
  }

  private async exec(script: string): Promise<void> {
    try {
      await this.run(script);
    } catch (err) {
      this.logger.warn({ err }, "osascript notification failed");
    }
  }
}

export class OsascriptPrompter implements PrompterPort {
  constructor(private readonly run: OsascriptRunner = runOsascript) {}

  async ask(request: PromptRequest): Promise<string | null> {
    try {
      return parseDialogOutput(await this.run(dialogScript(request)));
    } catch (err) {
      if (isUserCancelled(err)) {
        return null;
      }
      throw err;
    }
  }
}
