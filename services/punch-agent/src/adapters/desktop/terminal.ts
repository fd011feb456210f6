// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/desktop/terminal`
 * Purpose: Notifier and prompter for terminals and non-macOS hosts.
 * Scope: Line prompts over readline with muted echo for secrets; notifications as stderr lines.
 * Invariants:
 * - Closing input (Ctrl+D) or Ctrl+C resolves a prompt as cancelled (null)
 * - Notifications never go to stdout
 * Side-effects: IO (reads stdin, writes stderr)
 * @internal
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

import {
  NOTIFICATION_TITLE,
  type NotifierPort,
  type PrompterPort,
  type PromptRequest,
} from "@gusto-punch/core";

import type { Logger } from "../../observability/logger.js";

export class ConsoleNotifier implements NotifierPort {
  constructor(
    private readonly out: NodeJS.WritableStream = process.stderr
  ) {}

  async notify(subtitle: string, message: string): Promise<void> {
    this.out.write(`[${NOTIFICATION_TITLE}] ${subtitle}: ${message}\n`);
  }

  async alert(message: string): Promise<void> {
    this.out.write(`[${NOTIFICATION_TITLE}] ${message}\n`);
  }
}

/** Forwards writes to `target` unless muted. */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export class TerminalPrompter implements PrompterPort {
  constructor(
    private readonly input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    private readonly target: NodeJS.WritableStream = process.stderr
  ) {}

  async ask(request: PromptRequest): Promise<string | null> {
    const output = new MutableOutput(this.target);
    const rl = createInterface({
      input: this.input,
      output,
      terminal: this.input.isTTY === true,
    });
    const closed = new Promise<null>((resolve) => {
      rl.once("close", () => resolve(null));
    });
    rl.once("SIGINT", () => rl.close());

    try {
      output.write(`${request.title}\n`);
      // A rejected question (aborted readline) counts as cancelled
      const question = rl.question(`${request.message} `).then(
        (answer) => answer,
        () => null
      );
      output.muted = request.secure === true;
      const answer = await Promise.race([question, closed]);
      return answer === null ? null : answer.trim();
    } finally {
      if (output.muted) {
        output.muted = false;
        output.write("\n");
      }
      rl.close();
    }
  }
}

/**
 * Used when there is neither a terminal nor a dialog host; every prompt is cancelled.
 */
export class NonInteractivePrompter implements PrompterPort {
  constructor(private readonly logger: Logger) {}

  async ask(request: PromptRequest): Promise<string | null> {
    this.logger.warn(
      { title: request.title },
      "Prompt needs an interactive terminal; run `gusto-punch setup` from a shell"
    );
    return null;
  }
}
