// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/bootstrap/container`
 * Purpose: Composition root: wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns a PunchService typed against ports.
 * Invariants:
 * - Only file that imports concrete adapters
 * - Prompter: terminal when stdin is a TTY, osascript dialogs on macOS, otherwise non-interactive
 * - Notifier: osascript on macOS, stderr lines elsewhere
 * Side-effects: none until the service is started
 * Links: services/punch-agent/src/adapters/index.ts
 * @internal
 */

import {
  type NotifierPort,
  type PrompterPort,
  PunchService,
} from "@gusto-punch/core";

import {
  ConsoleNotifier,
  JsonCredentialStore,
  JsonTimerStateStore,
  NonInteractivePrompter,
  OsascriptNotifier,
  OsascriptPrompter,
  PlaywrightPortalDriver,
  SystemClock,
  TerminalPrompter,
} from "../adapters/index.js";
import type { Logger } from "../observability/logger.js";
import type { Env } from "./env.js";

export interface HostInfo {
  readonly platform: NodeJS.Platform;
  /** stdin is attached to a terminal */
  readonly interactive: boolean;
}

export interface ServiceContainer {
  service: PunchService;
  notifier: NotifierPort;
  prompter: PrompterPort;
  logger: Logger;
}

export function currentHost(): HostInfo {
  return {
    platform: process.platform,
    interactive: process.stdin.isTTY === true,
  };
}

export function selectNotifier(host: HostInfo, logger: Logger): NotifierPort {
  return host.platform === "darwin"
    ? new OsascriptNotifier(logger.child({ component: "notifier" }))
    : new ConsoleNotifier();
}

export function selectPrompter(host: HostInfo, logger: Logger): PrompterPort {
  if (host.interactive) {
    return new TerminalPrompter();
  }
  if (host.platform === "darwin") {
    return new OsascriptPrompter();
  }
  return new NonInteractivePrompter(logger.child({ component: "prompter" }));
}

/**
 * Build the service container from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(
  config: Env,
  logger: Logger,
  host: HostInfo = currentHost()
): ServiceContainer {
  const notifier = selectNotifier(host, logger);
  const prompter = selectPrompter(host, logger);

  const driver = new PlaywrightPortalDriver(
    {
      baseUrl: config.PORTAL_BASE_URL,
      profileDir: config.PUNCH_PROFILE_DIR,
      channel: config.BROWSER_CHANNEL,
      executablePath: config.BROWSER_EXECUTABLE_PATH,
      headless: config.BROWSER_HEADLESS,
    },
    logger.child({ component: "portal-driver" })
  );

  const service = new PunchService({
    driver,
    credentials: new JsonCredentialStore(config.PUNCH_CONFIG_FILE),
    timer: new JsonTimerStateStore(config.PUNCH_TIMER_FILE),
    notifier,
    prompter,
    clock: new SystemClock(),
    logger,
  });

  return { service, notifier, prompter, logger };
}
