// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/services/punch-service`
 * Purpose: Owns clock state and the single portal session; orchestrates setup, status checks and punches.
 * Scope: Pure orchestration over ports. Does not know selectors, file paths or the menu surface format.
 * Invariants:
 * - Every operation that touches the browser runs through one SerialExecutor
 * - status matches the last successful punch or detection
 * - status "out" | "unknown" after detection persists clockedInAt = null
 * - The elapsed label only advances on tick() or a state change
 * Side-effects: none directly (IO via injected ports)
 * Links: packages/punch-core/src/ports/, services/punch-agent/src/bootstrap/container.ts
 * @public
 */

import { errorMessage, type LoggerLike } from "../logger.js";
import { buildMenuView, isActionEnabled, type MenuView } from "../menu.js";
import type { Clock } from "../ports/clock.port.js";
import type { NotifierPort, PrompterPort } from "../ports/desktop.port.js";
import type {
  PortalDriverPort,
  PortalSession,
} from "../ports/portal-driver.port.js";
import {
  type CredentialStorePort,
  isCredentialFileError,
  type TimerStatePort,
} from "../ports/storage.port.js";
import { SerialExecutor } from "../serial-executor.js";
import type { ClockStatus, Credentials, PunchAction } from "../types.js";

export interface PunchServiceDeps {
  driver: PortalDriverPort;
  credentials: CredentialStorePort;
  timer: TimerStatePort;
  notifier: NotifierPort;
  prompter: PrompterPort;
  clock: Clock;
  logger: LoggerLike;
}

export type ClockOutcome =
  | "punched"
  | "already"
  | "disabled"
  | "not_configured"
  | "session_failed"
  | "button_missing"
  | "failed";

export type StatusOutcome = "ok" | "not_configured" | "session_failed" | "failed";

export type SetupOutcome =
  | "configured"
  | "cancelled"
  | "invalid_input"
  | "login_failed"
  | "failed";

export type RestartOutcome = "ok" | "session_failed";

export interface PunchSnapshot {
  readonly status: ClockStatus;
  /** ISO 8601, null unless clocked in */
  readonly clockedInAt: string | null;
  readonly configured: boolean;
  readonly view: MenuView;
}

export interface OperationResult<O extends string> {
  readonly outcome: O;
  readonly snapshot: PunchSnapshot;
}

const SETUP_TITLE = "Gusto Punch Setup";

export class PunchService {
  private readonly executor = new SerialExecutor();
  private readonly log: LoggerLike;

  private status: ClockStatus = "unknown";
  private clockedInAt: Date | null = null;
  private credentials: Credentials | null = null;
  private session: PortalSession | null = null;
  private view: MenuView;

  constructor(private readonly deps: PunchServiceDeps) {
    this.log = deps.logger.child({ component: "punch-service" });
    this.view = this.computeView();
  }

  /**
   * Loads persisted state, then runs setup (unconfigured) or opens the session.
   */
  async start(): Promise<void> {
    this.credentials = await this.loadCredentials();
    this.clockedInAt = await this.loadTimer();
    this.refreshView();

    if (!this.credentials) {
      await this.setup();
      return;
    }
    await this.executor.run(() => this.initSession());
  }

  isConfigured(): boolean {
    return this.credentials !== null;
  }

  snapshot(): PunchSnapshot {
    return {
      status: this.status,
      clockedInAt: this.clockedInAt?.toISOString() ?? null,
      configured: this.isConfigured(),
      view: this.view,
    };
  }

  /** Periodic timer hook: advances the elapsed label. */
  tick(): MenuView {
    this.refreshView();
    return this.view;
  }

  checkStatus(): Promise<OperationResult<StatusOutcome>> {
    return this.executor.run(async () => {
      if (!this.credentials) {
        return this.result("not_configured");
      }

      const session = await this.initSession();
      if (!session) {
        await this.deps.notifier.notify(
          "Error",
          "Failed to initialize browser session"
        );
        return this.result("session_failed");
      }

      try {
        await session.openDashboard();
        await this.applyDetectedStatus(await session.detectStatus());
      } catch (err) {
        this.log.error({ err }, "Error checking status");
        this.status = "unknown";
        this.refreshView();
        await this.closeSession();
        await this.initSession();
        return this.result("failed");
      }

      await this.deps.notifier.notify(
        "Status",
        `Currently clocked ${this.status}`
      );
      return this.result("ok");
    });
  }

  clockIn(): Promise<OperationResult<ClockOutcome>> {
    return this.clock("in");
  }

  clockOut(): Promise<OperationResult<ClockOutcome>> {
    return this.clock("out");
  }

  clock(action: PunchAction): Promise<OperationResult<ClockOutcome>> {
    return this.executor.run(async () => {
      if (!isActionEnabled(this.status, action)) {
        await this.deps.notifier.notify("Info", `Already clocked ${action}`);
        return this.result("disabled");
      }

      if (!this.credentials) {
        await this.deps.notifier.alert("Please complete setup first");
        return this.result("not_configured");
      }

      await this.deps.notifier.notify("Status", `Clocking ${action}...`);

      const session = await this.initSession();
      if (!session) {
        await this.deps.notifier.notify(
          "Error",
          "Failed to initialize browser session"
        );
        return this.result("session_failed");
      }

      try {
        const outcome = await session.punch(action);

        if (outcome === "punched") {
          this.status = action;
          this.clockedInAt = action === "in" ? this.deps.clock.now() : null;
          await this.persistTimer();
          this.refreshView();
          this.log.info({ action }, "Punch recorded");
          await this.deps.notifier.notify(
            "Success",
            `Clocked ${action} successfully`
          );
          return this.result("punched");
        }

        // Fresh login may have detected the status the user asked for
        if (this.status === action) {
          await this.deps.notifier.notify("Info", `Already clocked ${action}`);
          return this.result("already");
        }

        this.log.warn({ action }, "Punch button not found");
        await this.deps.notifier.alert(`Could not find clock ${action} button`);
        await this.restartSessionUnlocked();
        return this.result("button_missing");
      } catch (err) {
        this.log.error({ err, action }, "Error clocking");
        await this.deps.notifier.alert(
          `Error clocking ${action}: ${errorMessage(err)}`
        );
        await this.closeSession();
        await this.initSession();
        return this.result("failed");
      }
    });
  }

  /**
   * Prompts for credentials, stores them and verifies them with a fresh login.
   */
  setup(): Promise<OperationResult<SetupOutcome>> {
    return this.executor.run(async () => {
      const email = await this.deps.prompter.ask({
        title: SETUP_TITLE,
        message: "Please enter your Gusto email:",
        okLabel: "Next",
      });
      if (email === null) {
        return this.result("cancelled");
      }

      const password = await this.deps.prompter.ask({
        title: SETUP_TITLE,
        message: "Please enter your Gusto password:",
        okLabel: "Save",
        secure: true,
      });
      if (password === null) {
        return this.result("cancelled");
      }

      if (!email || !password) {
        await this.deps.notifier.alert("Email and password are required");
        return this.result("invalid_input");
      }

      const credentials: Credentials = { email, password };
      try {
        await this.deps.credentials.save(credentials);
      } catch (err) {
        this.log.error({ err }, "Error saving configuration");
        await this.deps.notifier.alert(
          `Error saving configuration: ${errorMessage(err)}`
        );
        return this.result("failed");
      }
      this.credentials = credentials;
      this.refreshView();

      await this.closeSession();
      const session = await this.initSession();
      if (!session) {
        await this.deps.notifier.alert(
          "Could not verify successful login. Please check your credentials."
        );
        return this.result("login_failed");
      }

      await this.deps.notifier.alert(
        "Setup complete! You can now use the app to clock in and out."
      );
      return this.result("configured");
    });
  }

  restartSession(): Promise<OperationResult<RestartOutcome>> {
    return this.executor.run(async () =>
      this.result(await this.restartSessionUnlocked())
    );
  }

  shutdown(): Promise<void> {
    return this.executor.run(() => this.closeSession());
  }

  private async restartSessionUnlocked(): Promise<RestartOutcome> {
    await this.closeSession();
    const session = await this.initSession();
    await this.deps.notifier.notify(
      "Session",
      session ? "Browser session restarted" : "Failed to restart browser session"
    );
    return session ? "ok" : "session_failed";
  }

  /**
   * Reuses a live session or opens and logs in a new one.
   * Must only be called from inside the executor.
   */
  private async initSession(): Promise<PortalSession | null> {
    if (this.session) {
      if (await this.session.isAlive()) {
        this.log.debug({}, "Existing browser session is still active");
        return this.session;
      }
      this.log.warn({}, "Existing browser session is stale, creating new one");
      await this.closeSession();
    }

    const credentials = this.credentials;
    if (!credentials) {
      return null;
    }

    this.log.info({}, "Initializing new browser session");
    let session: PortalSession;
    try {
      session = await this.deps.driver.open();
    } catch (err) {
      this.log.error({ err }, "Error initializing browser session");
      return null;
    }
    this.session = session;

    try {
      const login = await session.login(credentials, () =>
        this.requestVerificationCode()
      );
      if (!login.ok) {
        this.log.error({ reason: login.reason }, "Login failed");
        await this.closeSession();
        return null;
      }
      this.log.info(
        { alreadyLoggedIn: login.alreadyLoggedIn },
        "Login successful, browser session initialized"
      );
      await this.applyDetectedStatus(await session.detectStatus());
      return session;
    } catch (err) {
      this.log.error({ err }, "Error during login");
      await this.closeSession();
      return null;
    }
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    await session.close();
    this.log.info({}, "Browser session closed");
  }

  private requestVerificationCode(): Promise<string | null> {
    return this.deps.prompter.ask({
      title: "Gusto 2FA",
      message: "Please enter your 6-digit verification code:",
      okLabel: "Submit",
    });
  }

  private async applyDetectedStatus(status: ClockStatus): Promise<void> {
    this.status = status;
    if (status === "in") {
      if (!this.clockedInAt) {
        this.clockedInAt = this.deps.clock.now();
        await this.persistTimer();
      }
    } else {
      this.clockedInAt = null;
      await this.persistTimer();
    }
    this.refreshView();
    this.log.info({ status }, "Clock status detected");
  }

  private async loadCredentials(): Promise<Credentials | null> {
    try {
      return await this.deps.credentials.load();
    } catch (err) {
      this.log.error({ err }, "Error loading configuration");
      const message = isCredentialFileError(err)
        ? err.message
        : `Error loading configuration: ${errorMessage(err)}`;
      await this.deps.notifier.alert(message);
      return null;
    }
  }

  private async loadTimer(): Promise<Date | null> {
    let loaded: Date | null;
    try {
      loaded = await this.deps.timer.load();
    } catch (err) {
      this.log.error({ err }, "Error loading timer state");
      return null;
    }
    if (loaded && Number.isNaN(loaded.getTime())) {
      this.log.error({}, "Ignoring invalid stored clock-in time");
      return null;
    }
    return loaded;
  }

  private async persistTimer(): Promise<void> {
    try {
      await this.deps.timer.save(this.clockedInAt);
    } catch (err) {
      this.log.error({ err }, "Error saving timer state");
    }
  }

  private refreshView(): void {
    this.view = this.computeView();
  }

  private computeView(): MenuView {
    return buildMenuView(
      { status: this.status, clockedInAt: this.clockedInAt },
      this.isConfigured(),
      this.deps.clock.now()
    );
  }

  private result<O extends string>(outcome: O): OperationResult<O> {
    return { outcome, snapshot: this.snapshot() };
  }
}
