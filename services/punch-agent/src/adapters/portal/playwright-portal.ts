// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/adapters/portal/playwright-portal`
 * Purpose: PortalDriverPort over a persistent Chromium context (playwright-core).
 * Scope: Login flow, status detection and punches against the portal DOM. Does not own clock state.
 * Invariants:
 * - playwright-core never downloads a browser; an installed channel or explicit executable is used
 * - Waits that time out are expected outcomes; any other driver error propagates
 * - close() is idempotent and never throws
 * Side-effects: IO (spawns a browser, network to the portal, writes the profile directory)
 * Links: packages/punch-core/src/ports/portal-driver.port.ts, ./selectors.ts
 * @internal
 */

import { mkdir } from "node:fs/promises";

import {
  type ClockStatus,
  type Credentials,
  errorMessage,
  type LoginResult,
  type PortalDriverPort,
  PortalLaunchError,
  type PortalSession,
  type PunchAction,
  type PunchOutcome,
  type VerificationCodeSource,
} from "@gusto-punch/core";
import {
  type BrowserContext,
  chromium,
  errors,
  type Locator,
  type Page,
} from "playwright-core";

import type { Logger } from "../../observability/logger.js";
import {
  CLOCK_BUTTON,
  DEFAULT_TIMEOUTS,
  DESKTOP_USER_AGENT,
  HIDE_WEBDRIVER_SCRIPT,
  PORTAL_PATHS,
  type PortalTimeouts,
  SELECTORS,
} from "./selectors.js";

export interface PlaywrightPortalConfig {
  readonly baseUrl: string;
  readonly profileDir: string;
  readonly channel: string;
  /** Overrides channel when set */
  readonly executablePath?: string;
  readonly headless: boolean;
  readonly timeouts?: Partial<PortalTimeouts>;
}

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-extensions",
  "--disable-gpu",
  "--disable-dev-shm-usage",
  "--no-sandbox",
];

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

export class PlaywrightPortalDriver implements PortalDriverPort {
  private readonly timeouts: PortalTimeouts;

  constructor(
    private readonly config: PlaywrightPortalConfig,
    private readonly logger: Logger
  ) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...config.timeouts };
  }

  async open(): Promise<PortalSession> {
    const { profileDir, channel, executablePath, headless } = this.config;

    let context: BrowserContext;
    try {
      await mkdir(profileDir, { recursive: true });
      context = await chromium.launchPersistentContext(profileDir, {
        ...(executablePath ? { executablePath } : { channel }),
        headless,
        viewport: { width: 1920, height: 1080 },
        userAgent: DESKTOP_USER_AGENT,
        ignoreHTTPSErrors: true,
        args: LAUNCH_ARGS,
        ignoreDefaultArgs: ["--enable-automation"],
      });
    } catch (err) {
      throw new PortalLaunchError(errorMessage(err), err);
    }

    let page: Page;
    try {
      await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);
      page = context.pages()[0] ?? (await context.newPage());
      page.setDefaultNavigationTimeout(this.timeouts.navigation);
    } catch (err) {
      // release the profile lock before reporting
      await context.close().catch((closeErr: unknown) => {
        this.logger.warn(
          { err: closeErr },
          "Error closing browser context after failed setup"
        );
      });
      throw new PortalLaunchError(errorMessage(err), err);
    }

    this.logger.info({ profileDir, headless }, "Browser context launched");
    return new PlaywrightPortalSession(
      context,
      page,
      this.config.baseUrl,
      this.timeouts,
      this.logger.child({ component: "portal-session" })
    );
  }
}

export class PlaywrightPortalSession implements PortalSession {
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly baseUrl: string,
    private readonly timeouts: PortalTimeouts,
    private readonly logger: Logger
  ) {
    context.on("close", () => {
      this.closed = true;
    });
  }

  async isAlive(): Promise<boolean> {
    if (this.closed || this.page.isClosed()) {
      return false;
    }
    try {
      await this.page.evaluate("document.readyState");
      return true;
    } catch (err) {
      this.logger.warn({ err }, "Browser session is not responding");
      return false;
    }
  }

  async login(
    credentials: Credentials,
    requestCode: VerificationCodeSource
  ): Promise<LoginResult> {
    const t = this.timeouts;
    this.logger.info({}, "Starting login process");
    await this.page.goto(this.url(PORTAL_PATHS.login));

    if (await this.waitFor(SELECTORS.anyClockButton, t.alreadyLoggedIn)) {
      this.logger.info({}, "Already logged in");
      return { ok: true, alreadyLoggedIn: true };
    }

    await this.page.waitForLoadState("domcontentloaded");
    this.logger.debug({ url: this.page.url() }, "Login page interactive");

    const email = await this.waitFor(SELECTORS.emailInput, t.emailField);
    if (email) {
      await email.fill(credentials.email);
      await this.submit();
      await this.page.waitForTimeout(t.settle);
      this.logger.info({}, "Submitted email, proceeding to password");
    } else {
      this.logger.info({}, "No email field found, assuming returning user flow");
    }

    const password = await this.waitFor(
      SELECTORS.passwordInput,
      t.passwordField
    );
    if (!password) {
      return { ok: false, reason: "no_password_field" };
    }
    await password.fill(credentials.password);
    await this.tickRememberCheckbox();
    await this.submit();

    const codeInput = await this.waitFor(
      SELECTORS.codeInput,
      t.verificationField
    );
    if (codeInput) {
      this.logger.info({}, "Verification code required");
      const code = await requestCode();
      if (code === null) {
        return { ok: false, reason: "verification_cancelled" };
      }
      if (!code) {
        return { ok: false, reason: "verification_empty" };
      }
      await codeInput.fill(code);
      await this.tickRememberCheckbox();
      await this.submit();
    }

    await this.handleRememberDevicePage();

    if (await this.waitFor(SELECTORS.anyClockButton, t.loginVerified)) {
      this.logger.info({}, "Successfully logged in");
      return { ok: true, alreadyLoggedIn: false };
    }
    return { ok: false, reason: "not_verified" };
  }

  async openDashboard(): Promise<void> {
    await this.page.goto(this.url(PORTAL_PATHS.dashboard));
    await this.page.waitForLoadState("load", {
      timeout: this.timeouts.navigation,
    });
  }

  detectStatus(): Promise<ClockStatus> {
    return this.detect(true);
  }

  async punch(action: PunchAction): Promise<PunchOutcome> {
    await this.page.goto(this.url(PORTAL_PATHS.dashboard));
    await this.handleRememberDevicePage();

    const selector = CLOCK_BUTTON[action];
    const button = await this.waitFor(selector, this.timeouts.punchButton);
    if (!button) {
      return "button_missing";
    }
    await button.click();

    try {
      await button.waitFor({
        state: "hidden",
        timeout: this.timeouts.punchButton,
      });
    } catch (err) {
      if (!isTimeout(err)) {
        throw err;
      }
      this.logger.warn({ action }, "Clock button still visible after click");
      return "button_missing";
    }
    return "punched";
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.context.close();
    } catch (err) {
      this.logger.warn({ err }, "Error closing browser context");
    }
  }

  private async detect(allowRetry: boolean): Promise<ClockStatus> {
    const t = this.timeouts;
    // A visible Clock in button means the user is currently out
    if (await this.waitFor(CLOCK_BUTTON.in, t.statusButton)) {
      return "out";
    }
    if (await this.waitFor(CLOCK_BUTTON.out, t.statusButton)) {
      return "in";
    }
    if (allowRetry && (await this.handleRememberDevicePage())) {
      return this.detect(false);
    }
    return "unknown";
  }

  private async handleRememberDevicePage(): Promise<boolean> {
    try {
      const button = await this.waitFor(
        SELECTORS.rememberDeviceButton,
        this.timeouts.rememberDevicePage
      );
      if (!button) {
        return false;
      }
      this.logger.info({}, "Found 'Remember this device' button, clicking it");
      await button.click();
      await this.page.waitForTimeout(this.timeouts.settle);
      return true;
    } catch (err) {
      this.logger.error({ err }, "Error handling remember device page");
      return false;
    }
  }

  private async tickRememberCheckbox(): Promise<void> {
    const checkbox = await this.waitFor(
      SELECTORS.rememberCheckbox,
      this.timeouts.rememberCheckbox,
      "attached"
    );
    if (!checkbox) {
      return;
    }
    if (!(await checkbox.isChecked())) {
      await checkbox.check({ force: true });
      this.logger.info({}, "Selected 'Remember this device' checkbox");
    }
  }

  private async submit(): Promise<void> {
    const button = await this.waitFor(
      SELECTORS.submitButton,
      this.timeouts.passwordField
    );
    if (!button) {
      throw new Error("Submit button not found on login page");
    }
    await button.click();
  }

  /** Resolves the first match once it reaches `state`, or null on timeout. */
  private async waitFor(
    selector: string,
    timeout: number,
    state: "visible" | "attached" = "visible"
  ): Promise<Locator | null> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state, timeout });
      return locator;
    } catch (err) {
      if (isTimeout(err)) {
        return null;
      }
      throw err;
    }
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }
}
