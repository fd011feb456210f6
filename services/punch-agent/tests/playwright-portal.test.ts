// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/agent/tests/playwright-portal.test`
 * Purpose: Unit tests for the Playwright portal driver against a scripted fake page.
 * Scope: Launch options, login steps, status detection, punches, session liveness and close.
 * Note: Selectors are opaque strings here; real portal markup is not exercised.
 * @internal
 */

import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { isPortalLaunchError, type PortalSession } from "@gusto-punch/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("playwright-core", async () => {
  const fakes = await import("./_fakes/playwright.js");
  return {
    chromium: fakes.fakeChromium,
    errors: { TimeoutError: fakes.FakeTimeoutError },
  };
});

import { PlaywrightPortalDriver } from "../src/adapters/portal/playwright-portal.js";
import {
  CLOCK_BUTTON,
  HIDE_WEBDRIVER_SCRIPT,
  SELECTORS,
} from "../src/adapters/portal/selectors.js";
import { makeNoopLogger } from "../src/observability/logger.js";
import {
  type FakeContext,
  type FakePage,
  launcher,
  resetLauncher,
} from "./_fakes/playwright.js";

const BASE_URL = "https://portal.test";
const CREDENTIALS = { email: "worker@example.com", password: "test-password" };

describe("PlaywrightPortalDriver", () => {
  let workDir: string;
  let profileDir: string;
  let context: FakeContext;
  let page: FakePage;

  const makeDriver = (executablePath?: string) =>
    new PlaywrightPortalDriver(
      {
        baseUrl: BASE_URL,
        profileDir,
        channel: "chrome",
        executablePath,
        headless: true,
      },
      makeNoopLogger()
    );

  const openSession = (): Promise<PortalSession> => makeDriver().open();

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "punch-portal-"));
    profileDir = path.join(workDir, "profile");
    context = resetLauncher();
    page = context.page;
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe("open", () => {
    it("launches a persistent context on the installed channel", async () => {
      await openSession();

      expect(launcher.calls).toHaveLength(1);
      const [call] = launcher.calls;
      expect(call?.profileDir).toBe(profileDir);
      expect(call?.options).toMatchObject({
        channel: "chrome",
        headless: true,
        ignoreDefaultArgs: ["--enable-automation"],
      });
      expect(call?.options).not.toHaveProperty("executablePath");
      expect((await stat(profileDir)).isDirectory()).toBe(true);
      expect(context.initScripts).toEqual([HIDE_WEBDRIVER_SCRIPT]);
      expect(page.navigationTimeout).toBe(30_000);
    });

    it("prefers an explicit executable over the channel", async () => {
      await makeDriver("/opt/chromium/chrome").open();

      const [call] = launcher.calls;
      expect(call?.options).toMatchObject({
        executablePath: "/opt/chromium/chrome",
      });
      expect(call?.options).not.toHaveProperty("channel");
    });

    it("wraps launch failures in PortalLaunchError", async () => {
      launcher.error = new Error("chrome is not installed");

      const error = await openSession().catch((err: unknown) => err);

      expect(isPortalLaunchError(error)).toBe(true);
      expect(error).toHaveProperty(
        "message",
        "Browser session could not be started: chrome is not installed"
      );
    });

    it("closes the context when setup fails after launch", async () => {
      context.initScriptError = new Error("Target page has been closed");

      const error = await openSession().catch((err: unknown) => err);

      expect(isPortalLaunchError(error)).toBe(true);
      expect(error).toHaveProperty(
        "message",
        "Browser session could not be started: Target page has been closed"
      );
      expect(context.closeCalls).toBe(1);
    });

    it("still reports the setup failure when closing the context fails", async () => {
      context.initScriptError = new Error("init failed");
      context.closeError = new Error("Browser has been closed");

      const error = await openSession().catch((err: unknown) => err);

      expect(error).toHaveProperty(
        "message",
        "Browser session could not be started: init failed"
      );
      expect(context.closeCalls).toBe(1);
    });
  });

  describe("login", () => {
    const showLoginForm = () => {
      page.onGoto = (url, p) => {
        if (url === `${BASE_URL}/login`) {
          p.show(SELECTORS.emailInput, SELECTORS.submitButton);
        }
      };
    };

    it("reports an existing session without touching the form", async () => {
      page.onGoto = (_url, p) => p.show(CLOCK_BUTTON.out);
      const session = await openSession();
      const requestCode = vi.fn(async () => "123456");

      const result = await session.login(CREDENTIALS, requestCode);

      expect(result).toEqual({ ok: true, alreadyLoggedIn: true });
      expect(page.gotos).toEqual([`${BASE_URL}/login`]);
      expect(page.fills.size).toBe(0);
      expect(requestCode).not.toHaveBeenCalled();
    });

    it("walks email, password and verification code steps", async () => {
      showLoginForm();
      let submits = 0;
      page.onClick.set(SELECTORS.submitButton, (p) => {
        submits += 1;
        if (submits === 1) {
          p.hide(SELECTORS.emailInput);
          p.show(SELECTORS.passwordInput);
          p.attached.add(SELECTORS.rememberCheckbox);
        } else if (submits === 2) {
          p.hide(SELECTORS.passwordInput);
          p.show(SELECTORS.codeInput);
        } else {
          p.hide(SELECTORS.codeInput);
          p.show(CLOCK_BUTTON.in);
        }
      });
      const session = await openSession();
      const requestCode = vi.fn(async () => "123456");

      const result = await session.login(CREDENTIALS, requestCode);

      expect(result).toEqual({ ok: true, alreadyLoggedIn: false });
      expect(requestCode).toHaveBeenCalledTimes(1);
      expect(page.fills.get(SELECTORS.emailInput)).toBe("worker@example.com");
      expect(page.fills.get(SELECTORS.passwordInput)).toBe("test-password");
      expect(page.fills.get(SELECTORS.codeInput)).toBe("123456");
      expect(page.checked.has(SELECTORS.rememberCheckbox)).toBe(true);
      expect(page.clicks).toEqual([
        SELECTORS.submitButton,
        SELECTORS.submitButton,
        SELECTORS.submitButton,
      ]);
    });

    it("skips the code prompt when no verification is asked", async () => {
      showLoginForm();
      let submits = 0;
      page.onClick.set(SELECTORS.submitButton, (p) => {
        submits += 1;
        if (submits === 1) {
          p.hide(SELECTORS.emailInput);
          p.show(SELECTORS.passwordInput);
        } else {
          p.hide(SELECTORS.passwordInput);
          p.show(CLOCK_BUTTON.out);
        }
      });
      const session = await openSession();
      const requestCode = vi.fn(async () => "123456");

      const result = await session.login(CREDENTIALS, requestCode);

      expect(result).toEqual({ ok: true, alreadyLoggedIn: false });
      expect(requestCode).not.toHaveBeenCalled();
      expect(page.checked.size).toBe(0);
    });

    it("fails when no password field appears", async () => {
      showLoginForm();
      const session = await openSession();

      const result = await session.login(CREDENTIALS, async () => "123456");

      expect(result).toEqual({ ok: false, reason: "no_password_field" });
    });

    it.each([
      [null, "verification_cancelled"],
      ["", "verification_empty"],
    ] as const)(
      "fails when the verification prompt returns %j",
      async (answer, reason) => {
        showLoginForm();
        let submits = 0;
        page.onClick.set(SELECTORS.submitButton, (p) => {
          submits += 1;
          if (submits === 1) {
            p.hide(SELECTORS.emailInput);
            p.show(SELECTORS.passwordInput);
          } else {
            p.hide(SELECTORS.passwordInput);
            p.show(SELECTORS.codeInput);
          }
        });
        const session = await openSession();

        const result = await session.login(CREDENTIALS, async () => answer);

        expect(result).toEqual({ ok: false, reason });
        expect(page.fills.has(SELECTORS.codeInput)).toBe(false);
      }
    );

    it("fails when no clock button appears after submitting", async () => {
      showLoginForm();
      page.onClick.set(SELECTORS.submitButton, (p) => {
        p.hide(SELECTORS.emailInput);
        p.show(SELECTORS.passwordInput);
      });
      const session = await openSession();

      const result = await session.login(CREDENTIALS, async () => "123456");

      expect(result).toEqual({ ok: false, reason: "not_verified" });
    });
  });

  describe("detectStatus", () => {
    it("reads a visible Clock in button as clocked out", async () => {
      page.show(CLOCK_BUTTON.in);
      const session = await openSession();

      await expect(session.detectStatus()).resolves.toBe("out");
    });

    it("reads a visible Clock out button as clocked in", async () => {
      page.show(CLOCK_BUTTON.out);
      const session = await openSession();

      await expect(session.detectStatus()).resolves.toBe("in");
    });

    it("clears the remember-device page once and looks again", async () => {
      page.show(SELECTORS.rememberDeviceButton);
      page.onClick.set(SELECTORS.rememberDeviceButton, (p) => {
        p.hide(SELECTORS.rememberDeviceButton);
        p.show(CLOCK_BUTTON.out);
      });
      const session = await openSession();

      await expect(session.detectStatus()).resolves.toBe("in");
      expect(page.clicks).toEqual([SELECTORS.rememberDeviceButton]);
      expect(page.pauses).toEqual([1_000]);
    });

    it("returns unknown when neither button is present", async () => {
      const session = await openSession();

      await expect(session.detectStatus()).resolves.toBe("unknown");
    });
  });

  describe("punch", () => {
    it("clicks the button and waits for it to disappear", async () => {
      page.onGoto = (_url, p) => p.show(CLOCK_BUTTON.in);
      page.onClick.set(CLOCK_BUTTON.in, (p) => p.hide(CLOCK_BUTTON.in));
      const session = await openSession();

      await expect(session.punch("in")).resolves.toBe("punched");
      expect(page.gotos).toEqual([`${BASE_URL}/dashboard`]);
      expect(page.clicks).toEqual([CLOCK_BUTTON.in]);
    });

    it("reports a missing button without clicking", async () => {
      const session = await openSession();

      await expect(session.punch("out")).resolves.toBe("button_missing");
      expect(page.clicks).toEqual([]);
    });

    it("reports a button that stays visible after the click", async () => {
      page.show(CLOCK_BUTTON.out);
      const session = await openSession();

      await expect(session.punch("out")).resolves.toBe("button_missing");
      expect(page.clicks).toEqual([CLOCK_BUTTON.out]);
    });

    it("propagates driver errors that are not timeouts", async () => {
      page.brokenSelectors.set(CLOCK_BUTTON.out, new Error("Target crashed"));
      const session = await openSession();

      await expect(session.punch("out")).rejects.toThrow("Target crashed");
    });
  });

  describe("openDashboard", () => {
    it("navigates to the dashboard path", async () => {
      const session = await openSession();

      await session.openDashboard();

      expect(page.gotos).toEqual([`${BASE_URL}/dashboard`]);
    });
  });

  describe("isAlive and close", () => {
    it("is alive while the page answers", async () => {
      const session = await openSession();

      await expect(session.isAlive()).resolves.toBe(true);
    });

    it("is not alive once the page stops answering", async () => {
      const session = await openSession();
      page.evaluateError = new Error("Execution context was destroyed");

      await expect(session.isAlive()).resolves.toBe(false);
    });

    it("closes once and ignores close errors", async () => {
      const session = await openSession();
      context.closeError = new Error("Browser has been closed");

      await session.close();
      await session.close();

      expect(context.closeCalls).toBe(1);
      await expect(session.isAlive()).resolves.toBe(false);
    });
  });
});
