// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@gusto-punch/core/menu`
 * Purpose: Pure derivation of the menu-bar view from clock state.
 * Scope: Title glyphs, enabled actions, elapsed label. Does not render any surface format.
 * Invariants:
 * - Only the action that changes the status is enabled once status is known
 * - Elapsed label shows "--:--" unless clocked in with a known start time
 * Side-effects: none
 * Links: services/punch-agent/src/menubar/render.ts
 * @public
 */

import type { ClockState, ClockStatus, PunchAction } from "./types.js";

export const TITLE_BY_STATUS: Readonly<Record<ClockStatus, string>> = {
  in: "⏱☑",
  out: "⏱☒",
  unknown: "⏱",
};

export const ELAPSED_PLACEHOLDER = "Time Clocked: --:--";

export const FIXED_MENU_ITEMS = [
  { id: "check-status", label: "Check Status" },
  { id: "setup", label: "Setup" },
  { id: "restart-session", label: "Restart Session" },
  { id: "quit", label: "Quit" },
] as const;

export type FixedMenuItemId = (typeof FIXED_MENU_ITEMS)[number]["id"];

export interface MenuItem {
  readonly id: FixedMenuItemId;
  readonly label: string;
}

export type MenuActions = Readonly<Record<PunchAction, boolean>>;

export interface MenuView {
  readonly title: string;
  readonly actions: MenuActions;
  readonly elapsedLabel: string;
  readonly configured: boolean;
  readonly items: readonly MenuItem[];
}

export function statusTitle(status: ClockStatus): string {
  return TITLE_BY_STATUS[status];
}

/**
 * Which clock actions are enabled for a status.
 * Unknown status enables both so the user can recover by hand.
 */
export function menuActions(status: ClockStatus): MenuActions {
  switch (status) {
    case "out":
      return { in: true, out: false };
    case "in":
      return { in: false, out: true };
    case "unknown":
      return { in: true, out: true };
  }
}

export function isActionEnabled(
  status: ClockStatus,
  action: PunchAction
): boolean {
  return menuActions(status)[action];
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** HH:MM since `since`; hours are not wrapped at 24. */
export function formatElapsed(since: Date, now: Date): string {
  const elapsedSeconds = Math.max(0, (now.getTime() - since.getTime()) / 1000);
  const hours = Math.floor(elapsedSeconds / 3600);
  const minutes = Math.floor((elapsedSeconds % 3600) / 60);
  return `${pad2(hours)}:${pad2(minutes)}`;
}

export function elapsedLabel(state: ClockState, now: Date): string {
  if (state.status === "in" && state.clockedInAt) {
    return `Time Clocked: ${formatElapsed(state.clockedInAt, now)}`;
  }
  return ELAPSED_PLACEHOLDER;
}

export function buildMenuView(
  state: ClockState,
  configured: boolean,
  now: Date
): MenuView {
  return {
    title: statusTitle(state.status),
    actions: menuActions(state.status),
    elapsedLabel: elapsedLabel(state, now),
    configured,
    items: FIXED_MENU_ITEMS,
  };
}
