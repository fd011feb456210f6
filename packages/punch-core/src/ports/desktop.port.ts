// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/desktop`
 * Purpose: User-facing notification and prompt ports.
 * Scope: Banner notifications, modal alerts, text prompts. Does not contain implementations.
 * Invariants: PrompterPort.ask resolves null on cancel, trimmed text otherwise
 * Side-effects: none (interface definition only)
 * @public
 */

export const NOTIFICATION_TITLE = "Gusto Punch";

export interface NotifierPort {
  /** Non-blocking banner under the app title. */
  notify(subtitle: string, message: string): Promise<void>;
  /** Modal message the user must dismiss. */
  alert(message: string): Promise<void>;
}

export interface PromptRequest {
  readonly title: string;
  readonly message: string;
  readonly okLabel: string;
  /** Hide typed characters (passwords) */
  readonly secure?: boolean;
}

export interface PrompterPort {
  ask(request: PromptRequest): Promise<string | null>;
}
