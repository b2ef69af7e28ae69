// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for battguard.
 * The sampler, the escalation engine, the watchdog and the CLI presenters
 * all operate on these types.
 */

/** Point-in-time battery reading. Produced fresh on every poll. */
export interface BatteryReading {
  readonly present: boolean;
  /** 0–100 */
  readonly percentage: number;
  readonly charging: boolean;
  /** Raw sysfs status, e.g. "Charging", "Discharging", "Full". */
  readonly statusLabel: string;
}

export type Band = "absent" | "charging" | "critical" | "warning" | "normal";

/** Suspend methods in fallback order. */
export const SUSPEND_METHODS = ["systemd", "pm-utils", "dbus", "kernel"] as const;

export type SuspendMethod = (typeof SUSPEND_METHODS)[number];

export function isSuspendMethod(value: string): value is SuspendMethod {
  const known: readonly string[] = SUSPEND_METHODS;
  return known.includes(value);
}

export interface IconSet {
  charging: string;
  battery: string;
  low: string;
}

export interface WatchdogConfig {
  /** Percentage at or below which warning alerts fire. */
  warningLevel: number;
  /** Percentage at or below which the grace-then-suspend sequence starts. Always < warningLevel. */
  criticalLevel: number;
  pollIntervalSeconds: number;
  /** How long critical notifications stay on screen. */
  alertTimeoutSeconds: number;
  forceSuspendEnabled: boolean;
  impossibleAlertsEnabled: boolean;
  suspendMethod: SuspendMethod;
  icons: IconSet;
}

export interface PendingGrace {
  startedAt: number;
  percentage: number;
}

export interface SuspendRecord {
  at: number;
  method: SuspendMethod | null;
  ok: boolean;
}

/** Escalation state. `null` means "unknown". */
export interface EscalationState {
  readonly lastPercentage: number | null;
  readonly lastChargingState: boolean | null;
  /** Epoch ms of the last warning/critical alert. */
  readonly lastAlertAt: number | null;
  readonly alertActive: boolean;
  readonly pendingGrace: PendingGrace | null;
  readonly lastSuspend: SuspendRecord | null;
}

export const INITIAL_ESCALATION_STATE: EscalationState = {
  lastPercentage: null,
  lastChargingState: null,
  lastAlertAt: null,
  alertActive: false,
  pendingGrace: null,
  lastSuspend: null,
};

export type NotifyUrgency = "normal" | "critical";

export type SuspendAbortReason = "charging" | "recovered" | "absent" | "disabled" | "unknown-method";

export type Action =
  | { type: "update-display"; band: Band; percentage: number; icon: string; tooltip: string }
  | { type: "notify"; urgency: NotifyUrgency; title: string; message: string; timeoutMs: number }
  | { type: "impossible-alert"; title: string; message: string }
  | { type: "dismiss-alert" }
  | { type: "schedule-recheck"; delayMs: number }
  | { type: "suspend"; method: SuspendMethod }
  | { type: "suspend-aborted"; reason: SuspendAbortReason };

export type ActionType = Action["type"];

/** Result of one engine step. */
export interface Evaluation {
  state: EscalationState;
  actions: Action[];
}

/** Renders engine actions. Tray icons, notifications and terminals implement this. */
export interface ActionPresenter {
  readonly name: string;
  present(action: Action): void | Promise<void>;
}
