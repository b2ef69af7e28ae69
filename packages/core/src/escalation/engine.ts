// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/escalation/engine.ts
// EscalationEngine — classifies readings into bands and decides which actions to emit.
//
// Band precedence:
//   absent → charging → critical (≤ criticalLevel) → warning (≤ warningLevel) → normal
//
// Critical grace sequence:
//   alert ──(schedule-recheck, 10s)──→ resolveGrace(re-sample)
//     still critical, not charging  → suspend
//     charger / recovered / absent  → suspend-aborted
//
// Every method is a pure function of its arguments: no clock, no I/O.

import type { SuspendResult } from "../power/suspend.js";
import { isSuspendMethod } from "../types.js";
import type {
    Action,
    Band,
    BatteryReading,
    EscalationState,
    Evaluation,
    SuspendAbortReason,
    WatchdogConfig,
} from "../types.js";
import {
    criticalAlert,
    displayIcon,
    displayTooltip,
    suspendFailed,
    SUSPENDING_NOW,
    warningAlert,
} from "./messages.js";

export interface EscalationTimings {
    /** Minimum gap between critical alerts */
    criticalWindowMs: number;
    /** Minimum gap between warning alerts */
    warningWindowMs: number;
    /** Wait between the critical alert and the suspend re-check */
    gracePeriodMs: number;
    /** On-screen time of normal notifications */
    normalNotifyTimeoutMs: number;
}

export const DEFAULT_TIMINGS: EscalationTimings = {
    criticalWindowMs: 30_000,
    warningWindowMs: 120_000,
    gracePeriodMs: 10_000,
    normalNotifyTimeoutMs: 5_000,
};

export function classifyReading(reading: BatteryReading, config: WatchdogConfig): Band {
    if (!reading.present) return "absent";
    if (reading.charging) return "charging";
    if (reading.percentage <= config.criticalLevel) return "critical";
    if (reading.percentage <= config.warningLevel) return "warning";
    return "normal";
}

export class EscalationEngine {
    readonly timings: EscalationTimings;

    constructor(timings: Partial<EscalationTimings> = {}) {
        this.timings = { ...DEFAULT_TIMINGS, ...timings };
    }

    evaluate(reading: BatteryReading, config: WatchdogConfig, state: EscalationState, now: number): Evaluation {
        const band = classifyReading(reading, config);
        const actions: Action[] = [
            {
                type: "update-display",
                band,
                percentage: reading.percentage,
                icon: displayIcon(band, config),
                tooltip: displayTooltip(band, reading),
            },
        ];

        // Alert timers stay untouched while no battery is visible
        if (band === "absent") {
            return { state: { ...state, lastPercentage: null, lastChargingState: null }, actions };
        }

        const seen: EscalationState = {
            ...state,
            lastPercentage: reading.percentage,
            lastChargingState: reading.charging,
        };

        switch (band) {
            case "charging":
                if (state.alertActive) actions.push({ type: "dismiss-alert" });
                return { state: { ...seen, alertActive: false, pendingGrace: null }, actions };

            case "critical":
                return this._critical(reading, config, seen, now, actions);

            case "warning":
                return this._warning(reading, config, seen, now, actions);

            case "normal":
                if (state.alertActive) actions.push({ type: "dismiss-alert" });
                return { state: { ...seen, alertActive: false }, actions };
        }
    }

    /** Continuation of the grace sequence, called with a fresh reading once the grace period has passed. */
    resolveGrace(recheck: BatteryReading, config: WatchdogConfig, state: EscalationState): Evaluation {
        if (!state.pendingGrace) {
            // Cancelled in the meantime (charger, settings change, quit)
            return { state, actions: [] };
        }

        const cleared: EscalationState = recheck.present
            ? { ...state, pendingGrace: null, lastPercentage: recheck.percentage, lastChargingState: recheck.charging }
            : { ...state, pendingGrace: null };
        const abort = (reason: SuspendAbortReason): Evaluation => ({
            state: cleared,
            actions: [{ type: "suspend-aborted", reason }],
        });

        if (!recheck.present) return abort("absent");
        if (recheck.charging) return abort("charging");
        if (recheck.percentage > config.criticalLevel) return abort("recovered");
        if (!config.forceSuspendEnabled) return abort("disabled");
        if (!isSuspendMethod(config.suspendMethod)) return abort("unknown-method");

        return {
            state: cleared,
            actions: [
                {
                    type: "notify",
                    urgency: "critical",
                    ...SUSPENDING_NOW,
                    timeoutMs: config.alertTimeoutSeconds * 1_000,
                },
                { type: "suspend", method: config.suspendMethod },
            ],
        };
    }

    /** Feed a suspend outcome back into state. Total failure becomes a user-visible notification. */
    recordSuspend(result: SuspendResult, config: WatchdogConfig, state: EscalationState, now: number): Evaluation {
        if (result.ok) {
            return { state: { ...state, lastSuspend: { at: now, method: result.method, ok: true } }, actions: [] };
        }

        return {
            state: { ...state, lastSuspend: { at: now, method: null, ok: false } },
            actions: [
                {
                    type: "notify",
                    urgency: "critical",
                    ...suspendFailed(result.error.attempts),
                    timeoutMs: config.alertTimeoutSeconds * 1_000,
                },
            ],
        };
    }

    /** Drop any open alert and pending grace sequence (settings change, quit). */
    cancelAlerts(state: EscalationState): Evaluation {
        return {
            state: { ...state, alertActive: false, pendingGrace: null },
            actions: state.alertActive ? [{ type: "dismiss-alert" }] : [],
        };
    }

    private _critical(
        reading: BatteryReading,
        config: WatchdogConfig,
        state: EscalationState,
        now: number,
        actions: Action[],
    ): Evaluation {
        if (!this._windowElapsed(state.lastAlertAt, now, this.timings.criticalWindowMs)) {
            return { state, actions };
        }

        const alert = criticalAlert(reading.percentage, config, Math.round(this.timings.gracePeriodMs / 1_000));
        actions.push({ type: "notify", urgency: "critical", ...alert, timeoutMs: config.alertTimeoutSeconds * 1_000 });

        let alertActive = state.alertActive;
        if (config.impossibleAlertsEnabled) {
            actions.push({ type: "impossible-alert", ...alert });
            alertActive = true;
        }

        let pendingGrace = state.pendingGrace;
        if (config.forceSuspendEnabled) {
            pendingGrace = { startedAt: now, percentage: reading.percentage };
            actions.push({ type: "schedule-recheck", delayMs: this.timings.gracePeriodMs });
        }

        return { state: { ...state, lastAlertAt: now, alertActive, pendingGrace }, actions };
    }

    private _warning(
        reading: BatteryReading,
        config: WatchdogConfig,
        state: EscalationState,
        now: number,
        actions: Action[],
    ): Evaluation {
        if (!this._windowElapsed(state.lastAlertAt, now, this.timings.warningWindowMs)) {
            return { state, actions };
        }

        const alert = warningAlert(reading.percentage, config);
        actions.push({ type: "notify", urgency: "critical", ...alert, timeoutMs: config.alertTimeoutSeconds * 1_000 });

        let alertActive = state.alertActive;
        if (config.impossibleAlertsEnabled) {
            actions.push({ type: "impossible-alert", ...alert });
            alertActive = true;
        }

        return { state: { ...state, lastAlertAt: now, alertActive }, actions };
    }

    private _windowElapsed(lastAlertAt: number | null, now: number, windowMs: number): boolean {
        return lastAlertAt === null || now - lastAlertAt > windowMs;
    }
}
