// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { SuspendAttempt } from "../exceptions.js";
import type { Band, BatteryReading, WatchdogConfig } from "../types.js";

export const MISSING_ICON = "battery-missing";

export function displayIcon(band: Band, config: WatchdogConfig): string {
    switch (band) {
        case "absent": return MISSING_ICON;
        case "charging": return config.icons.charging;
        case "critical":
        case "warning": return config.icons.low;
        case "normal": return config.icons.battery;
    }
}

export function displayTooltip(band: Band, reading: BatteryReading): string {
    const pct = reading.percentage;
    switch (band) {
        case "absent": return "No battery detected";
        case "charging": return `Charging: ${pct}%`;
        case "critical": return `CRITICAL: ${pct}% - get a charger now!`;
        case "warning": return `Low: ${pct}% - consider charging`;
        case "normal": return `Battery: ${pct}%`;
    }
}

export function criticalAlert(pct: number, config: WatchdogConfig, graceSeconds: number): { title: string; message: string } {
    const tail = config.forceSuspendEnabled
        ? `System will suspend in ${graceSeconds} seconds to prevent data loss!`
        : "Save your work now!";
    return {
        title: `CRITICAL BATTERY: ${pct}%`,
        message: `Your battery is critically low at ${pct}%!\n\nPlug in your charger immediately!\n\n${tail}`,
    };
}

export function warningAlert(pct: number, config: WatchdogConfig): { title: string; message: string } {
    const tail = config.forceSuspendEnabled
        ? `System will force suspend at ${config.criticalLevel}% to protect your data!`
        : `Critical level is ${config.criticalLevel}%.`;
    return {
        title: `LOW BATTERY: ${pct}%`,
        message: `Your battery is getting low at ${pct}%!\n\nPlease plug in your charger soon!\n\n${tail}`,
    };
}

export const SUSPENDING_NOW = {
    title: "SYSTEM SUSPENDING NOW",
    message: "Battery critically low! Suspending to prevent data loss!",
};

export function suspendFailed(attempts: SuspendAttempt[]): { title: string; message: string } {
    const tried = attempts.map((a) => `${a.method} (exit ${a.exitCode ?? "n/a"})`).join(", ");
    return {
        title: "SUSPEND FAILED",
        message: `Could not suspend the system. Tried: ${tried}. Plug in your charger or save your work now!`,
    };
}
