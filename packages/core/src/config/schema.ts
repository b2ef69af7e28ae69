// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Typed, range-validated configuration fields.
 *
 * Two shapes share the same field rules:
 *  - `watchdogConfigSchema` validates a whole in-memory config (settings updates).
 *  - `fileFieldsSchema()` validates the flat key=value fields of the config file,
 *    falling back to the default for each invalid field independently.
 */

import { z } from "zod";

import type { ConfigIssue } from "../exceptions.js";
import { SUSPEND_METHODS } from "../types.js";
import type { WatchdogConfig } from "../types.js";

// ── Field rules ──────────────────────────────────────────────────────────────

const level = z.number().int().min(1).max(100);
const seconds = z.number().int().positive();
const icon = z.string().trim().min(1);

export const DEFAULT_CONFIG: WatchdogConfig = {
  warningLevel: 20,
  criticalLevel: 10,
  pollIntervalSeconds: 30,
  alertTimeoutSeconds: 30,
  forceSuspendEnabled: true,
  impossibleAlertsEnabled: true,
  suspendMethod: "systemd",
  icons: {
    charging: "battery-caution-charging",
    battery: "battery-good",
    low: "battery-caution",
  },
};

export const watchdogConfigSchema = z
  .object({
    warningLevel: level,
    criticalLevel: level,
    pollIntervalSeconds: seconds,
    alertTimeoutSeconds: seconds,
    forceSuspendEnabled: z.boolean(),
    impossibleAlertsEnabled: z.boolean(),
    suspendMethod: z.enum(SUSPEND_METHODS),
    icons: z.object({ charging: icon, battery: icon, low: icon }),
  })
  .refine((c) => c.criticalLevel < c.warningLevel, {
    message: "critical level must be below warning level",
    path: ["criticalLevel"],
  });

// ── File fields ──────────────────────────────────────────────────────────────

export const CONFIG_KEYS = [
  "warning_level",
  "critical_level",
  "check_interval",
  "alert_timeout",
  "force_suspend",
  "impossible_alerts",
  "suspend_method",
  "icon_charging",
  "icon_battery",
  "icon_low",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const fileInt = (rule: z.ZodNumber) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "expected an integer")
    .transform(Number)
    .pipe(rule);

const fileFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "0", "true", "false", "yes", "no", "on", "off"]))
  .transform((v) => v === "1" || v === "true" || v === "yes" || v === "on");

/** Accepts the table index (0–3) or the method name. */
const fileSuspendMethod = z
  .string()
  .trim()
  .pipe(
    z.union([
      z.enum(SUSPEND_METHODS),
      z
        .string()
        .regex(/^\d+$/, "expected a method name or index")
        .transform(Number)
        .pipe(z.number().int().min(0).max(SUSPEND_METHODS.length - 1))
        .transform((i) => SUSPEND_METHODS[i]),
    ]),
  );

/** Flat view of a config, keyed the way the file keys it. */
export interface ConfigFields {
  warning_level: number;
  critical_level: number;
  check_interval: number;
  alert_timeout: number;
  force_suspend: boolean;
  impossible_alerts: boolean;
  suspend_method: WatchdogConfig["suspendMethod"];
  icon_charging: string;
  icon_battery: string;
  icon_low: string;
}

export function toFields(config: WatchdogConfig): ConfigFields {
  return {
    warning_level: config.warningLevel,
    critical_level: config.criticalLevel,
    check_interval: config.pollIntervalSeconds,
    alert_timeout: config.alertTimeoutSeconds,
    force_suspend: config.forceSuspendEnabled,
    impossible_alerts: config.impossibleAlertsEnabled,
    suspend_method: config.suspendMethod,
    icon_charging: config.icons.charging,
    icon_battery: config.icons.battery,
    icon_low: config.icons.low,
  };
}

export function fromFields(fields: ConfigFields): WatchdogConfig {
  return {
    warningLevel: fields.warning_level,
    criticalLevel: fields.critical_level,
    pollIntervalSeconds: fields.check_interval,
    alertTimeoutSeconds: fields.alert_timeout,
    forceSuspendEnabled: fields.force_suspend,
    impossibleAlertsEnabled: fields.impossible_alerts,
    suspendMethod: fields.suspend_method,
    icons: {
      charging: fields.icon_charging,
      battery: fields.icon_battery,
      low: fields.icon_low,
    },
  };
}

/**
 * Schema for raw string fields read from the config file.
 * An invalid value records an issue and yields that field's default;
 * a missing value yields the default silently.
 */
export function fileFieldsSchema(issues: ConfigIssue[]) {
  const defaults = toFields(DEFAULT_CONFIG);

  const lenient = <T extends z.ZodTypeAny>(key: ConfigKey, schema: T, fallback: z.output<T>) =>
    z
      .unknown()
      .pipe(schema)
      .catch((ctx) => {
        if (ctx.input !== undefined) {
          issues.push({
            field: key,
            message: `${ctx.error.issues[0]?.message ?? "invalid value"} (got '${String(ctx.input)}', using ${String(fallback)})`,
          });
        }
        return fallback;
      });

  return z.object({
    warning_level: lenient("warning_level", fileInt(level), defaults.warning_level),
    critical_level: lenient("critical_level", fileInt(level), defaults.critical_level),
    check_interval: lenient("check_interval", fileInt(seconds), defaults.check_interval),
    alert_timeout: lenient("alert_timeout", fileInt(seconds), defaults.alert_timeout),
    force_suspend: lenient("force_suspend", fileFlag, defaults.force_suspend),
    impossible_alerts: lenient("impossible_alerts", fileFlag, defaults.impossible_alerts),
    suspend_method: lenient("suspend_method", fileSuspendMethod, defaults.suspend_method),
    icon_charging: lenient("icon_charging", icon, defaults.icon_charging),
    icon_battery: lenient("icon_battery", icon, defaults.icon_battery),
    icon_low: lenient("icon_low", icon, defaults.icon_low),
  });
}
