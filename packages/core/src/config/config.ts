// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for battguard.
 * Reads ~/.config/battguard.conf (line-oriented key=value), validates each
 * field with Zod and falls back to the default for exactly the fields that
 * are missing or invalid.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

import { ConfigurationError, PersistenceError } from "../exceptions.js";
import type { ConfigIssue } from "../exceptions.js";
import type { WatchdogConfig } from "../types.js";
import { SUSPEND_METHODS } from "../types.js";
import {
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  fileFieldsSchema,
  fromFields,
  toFields,
  watchdogConfigSchema,
} from "./schema.js";
import type { ConfigFields, ConfigKey } from "./schema.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "battguard.conf");

export interface LoadedConfig {
  config: WatchdogConfig;
  /** Fields that fell back to defaults, plus unreadable-file problems. */
  issues: ConfigIssue[];
  /** Keys present in the file that battguard does not know. */
  unknownKeys: string[];
  source: "file" | "defaults";
}

// ── key=value codec ──────────────────────────────────────────────────────────

/** Split config text into raw key → value pairs. Later keys win. */
export function parseKeyValues(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    entries.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }
  return entries;
}

function isConfigKey(key: string): key is ConfigKey {
  const known: readonly string[] = CONFIG_KEYS;
  return known.includes(key);
}

/** Parse config text into a validated config; never throws. */
export function parseConfigText(text: string): Omit<LoadedConfig, "source"> {
  const issues: ConfigIssue[] = [];
  const unknownKeys: string[] = [];
  const raw: Partial<Record<ConfigKey, string>> = {};

  for (const [key, value] of parseKeyValues(text)) {
    if (isConfigKey(key)) raw[key] = value;
    else unknownKeys.push(key);
  }

  const fields: ConfigFields = fileFieldsSchema(issues).parse(raw);

  if (fields.critical_level >= fields.warning_level) {
    issues.push({
      field: "critical_level",
      message:
        `critical level ${fields.critical_level} is not below warning level ${fields.warning_level}; ` +
        `using defaults ${DEFAULT_CONFIG.criticalLevel}/${DEFAULT_CONFIG.warningLevel}`,
    });
    fields.warning_level = DEFAULT_CONFIG.warningLevel;
    fields.critical_level = DEFAULT_CONFIG.criticalLevel;
  }

  return { config: fromFields(fields), issues, unknownKeys };
}

const COMMENTS: Record<ConfigKey, string> = {
  warning_level: "Warning level percentage (when to show alerts)",
  critical_level: "Critical level percentage (when to force suspend)",
  check_interval: "Check interval in seconds",
  alert_timeout: "Alert timeout in seconds",
  force_suspend: "Force suspend at critical level (1=yes, 0=no)",
  impossible_alerts: "Show impossible to dismiss alerts (1=yes, 0=no)",
  suspend_method: `Suspend method (${SUSPEND_METHODS.map((m, i) => `${i}=${m}`).join(", ")})`,
  icon_charging: "Icon shown while charging",
  icon_battery: "Icon shown at normal charge",
  icon_low: "Icon shown at warning and critical charge",
};

function formatField(fields: ConfigFields, key: ConfigKey): string {
  const value = fields[key];
  if (typeof value === "boolean") return value ? "1" : "0";
  if (key === "suspend_method") return String(SUSPEND_METHODS.indexOf(fields.suspend_method));
  return String(value);
}

export function serializeConfig(config: WatchdogConfig): string {
  const fields = toFields(config);
  const lines = ["# battguard configuration"];
  for (const key of CONFIG_KEYS) {
    lines.push(`# ${COMMENTS[key]}`);
    lines.push(`${key}=${formatField(fields, key)}`);
  }
  return lines.join("\n") + "\n";
}

// ── Loader ───────────────────────────────────────────────────────────────────

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): LoadedConfig {
  if (!existsSync(configPath)) {
    // No config file — all defaults
    return { config: { ...DEFAULT_CONFIG }, issues: [], unknownKeys: [], source: "defaults" };
  }

  let text: string;
  try {
    text = readFileSync(configPath, "utf8");
  } catch (err) {
    return {
      config: { ...DEFAULT_CONFIG },
      issues: [{ field: "*", message: `Failed to read config at '${configPath}': ${String(err)}` }],
      unknownKeys: [],
      source: "defaults",
    };
  }

  return { ...parseConfigText(text), source: "file" };
}

/** Write the config file, creating its directory. Throws PersistenceError. */
export function saveConfig(config: WatchdogConfig, configPath: string = DEFAULT_CONFIG_PATH): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, serializeConfig(config), "utf8");
  } catch (err) {
    throw new PersistenceError(configPath, err instanceof Error ? err.message : String(err));
  }
}

/** Validate a complete config. Throws ConfigurationError listing every problem. */
export function validateConfig(candidate: WatchdogConfig): WatchdogConfig {
  const result = watchdogConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({ field: i.path.join("."), message: i.message }));
    throw new ConfigurationError(
      `Invalid configuration:\n${issues.map((i) => `  ${i.field}: ${i.message}`).join("\n")}`,
      issues,
    );
  }
  return result.data;
}

export type ConfigPatch = Partial<Omit<WatchdogConfig, "icons">> & { icons?: Partial<WatchdogConfig["icons"]> };

export function mergeConfig(base: WatchdogConfig, patch: ConfigPatch): WatchdogConfig {
  return { ...base, ...patch, icons: { ...base.icons, ...patch.icons } };
}
