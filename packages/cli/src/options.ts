import { InvalidArgumentError } from "commander";
import { createLogger, isLogLevel, isSuspendMethod, loadConfig, SUSPEND_METHODS } from "@battguard/core";
import type { Logger, LogLevel, SuspendMethod, WatchdogConfig } from "@battguard/core";

// ── Option parsers (commander argParser callbacks) ──────────────────────────

export function parseInteger(value: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
        throw new InvalidArgumentError("Not an integer.");
    }
    return Number(value.trim());
}

export function parseToggle(value: string): boolean {
    const v = value.trim().toLowerCase();
    if (["on", "yes", "true", "1"].includes(v)) return true;
    if (["off", "no", "false", "0"].includes(v)) return false;
    throw new InvalidArgumentError("Expected on or off.");
}

/** Accepts a method name or its index in the fallback table. */
export function parseSuspendMethod(value: string): SuspendMethod {
    const v = value.trim();
    if (isSuspendMethod(v)) return v;
    if (/^\d+$/.test(v)) {
        const byIndex = SUSPEND_METHODS.find((_, i) => i === Number(v));
        if (byIndex) return byIndex;
    }
    throw new InvalidArgumentError(`Expected one of: ${SUSPEND_METHODS.join(", ")}.`);
}

export function parseLogLevel(value: string): LogLevel {
    const v = value.trim().toUpperCase();
    if (!isLogLevel(v)) {
        throw new InvalidArgumentError("Expected DEBUG, INFO, WARNING or ERROR.");
    }
    return v;
}

// ── Shared setup ─────────────────────────────────────────────────────────────

/** --log-level wins, then BATTGUARD_LOG_LEVEL, then INFO. */
export function resolveLogger(level?: LogLevel, env: NodeJS.ProcessEnv = process.env): Logger {
    const fromEnv = env.BATTGUARD_LOG_LEVEL?.trim().toUpperCase();
    const resolved: LogLevel = level ?? (fromEnv && isLogLevel(fromEnv) ? fromEnv : "INFO");
    return createLogger("battguard", resolved);
}

/** Load the config file, reporting every field that fell back to its default. */
export function loadReportedConfig(configPath: string, logger: Logger): WatchdogConfig {
    const loaded = loadConfig(configPath);
    if (loaded.source === "defaults") {
        logger.info("No config file found, using defaults");
    } else {
        logger.info(`Configuration loaded from ${configPath}`);
    }
    for (const issue of loaded.issues) {
        logger.warn(`Config ${issue.field}: ${issue.message}`);
    }
    for (const key of loaded.unknownKeys) {
        logger.debug(`Ignoring unknown config key '${key}'`);
    }
    return loaded.config;
}
