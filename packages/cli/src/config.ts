import { Command } from "commander";
import chalk from "chalk";
import { BatteryWatchdog, ConfigurationError, DEFAULT_CONFIG_PATH, serializeConfig } from "@battguard/core";
import type { ConfigPatch, SuspendMethod } from "@battguard/core";

import { loadReportedConfig, parseInteger, parseSuspendMethod, parseToggle, resolveLogger } from "./options.js";

export interface ConfigSetOptions {
    config: string;
    warningLevel?: number;
    criticalLevel?: number;
    interval?: number;
    alertTimeout?: number;
    forceSuspend?: boolean;
    impossibleAlerts?: boolean;
    suspendMethod?: SuspendMethod;
    iconCharging?: string;
    iconBattery?: string;
    iconLow?: string;
}

export function buildPatch(options: ConfigSetOptions): ConfigPatch {
    const patch: ConfigPatch = {};
    if (options.warningLevel !== undefined) patch.warningLevel = options.warningLevel;
    if (options.criticalLevel !== undefined) patch.criticalLevel = options.criticalLevel;
    if (options.interval !== undefined) patch.pollIntervalSeconds = options.interval;
    if (options.alertTimeout !== undefined) patch.alertTimeoutSeconds = options.alertTimeout;
    if (options.forceSuspend !== undefined) patch.forceSuspendEnabled = options.forceSuspend;
    if (options.impossibleAlerts !== undefined) patch.impossibleAlertsEnabled = options.impossibleAlerts;
    if (options.suspendMethod !== undefined) patch.suspendMethod = options.suspendMethod;

    const icons: NonNullable<ConfigPatch["icons"]> = {};
    if (options.iconCharging !== undefined) icons.charging = options.iconCharging;
    if (options.iconBattery !== undefined) icons.battery = options.iconBattery;
    if (options.iconLow !== undefined) icons.low = options.iconLow;
    if (Object.keys(icons).length > 0) patch.icons = icons;

    return patch;
}

const showCommand = new Command("show")
    .description("Print the effective configuration")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .action((options: { config: string }) => {
        const config = loadReportedConfig(options.config, resolveLogger("WARNING"));
        process.stdout.write(serializeConfig(config));
    });

const setCommand = new Command("set")
    .description("Validate and save new settings")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .option("--warning-level <percent>", "Warning level (1-100)", parseInteger)
    .option("--critical-level <percent>", "Critical level, below the warning level", parseInteger)
    .option("--interval <seconds>", "Check interval", parseInteger)
    .option("--alert-timeout <seconds>", "How long critical notifications stay up", parseInteger)
    .option("--force-suspend <on|off>", "Suspend at the critical level", parseToggle)
    .option("--impossible-alerts <on|off>", "Persistent alerts at warning and critical level", parseToggle)
    .option("--suspend-method <method>", "systemd, pm-utils, dbus or kernel (or 0-3)", parseSuspendMethod)
    .option("--icon-charging <name>", "Icon shown while charging")
    .option("--icon-battery <name>", "Icon shown at normal charge")
    .option("--icon-low <name>", "Icon shown at low charge")
    .action(async (options: ConfigSetOptions) => {
        const logger = resolveLogger("WARNING");
        const patch = buildPatch(options);
        if (Object.keys(patch).length === 0) {
            console.error(chalk.yellow("Nothing to change. See `battguard config set --help`."));
            process.exitCode = 1;
            return;
        }

        const watchdog = new BatteryWatchdog({
            config: loadReportedConfig(options.config, logger),
            configPath: options.config,
            logger,
        });

        try {
            await watchdog.updateSettings(patch);
            console.log(chalk.green(`Settings saved to ${options.config}`));
        } catch (err) {
            if (!(err instanceof ConfigurationError)) throw err;
            console.error(chalk.red(err.message));
            process.exitCode = 1;
        }
    });

export const configCommand = new Command("config")
    .description("Show or change battguard settings")
    .addCommand(showCommand)
    .addCommand(setCommand);
