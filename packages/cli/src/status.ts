import { Command } from "commander";
import chalk from "chalk";
import { classifyReading, DEFAULT_CONFIG_PATH, describeMethod, loadConfig, SysfsBatterySampler } from "@battguard/core";
import type { BatteryReading, WatchdogConfig } from "@battguard/core";

const onOff = (flag: boolean) => (flag ? "Enabled" : "Disabled");

export function formatStatus(reading: BatteryReading, config: WatchdogConfig): string {
    if (!reading.present) return "battguard\n\nNo battery detected!";

    return [
        "battguard",
        "",
        `Battery: ${reading.percentage}%`,
        `Status: ${reading.statusLabel}`,
        `Band: ${classifyReading(reading, config)}`,
        `Warning Level: ${config.warningLevel}%`,
        `Critical Level: ${config.criticalLevel}%`,
        `Check Interval: ${config.pollIntervalSeconds}s`,
        `Force Suspend: ${onOff(config.forceSuspendEnabled)}`,
        `Impossible Alerts: ${onOff(config.impossibleAlertsEnabled)}`,
        `Suspend Method: ${describeMethod(config.suspendMethod)}`,
    ].join("\n");
}

export const statusCommand = new Command("status")
    .description("Show the current battery reading and settings")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
        const { config } = loadConfig(options.config);
        const reading = await new SysfsBatterySampler().sample();
        const text = formatStatus(reading, config);
        if (reading.present) {
            console.log(text);
        } else {
            console.error(chalk.red(text));
            process.exitCode = 1;
        }
    });
