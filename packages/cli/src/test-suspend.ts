import { setTimeout as sleep } from "node:timers/promises";

import { Command } from "commander";
import chalk from "chalk";
import { BatteryWatchdog, DEFAULT_CONFIG_PATH, describeMethod } from "@battguard/core";

import { loadReportedConfig, parseInteger, resolveLogger } from "./options.js";
import { buildPresenters } from "./presenters/index.js";

interface TestSuspendOptions {
    config: string;
    yes?: boolean;
    delay: number;
    desktop: boolean;
}

export const testSuspendCommand = new Command("test-suspend")
    .description("Suspend now with the configured method, no fallbacks")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .option("-y, --yes", "Confirm: the system will suspend immediately")
    .option("--delay <seconds>", "Countdown before suspending", parseInteger, 3)
    .option("--no-desktop", "Skip the desktop notification")
    .action(async (options: TestSuspendOptions) => {
        const logger = resolveLogger();
        const config = loadReportedConfig(options.config, logger);

        if (!options.yes) {
            console.error(chalk.yellow(
                `This will test ${describeMethod(config.suspendMethod)}. Your system will suspend immediately!\n` +
                "Re-run with --yes to proceed.",
            ));
            process.exitCode = 1;
            return;
        }

        const presenters = buildPresenters(options.desktop, logger);
        const delay = Math.max(0, options.delay);
        for (const presenter of presenters) {
            await presenter.present({
                type: "notify",
                urgency: "normal",
                title: "Testing suspend",
                message: `System will suspend in ${delay} seconds...`,
                timeoutMs: 5_000,
            });
        }
        await sleep(delay * 1_000);

        const watchdog = new BatteryWatchdog({ config, configPath: null, logger });
        const result = watchdog.testSuspend();
        if (result.ok) {
            console.log(chalk.green(`Suspend via ${result.method} succeeded`));
        } else {
            console.error(chalk.red(result.error.message));
            process.exitCode = 1;
        }
    });
