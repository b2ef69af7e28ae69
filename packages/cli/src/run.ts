import { unwatchFile, watchFile } from "fs";

import { Command } from "commander";
import chalk from "chalk";
import { BatteryWatchdog, ConfigurationError, DEFAULT_CONFIG_PATH, SysfsBatterySampler } from "@battguard/core";
import type { LogLevel } from "@battguard/core";

import { loadReportedConfig, parseLogLevel, resolveLogger } from "./options.js";
import { buildPresenters } from "./presenters/index.js";

interface RunOptions {
    config: string;
    desktop: boolean;
    logLevel?: LogLevel;
}

export const runCommand = new Command("run")
    .description("Start the battery watchdog (default command)")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .option("--no-desktop", "Print to the terminal only, no desktop notifications")
    .option("--log-level <level>", "DEBUG, INFO, WARNING or ERROR", parseLogLevel)
    .action(async (options: RunOptions) => {
        const logger = resolveLogger(options.logLevel);
        const config = loadReportedConfig(options.config, logger);

        const sampler = new SysfsBatterySampler({ logger });
        const initial = await sampler.sample();
        if (!initial.present) {
            console.error(chalk.red("No battery detected! battguard is for machines running on a battery."));
            process.exitCode = 1;
            return;
        }

        const watchdog = new BatteryWatchdog({
            config,
            configPath: options.config,
            sampler,
            presenters: buildPresenters(options.desktop, logger),
            logger,
        });

        // SIGHUP and edits from `battguard config set` both land here
        const reload = () => {
            watchdog
                .reload()
                .then((loaded) => {
                    if (loaded) logger.info(`Configuration reloaded from ${options.config}`);
                })
                .catch((err: unknown) => {
                    if (err instanceof ConfigurationError) logger.error(err.message);
                    else logger.error("Reload failed", err);
                });
        };

        const shutdown = (signal: NodeJS.Signals) => {
            logger.info(`Received ${signal}, shutting down gracefully...`);
            process.removeListener("SIGHUP", reload);
            unwatchFile(options.config, reload);
            watchdog
                .stop()
                .then(() => console.log(chalk.green("battguard stopped. Stay charged!")))
                .catch((err: unknown) => {
                    logger.error("Shutdown failed", err);
                    process.exitCode = 1;
                });
        };

        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
        process.on("SIGHUP", reload);
        watchFile(options.config, { interval: 2_000 }, reload);

        console.log(chalk.green(`[battguard] Watching battery (${initial.percentage}%, ${initial.statusLabel})`));
        await watchdog.start();
    });
