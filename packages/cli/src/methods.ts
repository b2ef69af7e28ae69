import { Command } from "commander";
import chalk from "chalk";
import { DEFAULT_CONFIG_PATH, loadConfig, SUSPEND_TABLE } from "@battguard/core";
import type { SuspendMethod } from "@battguard/core";

export function formatMethods(selected: SuspendMethod): string[] {
    return SUSPEND_TABLE.map((entry, i) => {
        const marker = entry.method === selected ? "*" : " ";
        return `${marker} ${i}  ${entry.method.padEnd(8)}  ${entry.label}`;
    });
}

export const methodsCommand = new Command("methods")
    .description("List suspend methods in fallback order")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .action((options: { config: string }) => {
        const { config } = loadConfig(options.config);
        console.log(chalk.blue("Suspend methods (* = configured, others are fallbacks in this order):"));
        for (const line of formatMethods(config.suspendMethod)) console.log(line);
    });
