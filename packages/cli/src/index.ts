#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@battguard/core";

import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";
import { configCommand } from "./config.js";
import { methodsCommand } from "./methods.js";
import { testSuspendCommand } from "./test-suspend.js";

const program = new Command();

program
    .name("battguard")
    .description("Battery watchdog: alerts at low charge, suspends before the battery dies")
    .version(VERSION);

program.addCommand(runCommand, { isDefault: true });
program.addCommand(statusCommand);
program.addCommand(configCommand);
program.addCommand(methodsCommand);
program.addCommand(testSuspendCommand);

program.parseAsync(process.argv).catch((err: Error) => {
    console.error(chalk.red(`\nFatal error: ${err.message}`));
    process.exit(1);
});
