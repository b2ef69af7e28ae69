import chalk from "chalk";
import type { Action, ActionPresenter, Band } from "@battguard/core";

export type LineWriter = (line: string) => void;

/** Prints engine actions to the terminal. Display updates are printed only when they change. */
export class ConsolePresenter implements ActionPresenter {
    readonly name = "console";
    private lastTooltip: string | null = null;

    constructor(private readonly write: LineWriter = (line) => console.log(line)) { }

    present(action: Action): void {
        switch (action.type) {
            case "update-display":
                if (action.tooltip === this.lastTooltip) return;
                this.lastTooltip = action.tooltip;
                this.write(this._colourFor(action.band)(`[battguard] ${action.tooltip}`));
                return;

            case "notify": {
                const colour = action.urgency === "critical" ? chalk.red.bold : chalk.green;
                this.write(colour(`[battguard] ${action.title}`));
                this.write(indent(action.message));
                return;
            }

            case "impossible-alert":
                this.write(chalk.bgRed.white.bold(` ${action.title} `));
                this.write(indent(action.message));
                return;

            case "dismiss-alert":
                this.write(chalk.green("[battguard] Alert dismissed"));
                return;

            case "suspend":
                this.write(chalk.red.bold(`[battguard] Suspending system (${action.method})`));
                return;

            case "suspend-aborted":
                this.write(chalk.yellow(`[battguard] Suspend aborted: ${action.reason}`));
                return;

            case "schedule-recheck":
                return;
        }
    }

    private _colourFor(band: Band): (text: string) => string {
        switch (band) {
            case "critical": return chalk.red;
            case "warning": return chalk.yellow;
            case "charging": return chalk.green;
            case "absent": return chalk.gray;
            case "normal": return chalk.blue;
        }
    }
}

function indent(message: string): string {
    return message
        .split("\n")
        .filter((line) => line.trim() !== "")
        .map((line) => `    ${line}`)
        .join("\n");
}
