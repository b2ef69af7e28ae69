import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { silentLogger } from "@battguard/core";
import type { Action, ActionPresenter, Logger } from "@battguard/core";

const pExecFile = promisify(execFile);

/** Runs a command and resolves with its stdout. */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const defaultRunner: CommandRunner = async (file, args) => {
    const { stdout } = await pExecFile(file, args, { timeout: 5_000 });
    return stdout;
};

const APP_NAME = "battguard";
const ALERT_ICON = "battery-caution";

/**
 * Desktop notifications through `notify-send`.
 * Impossible alerts stay on screen until dismissed; dismissal closes them over D-Bus.
 */
export class NotifySendPresenter implements ActionPresenter {
    readonly name = "notify-send";
    private alertId: string | null = null;

    constructor(
        private readonly run: CommandRunner = defaultRunner,
        private readonly logger: Logger = silentLogger,
    ) { }

    async present(action: Action): Promise<void> {
        try {
            switch (action.type) {
                case "notify":
                    await this.run("notify-send", [
                        "-a", APP_NAME,
                        "-u", action.urgency,
                        "-t", String(action.timeoutMs),
                        "-i", ALERT_ICON,
                        action.title,
                        action.message,
                    ]);
                    return;

                case "impossible-alert":
                    await this._showAlert(action.title, action.message);
                    return;

                case "dismiss-alert":
                    await this._closeAlert();
                    return;

                default:
                    return;
            }
        } catch (err) {
            this.logger.warn(`notify-send failed: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    private async _showAlert(title: string, message: string): Promise<void> {
        const args = ["-a", APP_NAME, "-u", "critical", "-t", "0", "-i", ALERT_ICON, "-p"];
        if (this.alertId) args.push("-r", this.alertId);
        const stdout = await this.run("notify-send", [...args, title, message]);
        const id = stdout.trim();
        this.alertId = /^\d+$/.test(id) ? id : null;
    }

    private async _closeAlert(): Promise<void> {
        if (!this.alertId) return;
        const id = this.alertId;
        this.alertId = null;
        await this.run("gdbus", [
            "call",
            "--session",
            "--dest", "org.freedesktop.Notifications",
            "--object-path", "/org/freedesktop/Notifications",
            "--method", "org.freedesktop.Notifications.CloseNotification",
            id,
        ]);
    }
}
