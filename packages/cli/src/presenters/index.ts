import type { ActionPresenter, Logger } from "@battguard/core";

import { ConsolePresenter } from "./console.js";
import { NotifySendPresenter } from "./notify-send.js";

export { ConsolePresenter } from "./console.js";
export type { LineWriter } from "./console.js";
export { NotifySendPresenter } from "./notify-send.js";
export type { CommandRunner } from "./notify-send.js";

export function buildPresenters(desktop: boolean, logger: Logger): ActionPresenter[] {
    const presenters: ActionPresenter[] = [new ConsolePresenter()];
    if (desktop) presenters.push(new NotifySendPresenter(undefined, logger));
    return presenters;
}
