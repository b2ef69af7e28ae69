// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/watchdog.ts
// BatteryWatchdog — main facade. Owns the live config, the escalation state and the poll loop,
// and routes engine actions to the suspend executor, the loop and the presenters.
//
// Usage:
//   const dog = new BatteryWatchdog({ config, configPath, presenters: [new ConsolePresenter()] })
//   await dog.start()
//   await dog.updateSettings({ warningLevel: 25 })
//   await dog.stop()

import EventEmitter from "events";
import { existsSync, readFileSync } from "fs";

import { ABSENT_READING, SysfsBatterySampler } from "./battery/sampler.js";
import type { BatterySampler } from "./battery/sampler.js";
import { mergeConfig, parseConfigText, saveConfig, serializeConfig, validateConfig } from "./config/config.js";
import type { ConfigPatch, LoadedConfig } from "./config/config.js";
import { classifyReading, EscalationEngine } from "./escalation/engine.js";
import { PersistenceError } from "./exceptions.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { describeMethod, SuspendExecutor } from "./power/suspend.js";
import type { SuspendResult } from "./power/suspend.js";
import { PollLoop } from "./scheduler/poll-loop.js";
import { INITIAL_ESCALATION_STATE } from "./types.js";
import type {
    Action,
    ActionPresenter,
    Band,
    BatteryReading,
    EscalationState,
    Evaluation,
    WatchdogConfig,
} from "./types.js";

export interface WatchdogOptions {
    config: WatchdogConfig;
    /** Where settings are persisted. `null` keeps everything in memory. */
    configPath: string | null;
    sampler?: BatterySampler;
    executor?: SuspendExecutor;
    engine?: EscalationEngine;
    presenters?: ActionPresenter[];
    logger?: Logger;
    /** Epoch ms */
    clock?: () => number;
}

export interface WatchdogStatus {
    running: boolean;
    config: WatchdogConfig;
    state: EscalationState;
    lastReading: BatteryReading | null;
    band: Band | null;
    pollIntervalMs: number;
}

export class BatteryWatchdog extends EventEmitter {
    private config: WatchdogConfig;
    private state: EscalationState = INITIAL_ESCALATION_STATE;
    private lastReading: BatteryReading | null = null;
    private cancelGrace: (() => void) | null = null;
    private running = false;
    /** File text as last loaded or written by this instance; `null` when there was no file. */
    private syncedText: string | null;

    private readonly configPath: string | null;
    private readonly sampler: BatterySampler;
    private readonly executor: SuspendExecutor;
    private readonly engine: EscalationEngine;
    private readonly presenters: ActionPresenter[];
    private readonly logger: Logger;
    private readonly clock: () => number;
    private readonly loop: PollLoop;

    constructor(opts: WatchdogOptions) {
        super();
        this.config = validateConfig(opts.config);
        this.configPath = opts.configPath;
        this.logger = opts.logger ?? silentLogger;
        this.sampler = opts.sampler ?? new SysfsBatterySampler({ logger: this.logger });
        this.executor = opts.executor ?? new SuspendExecutor({ logger: this.logger });
        this.engine = opts.engine ?? new EscalationEngine();
        this.presenters = [...(opts.presenters ?? [])];
        this.clock = opts.clock ?? Date.now;
        this.loop = new PollLoop(() => this._check(), this.logger);
        this.syncedText = this._readConfigText();
    }

    addPresenter(presenter: ActionPresenter): void {
        this.presenters.push(presenter);
    }

    /** Run one check immediately, then poll every `pollIntervalSeconds`. */
    async start(): Promise<BatteryReading> {
        if (this.running) return this.lastReading ?? ABSENT_READING;
        this.running = true;

        await this.loop.trigger();
        this.loop.start(this.config.pollIntervalSeconds * 1_000);
        this.logger.info(`Monitoring every ${this.config.pollIntervalSeconds}s`);
        return this.lastReading ?? ABSENT_READING;
    }

    /** Evaluate now, serialized with the periodic ticks. */
    checkNow(): Promise<void> {
        return this.loop.trigger();
    }

    /**
     * Validate, persist and swap in new settings, then restart the poll timer.
     * Throws ConfigurationError (old config stays live) when the result is invalid.
     * A failed write is logged; the in-memory config stays authoritative.
     */
    async updateSettings(patch: ConfigPatch): Promise<WatchdogConfig> {
        const next = await this.loop.enqueue(async () => {
            const validated = validateConfig(mergeConfig(this.config, patch));
            this._persist(validated);
            this.config = validated;

            await this._apply(this.engine.cancelAlerts(this.state));
            await this._present({
                type: "notify",
                urgency: "normal",
                title: "Settings saved",
                message: "Battery monitor settings have been updated!",
                timeoutMs: this.engine.timings.normalNotifyTimeoutMs,
            });
            return validated;
        });

        if (this.running) this.loop.reschedule(next.pollIntervalSeconds * 1_000);
        this.emit("config", next);
        return next;
    }

    /**
     * Apply the config file if it changed since this instance last loaded or wrote it,
     * e.g. after `battguard config set` from another process. Resolves `null` when unchanged.
     */
    async reload(): Promise<LoadedConfig | null> {
        const text = this._readConfigText();
        if (text === null || text === this.syncedText) return null;

        const loaded: LoadedConfig = { ...parseConfigText(text), source: "file" };
        for (const issue of loaded.issues) {
            this.logger.warn(`Config ${issue.field}: ${issue.message}`);
        }
        this.syncedText = text;
        await this.updateSettings(loaded.config);
        return loaded;
    }

    /** Run the configured suspend method once, bypassing escalation. */
    testSuspend(): SuspendResult {
        this.logger.info(`Testing suspend method: ${describeMethod(this.config.suspendMethod)}`);
        const result = this.executor.testSuspend(this.config.suspendMethod);
        this.emit("suspend", result);
        return result;
    }

    /** Resolves once every queued check, recheck and settings change has finished. */
    idle(): Promise<void> {
        return this.loop.idle();
    }

    getConfig(): WatchdogConfig {
        return this.config;
    }

    status(): WatchdogStatus {
        return {
            running: this.running,
            config: this.config,
            state: this.state,
            lastReading: this.lastReading,
            band: this.lastReading ? classifyReading(this.lastReading, this.config) : null,
            pollIntervalMs: this.loop.getIntervalMs(),
        };
    }

    /**
     * Graceful shutdown — releases timers, dismisses an open alert and persists the config.
     * A file changed by someone else since the last load or write is left alone.
     */
    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;

        this.loop.stop();
        this.cancelGrace = null;

        await this.loop.enqueue(async () => {
            await this._apply(this.engine.cancelAlerts(this.state));
            if (this._readConfigText() === this.syncedText) {
                this._persist(this.config);
            } else {
                this.logger.info("Config file changed on disk, keeping it");
            }
        });
    }

    // ── Serial steps (always run on the poll loop) ───────────────────────────

    private async _check(): Promise<void> {
        const reading = await this.sampler.sample();
        this.lastReading = reading;
        this.emit("reading", reading);
        await this._apply(this.engine.evaluate(reading, this.config, this.state, this.clock()));
    }

    private async _recheck(): Promise<void> {
        this.cancelGrace = null;
        // Queued before stop(); the shutdown step clears the grace
        if (!this.running) return;
        const reading = await this.sampler.sample();
        this.lastReading = reading;
        this.emit("reading", reading);
        await this._apply(this.engine.resolveGrace(reading, this.config, this.state));
    }

    private async _apply(evaluation: Evaluation): Promise<void> {
        this.state = evaluation.state;

        if (!this.state.pendingGrace && this.cancelGrace) {
            this.cancelGrace();
            this.cancelGrace = null;
            this.logger.info("Grace period cancelled");
        }

        for (const action of evaluation.actions) {
            await this._dispatch(action);
        }
    }

    private async _dispatch(action: Action): Promise<void> {
        this.emit("action", action);

        switch (action.type) {
            case "schedule-recheck":
                this.cancelGrace?.();
                this.cancelGrace = this.loop.defer(action.delayMs, () => this._recheck());
                this.logger.warn(`Grace period started: re-checking in ${Math.round(action.delayMs / 1_000)}s`);
                return;

            case "suspend":
                await this._present(action);
                this.logger.warn("Forcing system suspend due to critical battery");
                await this._recordSuspend(this.executor.suspend(action.method));
                return;

            case "suspend-aborted":
                if (action.reason === "unknown-method") {
                    this.logger.error(`Unknown suspend method '${String(this.config.suspendMethod)}', not suspending`);
                } else {
                    this.logger.info(`Suspend aborted: ${action.reason}`);
                }
                await this._present(action);
                return;

            default:
                await this._present(action);
        }
    }

    private async _recordSuspend(result: SuspendResult): Promise<void> {
        this.emit("suspend", result);
        await this._apply(this.engine.recordSuspend(result, this.config, this.state, this.clock()));
    }

    private async _present(action: Action): Promise<void> {
        for (const presenter of this.presenters) {
            try {
                await presenter.present(action);
            } catch (err) {
                this.logger.error(`Presenter '${presenter.name}' failed on '${action.type}'`, err);
            }
        }
    }

    private _readConfigText(): string | null {
        if (this.configPath === null || !existsSync(this.configPath)) return null;
        try {
            return readFileSync(this.configPath, "utf8");
        } catch (err) {
            this.logger.warn(`Cannot read ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }
    }

    private _persist(config: WatchdogConfig): void {
        if (this.configPath === null) return;
        try {
            saveConfig(config, this.configPath);
            this.syncedText = serializeConfig(config);
            this.logger.debug(`Configuration saved to ${this.configPath}`);
        } catch (err) {
            if (!(err instanceof PersistenceError)) throw err;
            this.logger.error(err.message);
        }
    }
}
