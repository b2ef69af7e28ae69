// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/scheduler/poll-loop.ts
// PollLoop — single serial driver for periodic ticks, manual checks and deferred continuations.
//
// Every task runs on one promise chain, so two tasks never overlap. The next tick is
// armed only after the previous one has finished, so a slow tick delays the schedule
// instead of piling up.

import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export type PollTask<T = void> = () => Promise<T> | T;

export class PollLoop {
    private timer: NodeJS.Timeout | null = null;
    private readonly deferred = new Set<NodeJS.Timeout>();
    private tail: Promise<void> = Promise.resolve();
    private intervalMs = 0;
    private running = false;
    /** Bumped on every reschedule so an in-flight tick does not re-arm a stale timer. */
    private generation = 0;

    constructor(
        private readonly tick: PollTask,
        private readonly logger: Logger = silentLogger,
    ) { }

    start(intervalMs: number): void {
        if (this.running) return;
        this.running = true;
        this.intervalMs = intervalMs;
        this._arm();
    }

    /** Cancel the pending tick and re-arm with a new period. */
    reschedule(intervalMs: number): void {
        this.intervalMs = intervalMs;
        if (!this.running) return;
        this._disarm();
        this._arm();
    }

    /** Stop ticking and drop every pending continuation. Queued tasks still finish. */
    stop(): void {
        this.running = false;
        this._disarm();
        for (const handle of this.deferred) clearTimeout(handle);
        this.deferred.clear();
    }

    isRunning(): boolean {
        return this.running;
    }

    getIntervalMs(): number {
        return this.intervalMs;
    }

    /** Run the tick now, serialized with everything else. */
    trigger(): Promise<void> {
        return this.enqueue(this.tick);
    }

    /** Append a task to the serial chain. Its result (or failure) is returned to the caller. */
    enqueue<T>(task: PollTask<T>): Promise<T> {
        const run = this.tail.then(task);
        // Failures reach the caller through `run`; the chain itself keeps going
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    /** Schedule a one-shot continuation on the serial chain. Returns a cancel function. */
    defer(delayMs: number, task: PollTask): () => void {
        const handle = setTimeout(() => {
            this.deferred.delete(handle);
            void this.enqueue(task).catch((err: unknown) => this.logger.error("Deferred task failed", err));
        }, delayMs);
        this.deferred.add(handle);

        return () => {
            clearTimeout(handle);
            this.deferred.delete(handle);
        };
    }

    /** Resolves once everything queued so far has run. */
    idle(): Promise<void> {
        return this.tail;
    }

    private _arm(): void {
        const generation = this.generation;
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.enqueue(this.tick)
                .catch((err: unknown) => this.logger.error("Poll tick failed", err))
                .finally(() => {
                    if (this.running && generation === this.generation) this._arm();
                });
        }, this.intervalMs);
    }

    private _disarm(): void {
        this.generation++;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
