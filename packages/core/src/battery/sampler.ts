// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/battery/sampler.ts
// SysfsBatterySampler — reads present/capacity/status from the kernel power_supply class.
//
// Probe order is fixed: the first device whose `present` file reads non-zero wins.
// Any read failure on that device yields an absent reading; sampling never throws.

import { readFile } from "fs/promises";
import { join } from "path";

import { SamplingError } from "../exceptions.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { BatteryReading } from "../types.js";

export interface BatterySampler {
    sample(): Promise<BatteryReading>;
}

export const ABSENT_READING: BatteryReading = Object.freeze({
    present: false,
    percentage: 0,
    charging: false,
    statusLabel: "Unknown",
});

export interface SysfsSamplerOptions {
    /** Defaults to /sys/class/power_supply */
    root?: string;
    /** Device directories in priority order */
    devices?: readonly string[];
    /** Per-file read timeout */
    readTimeoutMs?: number;
    logger?: Logger;
}

export const DEFAULT_POWER_SUPPLY_ROOT = "/sys/class/power_supply";
export const DEFAULT_BATTERY_DEVICES = ["BAT0", "BAT1"] as const;

export class SysfsBatterySampler implements BatterySampler {
    private readonly root: string;
    private readonly devices: readonly string[];
    private readonly readTimeoutMs: number;
    private readonly logger: Logger;

    constructor(opts: SysfsSamplerOptions = {}) {
        this.root = opts.root ?? DEFAULT_POWER_SUPPLY_ROOT;
        this.devices = opts.devices ?? DEFAULT_BATTERY_DEVICES;
        this.readTimeoutMs = opts.readTimeoutMs ?? 1_000;
        this.logger = opts.logger ?? silentLogger;
    }

    async sample(): Promise<BatteryReading> {
        for (const device of this.devices) {
            const dir = join(this.root, device);

            let present: number;
            try {
                present = parseInt(await this._read(join(dir, "present")), 10);
            } catch {
                continue; // device not there — try the next one
            }
            if (!present) continue;

            try {
                return await this._readDevice(dir);
            } catch (err) {
                const reason = err instanceof SamplingError ? err : new SamplingError(String(err), dir);
                this.logger.debug(`${reason.name} at ${reason.path}: ${reason.message}`);
                return ABSENT_READING;
            }
        }

        return ABSENT_READING;
    }

    private async _readDevice(dir: string): Promise<BatteryReading> {
        const capacityPath = join(dir, "capacity");
        const capacity = parseInt(await this._read(capacityPath), 10);
        if (Number.isNaN(capacity)) {
            throw new SamplingError("capacity is not a number", capacityPath);
        }

        const statusLabel = await this._read(join(dir, "status"));

        return Object.freeze({
            present: true,
            percentage: Math.min(100, Math.max(0, capacity)),
            charging: statusLabel === "Charging",
            statusLabel,
        });
    }

    private async _read(path: string): Promise<string> {
        try {
            const raw = await readFile(path, { encoding: "utf8", signal: AbortSignal.timeout(this.readTimeoutMs) });
            return raw.trim();
        } catch (err) {
            throw new SamplingError(err instanceof Error ? err.message : String(err), path);
        }
    }
}
