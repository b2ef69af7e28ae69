// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ABSENT_READING, SysfsBatterySampler } from "../../../src/battery/sampler.js";

// ── Fake sysfs tree ─────────────────────────────────────────────────────────

function writeDevice(root: string, name: string, files: Record<string, string>): void {
    const dir = join(root, name);
    mkdirSync(dir, { recursive: true });
    for (const [file, content] of Object.entries(files)) {
        writeFileSync(join(dir, file), content);
    }
}

describe("SysfsBatterySampler", () => {
    let root: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), "battguard-sysfs-"));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    it("reads the first present battery", async () => {
        writeDevice(root, "BAT0", { present: "1\n", capacity: "57\n", status: "Discharging\n" });

        const reading = await new SysfsBatterySampler({ root }).sample();
        expect(reading).toEqual({ present: true, percentage: 57, charging: false, statusLabel: "Discharging" });
    });

    it("flags charging only for the Charging status", async () => {
        writeDevice(root, "BAT0", { present: "1", capacity: "100", status: "Full" });
        expect((await new SysfsBatterySampler({ root }).sample()).charging).toBe(false);

        writeDevice(root, "BAT0", { present: "1", capacity: "64", status: "Charging" });
        expect(await new SysfsBatterySampler({ root }).sample()).toMatchObject({ charging: true, statusLabel: "Charging" });
    });

    it("skips a missing or non-present device in priority order", async () => {
        writeDevice(root, "BAT0", { present: "0", capacity: "10", status: "Discharging" });
        writeDevice(root, "BAT1", { present: "1", capacity: "81", status: "Discharging" });

        expect((await new SysfsBatterySampler({ root }).sample()).percentage).toBe(81);
    });

    it("stops at the first present device", async () => {
        writeDevice(root, "BAT0", { present: "1", capacity: "33", status: "Discharging" });
        writeDevice(root, "BAT1", { present: "1", capacity: "99", status: "Discharging" });

        expect((await new SysfsBatterySampler({ root }).sample()).percentage).toBe(33);
    });

    it("honours a custom probe order", async () => {
        writeDevice(root, "BAT0", { present: "1", capacity: "33", status: "Discharging" });
        writeDevice(root, "CMB0", { present: "1", capacity: "71", status: "Discharging" });

        const sampler = new SysfsBatterySampler({ root, devices: ["CMB0", "BAT0"] });
        expect((await sampler.sample()).percentage).toBe(71);
    });

    it("clamps capacity into 0–100", async () => {
        writeDevice(root, "BAT0", { present: "1", capacity: "104", status: "Full" });
        expect((await new SysfsBatterySampler({ root }).sample()).percentage).toBe(100);
    });

    it("returns an absent reading when nothing is there", async () => {
        expect(await new SysfsBatterySampler({ root }).sample()).toEqual(ABSENT_READING);
    });

    it("returns an absent reading when the present battery cannot be read", async () => {
        writeDevice(root, "BAT0", { present: "1", capacity: "n/a", status: "Discharging" });
        expect(await new SysfsBatterySampler({ root }).sample()).toEqual(ABSENT_READING);

        writeDevice(root, "BAT1", { present: "1", capacity: "50" });
        const sampler = new SysfsBatterySampler({ root, devices: ["BAT1"] });
        expect(await sampler.sample()).toEqual(ABSENT_READING);
    });
});
