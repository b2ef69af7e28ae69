import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { InvalidArgumentError } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Logger } from "@battguard/core";

import {
    loadReportedConfig,
    parseInteger,
    parseLogLevel,
    parseSuspendMethod,
    parseToggle,
} from "../../src/options.js";

describe("option parsers", () => {
    it("parses integers and rejects anything else", () => {
        expect(parseInteger(" 15 ")).toBe(15);
        expect(parseInteger("-3")).toBe(-3);
        expect(() => parseInteger("1.5")).toThrow(InvalidArgumentError);
        expect(() => parseInteger("ten")).toThrow("Not an integer.");
    });

    it("parses on/off toggles", () => {
        expect(parseToggle("On")).toBe(true);
        expect(parseToggle("1")).toBe(true);
        expect(parseToggle("no")).toBe(false);
        expect(() => parseToggle("maybe")).toThrow("Expected on or off.");
    });

    it("accepts suspend methods by name or table index", () => {
        expect(parseSuspendMethod("pm-utils")).toBe("pm-utils");
        expect(parseSuspendMethod("2")).toBe("dbus");
        expect(parseSuspendMethod("0")).toBe("systemd");
        expect(() => parseSuspendMethod("4")).toThrow("Expected one of: systemd, pm-utils, dbus, kernel.");
        expect(() => parseSuspendMethod("hibernate")).toThrow(InvalidArgumentError);
    });

    it("normalises log levels", () => {
        expect(parseLogLevel("debug")).toBe("DEBUG");
        expect(() => parseLogLevel("verbose")).toThrow(InvalidArgumentError);
    });
});

describe("loadReportedConfig", () => {
    let dir: string;
    let messages: string[];
    const logger: Logger = {
        debug: (m) => messages.push(`debug ${m}`),
        info: (m) => messages.push(`info ${m}`),
        warn: (m) => messages.push(`warn ${m}`),
        error: (m) => messages.push(`error ${m}`),
    };

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "battguard-cli-"));
        messages = [];
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("reports the defaults when there is no file", () => {
        const path = join(dir, "missing.conf");

        const config = loadReportedConfig(path, logger);

        expect(config.warningLevel).toBe(20);
        expect(messages).toEqual(["info No config file found, using defaults"]);
    });

    it("reports fallbacks and unknown keys", () => {
        const path = join(dir, "battguard.conf");
        writeFileSync(path, "warning_level=abc\ncritical_level=5\ncolour=blue\n");

        const config = loadReportedConfig(path, logger);

        expect(config).toMatchObject({ warningLevel: 20, criticalLevel: 5 });
        expect(messages[0]).toBe(`info Configuration loaded from ${path}`);
        expect(messages[1]).toMatch(/^warn Config warning_level: expected an integer \(got 'abc', using 20\)$/);
        expect(messages[2]).toBe("debug Ignoring unknown config key 'colour'");
        expect(messages).toHaveLength(3);
    });
});
