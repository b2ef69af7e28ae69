// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadConfig,
  mergeConfig,
  parseConfigText,
  parseKeyValues,
  saveConfig,
  serializeConfig,
  validateConfig,
} from "../../../src/config/config.js";
import { DEFAULT_CONFIG } from "../../../src/config/schema.js";
import { ConfigurationError, PersistenceError } from "../../../src/exceptions.js";

describe("parseKeyValues()", () => {
  it("skips comments, blank lines and lines without a key", () => {
    const entries = parseKeyValues("# comment\n\nwarning_level = 25\n=oops\nnot a pair\nicon_low=my-icon\n");
    expect([...entries]).toEqual([
      ["warning_level", "25"],
      ["icon_low", "my-icon"],
    ]);
  });
});

describe("parseConfigText()", () => {
  it("reads every known key", () => {
    const { config, issues, unknownKeys } = parseConfigText(
      [
        "warning_level=30",
        "critical_level=8",
        "check_interval=60",
        "alert_timeout=45",
        "force_suspend=0",
        "impossible_alerts=1",
        "suspend_method=2",
        "icon_charging=c",
        "icon_battery=b",
        "icon_low=l",
      ].join("\n"),
    );

    expect(issues).toEqual([]);
    expect(unknownKeys).toEqual([]);
    expect(config).toEqual({
      warningLevel: 30,
      criticalLevel: 8,
      pollIntervalSeconds: 60,
      alertTimeoutSeconds: 45,
      forceSuspendEnabled: false,
      impossibleAlertsEnabled: true,
      suspendMethod: "dbus",
      icons: { charging: "c", battery: "b", low: "l" },
    });
  });

  it("falls back to the default for exactly the out-of-range field", () => {
    const { config, issues } = parseConfigText("warning_level=150\ncritical_level=5\ncheck_interval=45\n");

    expect(config.warningLevel).toBe(20);
    expect(config.criticalLevel).toBe(5);
    expect(config.pollIntervalSeconds).toBe(45);
    expect(issues).toHaveLength(1);
    expect(issues[0].field).toBe("warning_level");
  });

  it("falls back to the default for a missing field without reporting it", () => {
    const { config, issues } = parseConfigText("warning_level=25\nforce_suspend=0\n");

    expect(config.criticalLevel).toBe(10);
    expect(config.warningLevel).toBe(25);
    expect(config.forceSuspendEnabled).toBe(false);
    expect(issues).toEqual([]);
  });

  it("rejects malformed values field by field", () => {
    const { config, issues } = parseConfigText(
      "check_interval=0\nalert_timeout=abc\nforce_suspend=maybe\nsuspend_method=7\nicon_low=\n",
    );

    expect(config.pollIntervalSeconds).toBe(30);
    expect(config.alertTimeoutSeconds).toBe(30);
    expect(config.forceSuspendEnabled).toBe(true);
    expect(config.suspendMethod).toBe("systemd");
    expect(config.icons.low).toBe("battery-caution");
    expect(issues.map((i) => i.field)).toEqual([
      "check_interval",
      "alert_timeout",
      "force_suspend",
      "suspend_method",
      "icon_low",
    ]);
  });

  it("accepts suspend methods by name and flags as words", () => {
    const { config } = parseConfigText("suspend_method=kernel\nimpossible_alerts=off\nforce_suspend=Yes\n");
    expect(config.suspendMethod).toBe("kernel");
    expect(config.impossibleAlertsEnabled).toBe(false);
    expect(config.forceSuspendEnabled).toBe(true);
  });

  it("resets both levels when critical is not below warning", () => {
    const { config, issues } = parseConfigText("warning_level=15\ncritical_level=15\ncheck_interval=20\n");

    expect(config.warningLevel).toBe(20);
    expect(config.criticalLevel).toBe(10);
    expect(config.pollIntervalSeconds).toBe(20);
    expect(issues.map((i) => i.field)).toEqual(["critical_level"]);
  });

  it("collects unknown keys", () => {
    expect(parseConfigText("colour=blue\nwarning_level=20\n").unknownKeys).toEqual(["colour"]);
  });
});

describe("serializeConfig()", () => {
  it("writes one key per line with the method as its index", () => {
    const text = serializeConfig({ ...DEFAULT_CONFIG, suspendMethod: "dbus", forceSuspendEnabled: false });
    const keyLines = text.split("\n").filter((l) => l !== "" && !l.startsWith("#"));

    expect(keyLines).toEqual([
      "warning_level=20",
      "critical_level=10",
      "check_interval=30",
      "alert_timeout=30",
      "force_suspend=0",
      "impossible_alerts=1",
      "suspend_method=2",
      "icon_charging=battery-caution-charging",
      "icon_battery=battery-good",
      "icon_low=battery-caution",
    ]);
  });

  it("reads back what it writes", () => {
    const config = { ...DEFAULT_CONFIG, warningLevel: 35, criticalLevel: 12, suspendMethod: "pm-utils" as const };
    expect(parseConfigText(serializeConfig(config)).config).toEqual(config);
  });
});

describe("loadConfig() / saveConfig()", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "battguard-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults when the file does not exist", () => {
    const loaded = loadConfig(join(dir, "missing.conf"));
    expect(loaded.source).toBe("defaults");
    expect(loaded.config).toEqual(DEFAULT_CONFIG);
  });

  it("creates the directory and round-trips through the file", () => {
    const path = join(dir, "nested", "battguard.conf");
    saveConfig({ ...DEFAULT_CONFIG, warningLevel: 40 }, path);

    expect(readFileSync(path, "utf8")).toContain("warning_level=40\n");
    const loaded = loadConfig(path);
    expect(loaded.source).toBe("file");
    expect(loaded.config.warningLevel).toBe(40);
  });

  it("keeps valid fields from a partly broken file", () => {
    const path = join(dir, "battguard.conf");
    writeFileSync(path, "warning_level=25\ncritical_level=-3\n");

    const loaded = loadConfig(path);
    expect(loaded.config.warningLevel).toBe(25);
    expect(loaded.config.criticalLevel).toBe(10);
  });

  it("throws PersistenceError when the file cannot be written", () => {
    // A regular file where the parent directory should be
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    expect(() => saveConfig(DEFAULT_CONFIG, join(blocker, "battguard.conf"))).toThrow(PersistenceError);
  });
});

describe("validateConfig()", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });

  it("rejects an inverted level pair", () => {
    try {
      validateConfig(mergeConfig(DEFAULT_CONFIG, { criticalLevel: 25 }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual([{ field: "criticalLevel", message: "critical level must be below warning level" }]);
      }
    }
  });

  it("rejects non-positive intervals", () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, pollIntervalSeconds: 0 })).toThrow(ConfigurationError);
  });
});

describe("mergeConfig()", () => {
  it("merges icons field by field", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { warningLevel: 30, icons: { low: "red" } });
    expect(merged.warningLevel).toBe(30);
    expect(merged.icons).toEqual({ charging: "battery-caution-charging", battery: "battery-good", low: "red" });
  });
});
