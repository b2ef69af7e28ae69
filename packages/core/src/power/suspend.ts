// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/power/suspend.ts
// SuspendExecutor — runs the configured suspend method, then every other method in
// table order until one succeeds.
//
// Fallback table:
//   systemd   systemctl suspend
//   pm-utils  pm-suspend
//   dbus      dbus-send → org.freedesktop.login1.Manager.Suspend
//   kernel    echo mem > /sys/power/state

import { spawnSync } from "child_process";
import { writeFileSync } from "fs";

import { AllMethodsFailedError } from "../exceptions.js";
import type { SuspendAttempt } from "../exceptions.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { SuspendMethod } from "../types.js";

export type SuspendInvocation =
    | { kind: "command"; file: string; args: readonly string[] }
    | { kind: "write"; path: string; content: string };

export interface SuspendTableEntry {
    method: SuspendMethod;
    label: string;
    invocation: SuspendInvocation;
}

export const SUSPEND_TABLE: readonly SuspendTableEntry[] = [
    {
        method: "systemd",
        label: "systemctl suspend (Systemd)",
        invocation: { kind: "command", file: "systemctl", args: ["suspend"] },
    },
    {
        method: "pm-utils",
        label: "pm-suspend (PM Utils)",
        invocation: { kind: "command", file: "pm-suspend", args: [] },
    },
    {
        method: "dbus",
        label: "D-Bus (Login Manager)",
        invocation: {
            kind: "command",
            file: "dbus-send",
            args: [
                "--system",
                "--print-reply",
                "--dest=org.freedesktop.login1",
                "/org/freedesktop/login1",
                "org.freedesktop.login1.Manager.Suspend",
                "boolean:true",
            ],
        },
    },
    {
        method: "kernel",
        label: "Kernel Direct (/sys/power/state)",
        invocation: { kind: "write", path: "/sys/power/state", content: "mem" },
    },
];

export function describeMethod(method: SuspendMethod): string {
    return SUSPEND_TABLE.find((e) => e.method === method)?.label ?? method;
}

export interface InvocationOutcome {
    ok: boolean;
    exitCode: number | null;
    detail?: string;
}

/** Performs one OS-level suspend invocation. Synchronous: a successful suspend freezes the process. */
export interface SuspendInvoker {
    invoke(invocation: SuspendInvocation): InvocationOutcome;
}

export class ProcessSuspendInvoker implements SuspendInvoker {
    constructor(private readonly timeoutMs: number = 15_000) { }

    invoke(invocation: SuspendInvocation): InvocationOutcome {
        if (invocation.kind === "write") {
            try {
                writeFileSync(invocation.path, invocation.content);
                return { ok: true, exitCode: 0 };
            } catch (err) {
                return { ok: false, exitCode: null, detail: err instanceof Error ? err.message : String(err) };
            }
        }

        const res = spawnSync(invocation.file, invocation.args, { stdio: "ignore", timeout: this.timeoutMs });
        if (res.error) {
            return { ok: false, exitCode: null, detail: res.error.message };
        }
        return {
            ok: res.status === 0,
            exitCode: res.status,
            detail: res.signal ? `terminated by ${res.signal}` : undefined,
        };
    }
}

export type SuspendResult =
    | { ok: true; method: SuspendMethod; attempts: SuspendAttempt[] }
    | { ok: false; error: AllMethodsFailedError };

export interface SuspendExecutorOptions {
    invoker?: SuspendInvoker;
    table?: readonly SuspendTableEntry[];
    logger?: Logger;
}

export class SuspendExecutor {
    private readonly invoker: SuspendInvoker;
    private readonly table: readonly SuspendTableEntry[];
    private readonly logger: Logger;

    constructor(opts: SuspendExecutorOptions = {}) {
        this.invoker = opts.invoker ?? new ProcessSuspendInvoker();
        this.table = opts.table ?? SUSPEND_TABLE;
        this.logger = opts.logger ?? silentLogger;
    }

    /** Configured method first, then the rest of the table in order. First success wins. */
    suspend(method: SuspendMethod): SuspendResult {
        const order = [method, ...this.table.map((e) => e.method).filter((m) => m !== method)];
        const attempts: SuspendAttempt[] = [];

        for (const m of order) {
            const attempt = this._attempt(m);
            attempts.push(attempt);
            if (attempt.ok) {
                return { ok: true, method: m, attempts };
            }
            if (m === method && order.length > 1) {
                this.logger.warn(`Primary suspend method '${m}' failed, trying fallbacks...`);
            }
        }

        const error = new AllMethodsFailedError(attempts);
        this.logger.error(error.message);
        return { ok: false, error };
    }

    /** Operator check: the configured method once, no fallback. */
    testSuspend(method: SuspendMethod): SuspendResult {
        const attempt = this._attempt(method);
        if (attempt.ok) return { ok: true, method, attempts: [attempt] };
        return { ok: false, error: new AllMethodsFailedError([attempt]) };
    }

    private _attempt(method: SuspendMethod): SuspendAttempt {
        const entry = this.table.find((e) => e.method === method);
        if (!entry) {
            return { method, ok: false, exitCode: null, detail: "no invocation registered" };
        }

        this.logger.info(`Using suspend method: ${entry.label}`);
        try {
            return { method, ...this.invoker.invoke(entry.invocation) };
        } catch (err) {
            return { method, ok: false, exitCode: null, detail: err instanceof Error ? err.message : String(err) };
        }
    }
}
