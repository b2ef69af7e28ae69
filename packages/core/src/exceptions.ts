// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for battguard. */

import type { SuspendMethod } from "./types.js";

export class BattguardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BattguardError";
  }
}

/** Hardware unreadable. Recovered as an absent reading, never fatal. */
export class SamplingError extends BattguardError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "SamplingError";
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigurationError extends BattguardError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface SuspendAttempt {
  method: SuspendMethod;
  ok: boolean;
  /** Process exit code, or null when the invocation never produced one. */
  exitCode: number | null;
  detail?: string;
}

export class SuspendError extends BattguardError {
  constructor(message: string) {
    super(message);
    this.name = "SuspendError";
  }
}

export class AllMethodsFailedError extends SuspendError {
  constructor(public readonly attempts: SuspendAttempt[]) {
    super(
      `All suspend methods failed: ` +
        attempts.map((a) => `${a.method} (exit ${a.exitCode ?? "n/a"})`).join(", "),
    );
    this.name = "AllMethodsFailedError";
  }
}

/** Config write failure. The in-memory config stays authoritative. */
export class PersistenceError extends BattguardError {
  constructor(
    public readonly path: string,
    cause?: string,
  ) {
    super(`Failed to save config to '${path}'${cause ? `: ${cause}` : ""}`);
    this.name = "PersistenceError";
  }
}
