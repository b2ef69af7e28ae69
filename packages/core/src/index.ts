// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * battguard public API.
 * Import from this module when embedding the watchdog or writing a presenter.
 */

export { VERSION } from "./version.js";
export { SUSPEND_METHODS, INITIAL_ESCALATION_STATE, isSuspendMethod } from "./types.js";
export type {
  Action,
  ActionPresenter,
  ActionType,
  Band,
  BatteryReading,
  EscalationState,
  Evaluation,
  IconSet,
  NotifyUrgency,
  SuspendAbortReason,
  SuspendMethod,
  WatchdogConfig,
} from "./types.js";
export {
  BattguardError,
  SamplingError,
  ConfigurationError,
  SuspendError,
  AllMethodsFailedError,
  PersistenceError,
} from "./exceptions.js";
export type { ConfigIssue, SuspendAttempt } from "./exceptions.js";
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  saveConfig,
  parseConfigText,
  serializeConfig,
  validateConfig,
  mergeConfig,
} from "./config/config.js";
export type { ConfigPatch, LoadedConfig } from "./config/config.js";
export { DEFAULT_CONFIG, CONFIG_KEYS } from "./config/schema.js";
export { SysfsBatterySampler, ABSENT_READING } from "./battery/sampler.js";
export type { BatterySampler, SysfsSamplerOptions } from "./battery/sampler.js";
export { EscalationEngine, classifyReading, DEFAULT_TIMINGS } from "./escalation/engine.js";
export type { EscalationTimings } from "./escalation/engine.js";
export {
  SuspendExecutor,
  ProcessSuspendInvoker,
  SUSPEND_TABLE,
  describeMethod,
} from "./power/suspend.js";
export type {
  SuspendInvoker,
  SuspendInvocation,
  InvocationOutcome,
  SuspendResult,
  SuspendTableEntry,
} from "./power/suspend.js";
export { PollLoop } from "./scheduler/poll-loop.js";
export { BatteryWatchdog } from "./watchdog.js";
export type { WatchdogOptions, WatchdogStatus } from "./watchdog.js";
