/**
 * Tickframe error taxonomy.
 *
 * Plugin failures are recorded on the plugin's handle as FailureReports;
 * these classes give each report a stable code and the plugin names
 * involved. Only ConfigurationError, RuntimeStateError and require()'s
 * MissingDependencyError are ever thrown at a caller.
 */

import type { PluginName } from "../plugins/api.js";

export type ErrorCode =
  | "CONFIGURATION"
  | "CIRCULAR_DEPENDENCY"
  | "MISSING_DEPENDENCY"
  | "INITIALIZATION"
  | "RUNTIME_FAULT"
  | "RELOAD"
  | "RUNTIME_STATE";

export class TickframeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly plugins: readonly PluginName[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TickframeError";
  }
}

/** Malformed or duplicate metadata/config. The plugin is never registered. */
export class ConfigurationError extends TickframeError {
  constructor(
    message: string,
    public readonly errors: readonly string[] = [],
    plugins: readonly PluginName[] = [],
  ) {
    super(message, "CONFIGURATION", plugins);
    this.name = "ConfigurationError";
  }
}

export class CircularDependencyError extends TickframeError {
  constructor(public readonly cycle: readonly PluginName[]) {
    super(`Circular dependency detected involving: ${cycle.join(", ")}`, "CIRCULAR_DEPENDENCY", cycle);
    this.name = "CircularDependencyError";
  }
}

/** A hard dependency is absent or failed, or a required Data Bus key is absent. */
export class MissingDependencyError extends TickframeError {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
    plugins: readonly PluginName[] = [],
  ) {
    super(message, "MISSING_DEPENDENCY", plugins);
    this.name = "MissingDependencyError";
  }
}

export class InitializationError extends TickframeError {
  constructor(plugin: PluginName, reason: string, options?: ErrorOptions) {
    super(`Plugin "${plugin}" failed to initialize: ${reason}`, "INITIALIZATION", [plugin], options);
    this.name = "InitializationError";
  }
}

export type FaultPhase = "update" | "render" | "handleEvent" | "handleKey";

export class RuntimeFaultError extends TickframeError {
  constructor(
    plugin: PluginName,
    public readonly phase: FaultPhase,
    options?: ErrorOptions,
  ) {
    super(`Plugin "${plugin}" threw during ${phase}: ${describeCause(options?.cause)}`, "RUNTIME_FAULT", [plugin], options);
    this.name = "RuntimeFaultError";
  }
}

export class ReloadError extends TickframeError {
  constructor(plugin: PluginName, reason: string, options?: ErrorOptions) {
    super(`Reload of plugin "${plugin}" failed: ${reason}`, "RELOAD", [plugin], options);
    this.name = "ReloadError";
  }
}

/** Misuse of the runtime API (unknown plugin, reload mid-tick, …). */
export class RuntimeStateError extends TickframeError {
  constructor(message: string, plugins: readonly PluginName[] = []) {
    super(message, "RUNTIME_STATE", plugins);
    this.name = "RuntimeStateError";
  }
}

/** Human-readable reason from anything a plugin might throw */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
