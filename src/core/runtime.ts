/**
 * Tickframe Plugin Runtime
 *
 * Owns the plugin registry and drives every lifecycle transition. The
 * runtime is the only component that touches plugin instances directly;
 * plugins see each other only through the Data Bus and the Event Bus.
 *
 * Lifecycle:
 *   register → boot (resolve, initialize in load order)
 *            → tick* (update in load order, deliver events, render by zIndex)
 *            → shutdown (cleanup in reverse load order)
 *
 * Properties:
 * - Deterministic load order (see resolver.ts)
 * - Fault isolation: a throwing plugin is marked failed and skipped; the
 *   tick carries on without it
 * - Config changes requested while plugin code runs apply at the next tick
 */

import type {
  DataKey,
  KeyCode,
  LifecycleResult,
  Logger,
  Plugin,
  PluginConfig,
  PluginContext,
  PluginDefinition,
  PluginName,
  PluginSettings,
  PluginState,
} from "../plugins/api.js";
import { mergePluginConfig, normalizePluginConfig, type PluginConfigInput } from "../config/runtime-config.js";
import { isPluginDefinition, validateMetadata } from "../sdk/plugin-sdk.js";
import { CoreDataBus, type DataBus } from "../state/data-bus.js";
import {
  CircularDependencyError,
  ConfigurationError,
  InitializationError,
  MissingDependencyError,
  ReloadError,
  RuntimeFaultError,
  RuntimeStateError,
  describeCause,
  type ErrorCode,
  type FaultPhase,
  type TickframeError,
} from "./errors.js";
import { TickEventBus, type EventBus } from "./event-bus.js";
import { createLogger, type LogLevel, type LogSink } from "./logger.js";
import {
  computeRenderOrder,
  resolveLoadOrder,
  type Resolution,
  type ResolutionFailure,
  type ResolverNode,
} from "./resolver.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface RuntimeOptions {
  /** Plugin config keyed by plugin name; merged under `register`'s config */
  configs?: Record<PluginName, PluginConfigInput>;
  /** Minimum level for runtime and plugin loggers (default "info") */
  logLevel?: LogLevel;
  /** Replaces console output for every logger the runtime creates */
  logSink?: LogSink;
  /** Event history bound (default 1000) */
  eventHistoryLimit?: number;
}

/** A recorded plugin failure */
export interface FailureReport {
  readonly plugin: PluginName;
  readonly kind: ErrorCode;
  readonly message: string;
  readonly error: TickframeError;
  /** Tick the failure happened on (0 = during the first boot) */
  readonly tick: number;
  readonly phase?: FaultPhase;
}

/** Outcome of replacing a plugin's definition */
export interface ReloadOutcome {
  readonly name: PluginName;
  readonly ok: boolean;
  readonly state?: PluginState;
  readonly error?: TickframeError;
  /** Rejected before teardown; the previous instance is still running */
  readonly aborted?: boolean;
}

export interface PluginSummary {
  readonly name: PluginName;
  readonly version: string;
  readonly description?: string;
  readonly state: PluginState;
  readonly enabled: boolean;
  readonly visible: boolean;
  readonly zIndex: number;
  readonly provides: readonly DataKey[];
  readonly consumes: readonly DataKey[];
  readonly dependencies: readonly PluginName[];
  readonly failure?: string;
}

interface PluginHandle<TFrame> {
  definition: PluginDefinition<TFrame>;
  config: PluginConfig;
  /** Config change requested mid-tick, committed at the next update */
  staged?: PluginConfig;
  state: PluginState;
  instance?: Plugin<TFrame>;
  failure?: FailureReport;
  /** Registration index */
  readonly order: number;
  /** Keys already warned about for writes outside `provides` */
  readonly undeclaredWrites: Set<DataKey>;
}

type Phase = "idle" | "update" | "render" | "input";

const RUNTIME_SOURCE = "runtime";

// ─── Plugin Runtime ─────────────────────────────────────────────────

export class PluginRuntime<TFrame = unknown> {
  private readonly handles = new Map<PluginName, PluginHandle<TFrame>>();
  private readonly dataBus: CoreDataBus;
  private readonly eventBus: TickEventBus;
  private readonly configs: Record<PluginName, PluginConfigInput>;
  private readonly logLevel: LogLevel;
  private readonly logSink?: LogSink;
  private readonly log: Logger;
  private readonly failureLog: FailureReport[] = [];
  private order: PluginName[] = [];
  private registrations = 0;
  private tickCount = 0;
  private phase: Phase = "idle";
  /** Set by `update`, cleared once `render` returns */
  private tickOpen = false;

  constructor(options: RuntimeOptions = {}) {
    this.configs = options.configs ?? {};
    this.logLevel = options.logLevel ?? "info";
    this.logSink = options.logSink;
    this.log = this.createScopedLogger("runtime");
    this.dataBus = new CoreDataBus(() => this.tickCount);
    this.eventBus = new TickEventBus({
      historyLimit: options.eventHistoryLimit,
      clock: () => this.tickCount,
      log: this.createScopedLogger("event-bus"),
    });
  }

  // ── Public API ──────────────────────────────────────────────────

  get data(): DataBus {
    return this.dataBus;
  }

  get events(): EventBus {
    return this.eventBus;
  }

  /** Number of completed `update` calls */
  get currentTick(): number {
    return this.tickCount;
  }

  /** True while plugin code runs or between a tick's `update` and `render` */
  get inTick(): boolean {
    return this.phase !== "idle" || this.tickOpen;
  }

  /**
   * Register a plugin type. Does NOT construct it yet.
   * @returns the normalized config the plugin will run with
   * @throws ConfigurationError for malformed metadata/config or a duplicate name
   */
  register(definition: PluginDefinition<TFrame>, config?: PluginConfigInput): PluginConfig {
    this.assertBetweenTicks("register");

    if (!isPluginDefinition(definition)) {
      throw new ConfigurationError("Plugin definition must have `metadata` and a `create` function", [
        "definition must have metadata and create()",
      ]);
    }

    const validation = validateMetadata(definition.metadata);
    const name = definition.metadata.name;
    if (!validation.valid) {
      throw new ConfigurationError(
        `Invalid metadata for plugin "${String(name)}": ${validation.errors.join("; ")}`,
        validation.errors,
        typeof name === "string" ? [name] : [],
      );
    }

    if (this.handles.has(name)) {
      throw new ConfigurationError(`Plugin "${name}" is already registered.`, ["duplicate name"], [name]);
    }

    const resolved = normalizePluginConfig({ ...this.configs[name], ...config }, name);

    for (const warning of validation.warnings) {
      this.log.warn(`${name}: ${warning}`);
    }

    this.handles.set(name, {
      definition,
      config: resolved,
      state: "unresolved",
      order: this.registrations++,
      undeclaredWrites: new Set(),
    });
    this.refreshOrder();

    this.log.info(`Registered plugin: ${name} v${definition.metadata.version}`);
    this.eventBus.emit("runtime.plugin.registered", RUNTIME_SOURCE, { plugin: name });
    return resolved;
  }

  /**
   * Resolve dependencies and initialize every unresolved plugin in load
   * order. Failures are recorded, never thrown.
   */
  boot(): Resolution {
    this.assertBetweenTicks("boot");
    this.log.info(`Booting with ${this.handles.size} plugin(s)…`);

    const resolution = resolveLoadOrder(this.resolverNodes());

    for (const [name, failure] of resolution.failures) {
      const handle = this.handles.get(name);
      if (handle?.state === "unresolved") {
        this.fail(handle, this.resolutionError(name, failure));
      }
    }

    for (const edge of resolution.ignoredSoftEdges) {
      this.log.debug(`Ignored soft edge ${edge.provider} → ${edge.consumer} ("${edge.key}") to avoid a cycle`);
    }

    for (const name of resolution.loadOrder) {
      const handle = this.handles.get(name);
      if (handle?.state !== "unresolved") continue;
      const error = this.construct(handle);
      if (error) this.fail(handle, error);
    }

    this.refreshOrder();
    const failed = [...this.handles.values()].filter((h) => h.state === "failed").length;

    this.eventBus.emit("runtime.boot.complete", RUNTIME_SOURCE, {
      loadOrder: [...this.order],
      failed,
    });
    this.log.info(`Boot complete. Load order: ${this.order.join(" → ") || "(empty)"}`);
    return resolution;
  }

  /**
   * Advance one tick: commit staged config, update every active plugin in
   * load order, then deliver the events posted during those updates.
   * The tick stays open until `render` returns; calling `update` again
   * without rendering starts the next one.
   */
  update(deltaTime: number): void {
    this.assertNotDispatching("update");
    this.commitStaged();
    this.tickCount++;

    this.tickOpen = true;
    this.phase = "update";
    try {
      for (const handle of this.activeInLoadOrder()) {
        const instance = handle.instance;
        if (handle.state !== "active" || !instance) continue;
        try {
          instance.update(deltaTime);
        } catch (err) {
          this.fault(handle, "update", err);
        }
      }

      for (const event of this.eventBus.drain()) {
        for (const handle of this.activeInLoadOrder()) {
          const instance = handle.instance;
          if (!instance?.handleEvent) continue;
          try {
            instance.handleEvent(event);
          } catch (err) {
            this.fault(handle, "handleEvent", err);
          }
        }
      }
    } finally {
      this.phase = "idle";
    }
  }

  /** Thread `frame` through every active, visible plugin in render order */
  render(frame: TFrame): TFrame {
    this.assertNotDispatching("render");

    this.phase = "render";
    try {
      let current = frame;
      for (const name of this.renderOrder()) {
        const handle = this.handles.get(name);
        const instance = handle?.instance;
        if (!handle || handle.state !== "active" || !instance) continue;
        try {
          current = instance.render(current);
        } catch (err) {
          this.fault(handle, "render", err);
        }
      }
      return current;
    } finally {
      this.phase = "idle";
      this.tickOpen = false;
    }
  }

  /** `update` followed by `render` */
  tick(deltaTime: number, frame: TFrame): TFrame {
    this.update(deltaTime);
    return this.render(frame);
  }

  /**
   * Offer a key to active plugins in load order.
   * @returns the consuming plugin's name, or undefined when nobody took it
   */
  dispatchKey(key: KeyCode): PluginName | undefined {
    this.assertNotDispatching("dispatchKey");

    this.phase = "input";
    try {
      for (const handle of this.activeInLoadOrder()) {
        const instance = handle.instance;
        if (!instance?.handleKey) continue;
        try {
          if (instance.handleKey(key)) return handle.definition.metadata.name;
        } catch (err) {
          this.fault(handle, "handleKey", err);
        }
      }
      return undefined;
    } finally {
      this.phase = "idle";
    }
  }

  /**
   * Swap a plugin's definition behind the same name, between ticks.
   * Config and Data Bus entries survive.
   *
   * @throws ReloadError when the new definition is rejected before teardown
   *   (the old instance keeps running)
   * @throws RuntimeStateError mid-tick or for an unknown plugin
   */
  replace(name: PluginName, definition: PluginDefinition<TFrame>): ReloadOutcome {
    this.assertBetweenTicks("replace");
    const handle = this.requireHandle(name);

    if (!isPluginDefinition(definition)) {
      throw new ReloadError(name, "module does not export a plugin definition");
    }
    const validation = validateMetadata(definition.metadata);
    if (!validation.valid) {
      throw new ReloadError(name, validation.errors.join("; "));
    }
    if (definition.metadata.name !== name) {
      throw new ReloadError(name, `new definition is named "${definition.metadata.name}"`);
    }

    if (handle.state === "unresolved") {
      handle.definition = definition;
      this.refreshOrder();
      return { name, ok: true, state: handle.state };
    }

    this.log.info(`Reloading plugin: ${name}`);
    handle.state = "reloading";
    this.dropInstance(handle);
    handle.failure = undefined;
    handle.definition = definition;
    handle.undeclaredWrites.clear();

    // Only the reloaded plugin is judged; everyone else keeps their state
    const verdict = resolveLoadOrder(this.resolverNodes()).failures.get(name);
    const cause = verdict ? this.resolutionError(name, verdict) : this.construct(handle);

    if (cause) {
      const error = new ReloadError(name, cause.message, { cause });
      this.fail(handle, error);
      return { name, ok: false, state: handle.state, error };
    }

    this.refreshOrder();
    this.eventBus.emit("runtime.plugin.reloaded", RUNTIME_SOURCE, {
      plugin: name,
      version: definition.metadata.version,
    });
    this.log.info(`Reloaded plugin: ${name} v${definition.metadata.version}`);
    return { name, ok: true, state: handle.state };
  }

  /** Clean up and deregister one plugin. Data Bus entries stay. */
  unload(name: PluginName): void {
    this.assertBetweenTicks("unload");
    const handle = this.requireHandle(name);

    const dependents = this.dependentsOf(name);
    if (dependents.length > 0) {
      this.log.warn(`Unloading "${name}" while dependents are running: ${dependents.join(", ")}`);
    }

    this.dropInstance(handle);
    handle.state = "unloaded";
    this.handles.delete(name);
    this.refreshOrder();

    this.eventBus.emit("runtime.plugin.unloaded", RUNTIME_SOURCE, { plugin: name });
    this.log.info(`Unloaded plugin: ${name}`);
  }

  /** Clean up every instance in reverse load order */
  shutdown(): void {
    this.assertBetweenTicks("shutdown");
    this.log.info("Shutting down…");

    const reversed = [...this.order].reverse();
    const remaining = [...this.handles.keys()].filter((name) => !reversed.includes(name));

    for (const name of [...reversed, ...remaining]) {
      const handle = this.handles.get(name);
      if (!handle) continue;
      this.dropInstance(handle);
      handle.state = "unloaded";
    }

    const dropped = this.eventBus.discard();
    if (dropped > 0) this.log.debug(`Discarded ${dropped} undelivered event(s)`);

    this.eventBus.emit("runtime.shutdown.complete", RUNTIME_SOURCE, { tick: this.tickCount });
    this.log.info("Shutdown complete.");
  }

  // ── Configuration ───────────────────────────────────────────────

  setEnabled(name: PluginName, enabled: boolean): PluginConfig {
    return this.configure(name, { enabled });
  }

  setVisible(name: PluginName, visible: boolean): PluginConfig {
    return this.configure(name, { visible });
  }

  setZIndex(name: PluginName, zIndex: number): PluginConfig {
    return this.configure(name, { zIndex });
  }

  /** Merge keys into the plugin's settings */
  updateSettings(name: PluginName, settings: PluginSettings): PluginConfig {
    const handle = this.requireHandle(name);
    const base = handle.staged ?? handle.config;
    return this.configure(name, { settings: { ...base.settings, ...settings } });
  }

  // ── Queries ─────────────────────────────────────────────────────

  getState(name: PluginName): PluginState | undefined {
    return this.handles.get(name)?.state;
  }

  /** Current failure of a plugin, if it is failed */
  getFailure(name: PluginName): FailureReport | undefined {
    return this.handles.get(name)?.failure;
  }

  /** Every failure recorded this session, oldest first */
  failures(): readonly FailureReport[] {
    return [...this.failureLog];
  }

  /** Every non-failed registered plugin, dependencies first */
  loadOrder(): readonly PluginName[] {
    return [...this.order];
  }

  /** Active, visible plugins by ascending zIndex, ties in load order */
  renderOrder(): readonly PluginName[] {
    const candidates = [...this.handles.values()]
      .filter((h) => h.state === "active" && h.config.visible)
      .map((h) => ({ name: h.definition.metadata.name, zIndex: h.config.zIndex }));
    return computeRenderOrder(candidates, this.order);
  }

  /** Registered names in registration order */
  pluginNames(): readonly PluginName[] {
    return this.sortedHandles().map((h) => h.definition.metadata.name);
  }

  /** Committed config (staged changes are not visible until the next tick) */
  getConfig(name: PluginName): PluginConfig | undefined {
    return this.handles.get(name)?.config;
  }

  list(): PluginSummary[] {
    return this.sortedHandles().map((handle) => {
      const { metadata } = handle.definition;
      return {
        name: metadata.name,
        version: metadata.version,
        ...(metadata.description !== undefined ? { description: metadata.description } : {}),
        state: handle.state,
        enabled: handle.config.enabled,
        visible: handle.config.visible,
        zIndex: handle.config.zIndex,
        provides: metadata.provides ?? [],
        consumes: metadata.consumes ?? [],
        dependencies: metadata.dependencies ?? [],
        ...(handle.failure ? { failure: handle.failure.message } : {}),
      };
    });
  }

  // ── Internal Lifecycle ──────────────────────────────────────────

  /**
   * Build the instance and call initialize(). On success the handle holds
   * the instance and is active or disabled; on failure the error is
   * returned and the handle is left for the caller to fail.
   */
  private construct(handle: PluginHandle<TFrame>): TickframeError | undefined {
    const { metadata } = handle.definition;
    const name = metadata.name;

    const unmet = (metadata.dependencies ?? []).filter((dep) => {
      const state = this.handles.get(dep)?.state;
      return state !== "active" && state !== "disabled";
    });
    if (unmet.length > 0) {
      return new MissingDependencyError(
        `Plugin "${name}" requires ${unmet.map((d) => `"${d}"`).join(", ")}, which did not initialize`,
        unmet,
        [name],
      );
    }

    handle.state = "initializing";
    let instance: Plugin<TFrame> | undefined;
    try {
      instance = handle.definition.create(this.createContext(handle));
      const result = toLifecycleResult(instance.initialize());
      if (!result.ok) {
        this.cleanupInstance(name, instance);
        return new InitializationError(name, result.message ?? "initialize() returned false");
      }
    } catch (err) {
      if (instance) this.cleanupInstance(name, instance);
      return new InitializationError(name, describeCause(err), { cause: err });
    }

    handle.instance = instance;
    handle.state = handle.config.enabled ? "active" : "disabled";
    this.log.debug(`Initialized: ${name} (${handle.state})`);
    this.eventBus.emit("runtime.plugin.initialized", RUNTIME_SOURCE, {
      plugin: name,
      state: handle.state,
    });
    return undefined;
  }

  private fault(handle: PluginHandle<TFrame>, phase: FaultPhase, cause: unknown): void {
    const name = handle.definition.metadata.name;
    this.fail(handle, new RuntimeFaultError(name, phase, { cause }), phase);
  }

  private fail(handle: PluginHandle<TFrame>, error: TickframeError, phase?: FaultPhase): void {
    const name = handle.definition.metadata.name;
    this.dropInstance(handle);
    handle.state = "failed";

    const report: FailureReport = {
      plugin: name,
      kind: error.code,
      message: error.message,
      error,
      tick: this.tickCount,
      ...(phase ? { phase } : {}),
    };
    handle.failure = report;
    this.failureLog.push(report);
    this.refreshOrder();

    this.log.error(error.message, { plugin: name, kind: error.code });
    this.eventBus.emit("runtime.plugin.failed", RUNTIME_SOURCE, {
      plugin: name,
      kind: error.code,
      message: error.message,
      ...(phase ? { phase } : {}),
    });
  }

  private dropInstance(handle: PluginHandle<TFrame>): void {
    const instance = handle.instance;
    handle.instance = undefined;
    if (instance) this.cleanupInstance(handle.definition.metadata.name, instance);
  }

  private cleanupInstance(name: PluginName, instance: Plugin<TFrame>): void {
    if (!instance.cleanup) return;
    try {
      instance.cleanup();
    } catch (err) {
      this.log.error(`Plugin "${name}" threw during cleanup: ${describeCause(err)}`, { plugin: name });
    }
  }

  private configure(name: PluginName, change: PluginConfigInput): PluginConfig {
    const handle = this.requireHandle(name);

    if (this.inTick) {
      handle.staged = mergePluginConfig(handle.staged ?? handle.config, change, name);
      this.log.debug(`Staged config change for ${name}`);
      return handle.staged;
    }

    const next = mergePluginConfig(handle.config, change, name);
    // Anything plugins staged still commits next update, now carrying this change
    if (handle.staged) handle.staged = mergePluginConfig(handle.staged, change, name);
    this.applyConfig(handle, next);
    return next;
  }

  private commitStaged(): void {
    for (const handle of this.handles.values()) {
      const staged = handle.staged;
      if (!staged) continue;
      handle.staged = undefined;
      this.applyConfig(handle, staged);
    }
  }

  private applyConfig(handle: PluginHandle<TFrame>, config: PluginConfig): void {
    const name = handle.definition.metadata.name;
    const wasEnabled = handle.config.enabled;
    handle.config = config;

    if (wasEnabled === config.enabled) return;

    if (handle.state === "active" && !config.enabled) handle.state = "disabled";
    else if (handle.state === "disabled" && config.enabled) handle.state = "active";

    // Disabled providers add no soft edges
    this.refreshOrder();
    this.log.info(`${config.enabled ? "Enabled" : "Disabled"} plugin: ${name}`);
  }

  private createContext(handle: PluginHandle<TFrame>): PluginContext {
    const name = handle.definition.metadata.name;
    const bus = this.dataBus;
    const events = this.eventBus;
    const log = this.createScopedLogger(name);

    return {
      name,
      data: {
        provide: <T>(key: DataKey, value: T): void => {
          const declared = handle.definition.metadata.provides ?? [];
          if (!declared.includes(key) && !handle.undeclaredWrites.has(key)) {
            handle.undeclaredWrites.add(key);
            this.log.warn(`Plugin "${name}" wrote undeclared key "${key}"`, { plugin: name, key });
          }
          bus.provide(key, value, name);
        },
        get: <T>(key: DataKey, fallback: T): T => bus.get(key, fallback),
        require: <T>(key: DataKey, message?: string): T => bus.require<T>(key, message),
        has: (key: DataKey): boolean => bus.has(key),
      },
      events: {
        post: <T>(topic: string, data: T): number => events.post(topic, name, data),
      },
      get config(): PluginConfig {
        return handle.config;
      },
      setVisible: (visible: boolean): void => {
        this.setVisible(name, visible);
      },
      toggleVisible: (): boolean => {
        const visible = !(handle.staged ?? handle.config).visible;
        this.setVisible(name, visible);
        return visible;
      },
      log,
    };
  }

  // ── Ordering ────────────────────────────────────────────────────

  private resolverNodes(): ResolverNode[] {
    return this.sortedHandles().map((handle) => ({
      name: handle.definition.metadata.name,
      metadata: handle.definition.metadata,
      order: handle.order,
      enabled: handle.config.enabled,
      failed: handle.state === "failed",
    }));
  }

  /**
   * Recompute the dispatch order over every non-failed plugin. Edges to
   * plugins that have since failed or gone are dropped: a running plugin
   * keeps its slot when a dependency faults later.
   */
  private refreshOrder(): void {
    const live = this.sortedHandles().filter((h) => h.state !== "failed");
    const names = new Set(live.map((h) => h.definition.metadata.name));

    const nodes: ResolverNode[] = live.map((handle) => {
      const { metadata } = handle.definition;
      return {
        name: metadata.name,
        metadata: {
          ...metadata,
          dependencies: (metadata.dependencies ?? []).filter((dep) => names.has(dep)),
        },
        order: handle.order,
        enabled: handle.config.enabled,
        failed: false,
      };
    });

    const resolution = resolveLoadOrder(nodes);
    this.order = [...resolution.loadOrder];

    for (const handle of live) {
      const name = handle.definition.metadata.name;
      if (!resolution.failures.has(name)) continue;
      // Only reachable with unresolved plugins that form a cycle; boot will fail them
      this.order.push(name);
    }
  }

  private activeInLoadOrder(): PluginHandle<TFrame>[] {
    const active: PluginHandle<TFrame>[] = [];
    for (const name of this.order) {
      const handle = this.handles.get(name);
      if (handle?.state === "active") active.push(handle);
    }
    return active;
  }

  private sortedHandles(): PluginHandle<TFrame>[] {
    return [...this.handles.values()].sort((a, b) => a.order - b.order);
  }

  private dependentsOf(name: PluginName): PluginName[] {
    return this.sortedHandles()
      .filter((h) => (h.state === "active" || h.state === "disabled") && (h.definition.metadata.dependencies ?? []).includes(name))
      .map((h) => h.definition.metadata.name);
  }

  private resolutionError(name: PluginName, failure: ResolutionFailure): TickframeError {
    if (failure.kind === "circular-dependency") {
      return new CircularDependencyError(failure.cycle);
    }
    const detail = failure.missing
      .map((m) => `"${m.name}" (${m.reason === "failed" ? "failed" : "not registered"})`)
      .join(", ");
    return new MissingDependencyError(
      `Plugin "${name}" requires ${detail}`,
      failure.missing.map((m) => m.name),
      [name],
    );
  }

  // ── Guards ──────────────────────────────────────────────────────

  private requireHandle(name: PluginName): PluginHandle<TFrame> {
    const handle = this.handles.get(name);
    if (!handle) {
      throw new RuntimeStateError(`Plugin "${name}" is not registered.`, [name]);
    }
    return handle;
  }

  private assertNotDispatching(operation: string): void {
    if (this.phase !== "idle") {
      throw new RuntimeStateError(`Cannot ${operation}() during ${this.phase}; call it between ticks.`);
    }
  }

  private assertBetweenTicks(operation: string): void {
    this.assertNotDispatching(operation);
    if (this.tickOpen) {
      throw new RuntimeStateError(`Cannot ${operation}() while a tick is open; call it after render().`);
    }
  }

  private createScopedLogger(scope: string): Logger {
    return createLogger(scope, { level: this.logLevel, sink: this.logSink });
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

function toLifecycleResult(value: boolean | LifecycleResult): LifecycleResult {
  return typeof value === "boolean" ? { ok: value } : value;
}
