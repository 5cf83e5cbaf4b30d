/**
 * Tickframe Plugin API v1 — FROZEN
 *
 * Every unit of per-frame behavior is a plugin. A plugin type declares its
 * identity and data contracts up front (metadata), and the runtime constructs
 * instances from it. Plugins never call each other directly: data flows
 * through the Data Bus, notifications flow through the Event Bus, and the
 * runtime decides who runs when.
 */

// ─── Versioning ─────────────────────────────────────────────────────

export const PLUGIN_API_VERSION = "1.0";

// ─── Plugin Identity ────────────────────────────────────────────────

/** Semantic version string (e.g. "1.0.0") */
export type SemVer = string;

/** Unique plugin name (e.g. "gps-provider", "compass") */
export type PluginName = string;

/** Data Bus key (e.g. "position", "heading") */
export type DataKey = string;

/** Discrete key-press identifier supplied by the host's input layer */
export type KeyCode = string | number;

/** Static description every plugin type must expose before registration */
export interface PluginMetadata {
  /** Unique identifier across the active registry */
  readonly name: PluginName;
  /** Semantic version */
  readonly version: SemVer;
  /** Short description */
  readonly description?: string;
  readonly author?: string;
  /** Data Bus keys this plugin may write */
  readonly provides?: readonly DataKey[];
  /** Data Bus keys this plugin reads (soft dependency, ordering only) */
  readonly consumes?: readonly DataKey[];
  /** Plugins that must initialize successfully before this one (hard dependency) */
  readonly dependencies?: readonly PluginName[];
}

// ─── Configuration ──────────────────────────────────────────────────

/** Arbitrary per-instance settings passed to the plugin at construction */
export type PluginSettings = Readonly<Record<string, unknown>>;

/** Per-instance configuration, mutable by the host between ticks */
export interface PluginConfig {
  /** Gates update, event, key and render dispatch */
  readonly enabled: boolean;
  /** Gates render dispatch only */
  readonly visible: boolean;
  /** Render ordering key (ascending) */
  readonly zIndex: number;
  readonly settings: PluginSettings;
}

// ─── Lifecycle ──────────────────────────────────────────────────────

/** Result of a lifecycle operation */
export interface LifecycleResult {
  readonly ok: boolean;
  readonly message?: string;
}

/**
 * Per-plugin lifecycle state.
 *
 *   unresolved → initializing → active ⇄ disabled
 *   active/disabled/failed → reloading → active/disabled/failed
 *   any → unloaded (always after cleanup)
 *
 * `failed` is terminal for the current instance; the name stays registered.
 */
export type PluginState =
  | "unresolved"
  | "initializing"
  | "active"
  | "disabled"
  | "reloading"
  | "failed"
  | "unloaded";

/**
 * The capability set every plugin implements.
 *
 * All calls are synchronous and happen on the runtime's single tick loop.
 * A plugin that needs blocking I/O does it elsewhere and publishes the
 * result to the Data Bus.
 */
export interface Plugin<TFrame = unknown> {
  /** Called once after construction. `false` or `{ ok: false }` fails the plugin. */
  initialize(): boolean | LifecycleResult;

  /** Called once per tick, in load order, with seconds since the previous tick. */
  update(deltaTime: number): void;

  /** Called once per tick, in render order. Returns the (possibly mutated) frame. */
  render(frame: TFrame): TFrame;

  /** Return true to consume the key and stop dispatch. */
  handleKey?(key: KeyCode): boolean;

  /** Receives every event posted during the tick's updates. */
  handleEvent?(event: RuntimeEvent): void;

  /** Release resources. Always called before the instance is dropped. */
  cleanup?(): void;
}

// ─── Plugin Context (injected by the runtime) ───────────────────────

/** A plugin's view of the Data Bus. Writes are attributed to the plugin. */
export interface PluginDataAccess {
  provide<T>(key: DataKey, value: T): void;
  get<T>(key: DataKey, fallback: T): T;
  require<T>(key: DataKey, message?: string): T;
  has(key: DataKey): boolean;
}

/** A plugin's view of the Event Bus. Plugins post; the runtime delivers. */
export interface PluginEventAccess {
  post<T>(topic: string, data: T): number;
}

/**
 * Context handed to a plugin factory.
 * This is the plugin's window into the runtime — no other access is permitted.
 */
export interface PluginContext {
  readonly name: PluginName;
  readonly data: PluginDataAccess;
  readonly events: PluginEventAccess;
  /** Live, read-only view of this plugin's config */
  readonly config: PluginConfig;
  /** Request a visibility change; applies from the next tick */
  setVisible(visible: boolean): void;
  /** Flip the pending visibility; returns the value that will apply */
  toggleVisible(): boolean;
  readonly log: Logger;
}

// ─── Logger ─────────────────────────────────────────────────────────

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Events ─────────────────────────────────────────────────────────

/** Event envelope — every event on the bus has this shape */
export interface RuntimeEvent<T = unknown> {
  /** Dot-delimited topic (e.g. "gps.fix.lost") */
  readonly topic: string;
  /** Plugin (or "runtime") that posted the event */
  readonly source: PluginName;
  /** Tick during which the event was posted */
  readonly tick: number;
  /** Monotonic sequence number assigned by the event bus */
  readonly sequence: number;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  readonly data: T;
}

// ─── Plugin Definition ──────────────────────────────────────────────

/**
 * A plugin type: static metadata plus a factory.
 * The runtime controls instantiation timing, so hot reload can tear down
 * one instance and construct the next behind the same name.
 */
export interface PluginDefinition<TFrame = unknown> {
  readonly metadata: PluginMetadata;
  create(ctx: PluginContext): Plugin<TFrame>;
}
