/**
 * Plugin SDK
 *
 * Public SDK for building Tickframe plugins. Provides a base class with
 * no-op lifecycle defaults and Data/Event Bus shortcuts, a fluent metadata
 * builder, and the metadata validator the runtime applies at registration.
 * Plugin authors use this SDK without depending on internal core modules.
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
  PluginMetadata,
  PluginName,
  RuntimeEvent,
} from "../plugins/api.js";

// ─── Base Plugin ────────────────────────────────────────────────────

/**
 * Abstract base class for plugins. Only `update` and `render` are
 * mandatory; everything else defaults to a no-op.
 */
export abstract class BasePlugin<TFrame = unknown> implements Plugin<TFrame> {
  protected readonly log: Logger;

  constructor(protected readonly ctx: PluginContext) {
    this.log = ctx.log;
  }

  initialize(): boolean | LifecycleResult {
    return true;
  }

  abstract update(deltaTime: number): void;

  render(frame: TFrame): TFrame {
    return frame;
  }

  handleKey(_key: KeyCode): boolean {
    return false;
  }

  handleEvent(_event: RuntimeEvent): void {}

  cleanup(): void {}

  // ── Convenience Methods ─────────────────────────────────────────

  protected get name(): PluginName {
    return this.ctx.name;
  }

  protected get config(): PluginConfig {
    return this.ctx.config;
  }

  /** Write a value to the Data Bus */
  protected provide<T>(key: DataKey, value: T): void {
    this.ctx.data.provide(key, value);
  }

  /** Read a soft dependency; `fallback` when nobody has provided it */
  protected get<T>(key: DataKey, fallback: T): T {
    return this.ctx.data.get(key, fallback);
  }

  /** Read a value that must exist; throws MissingDependencyError */
  protected require<T>(key: DataKey, message?: string): T {
    return this.ctx.data.require<T>(key, message);
  }

  /** Queue an event for delivery after this tick's updates */
  protected post<T>(topic: string, data: T): number {
    return this.ctx.events.post(topic, data);
  }

  /** Read a setting from this plugin's config */
  protected setting<T>(key: string, fallback: T): T {
    const settings: Readonly<Record<string, unknown>> = this.ctx.config.settings;
    return key in settings ? (settings[key] as T) : fallback;
  }

  /** Flip this plugin's visibility from the next tick on */
  protected toggleVisibility(): boolean {
    return this.ctx.toggleVisible();
  }
}

// ─── Definition Helper ──────────────────────────────────────────────

/**
 * Pair static metadata with a factory.
 *
 * @example
 * ```ts
 * export default definePlugin(
 *   MetadataBuilder.create("compass").consumes("heading").build(),
 *   (ctx) => new CompassPlugin(ctx),
 * );
 * ```
 */
export function definePlugin<TFrame = unknown>(
  metadata: PluginMetadata,
  create: (ctx: PluginContext) => Plugin<TFrame>,
): PluginDefinition<TFrame> {
  return { metadata, create };
}

// ─── Metadata Builder ───────────────────────────────────────────────

/**
 * Fluent builder for plugin metadata.
 *
 * @example
 * ```ts
 * const metadata = MetadataBuilder.create("navigation")
 *   .version("1.2.0")
 *   .provides("route")
 *   .consumes("position")
 *   .dependsOn("gps-provider")
 *   .build();
 * ```
 */
export class MetadataBuilder {
  private _version = "1.0.0";
  private _description?: string;
  private _author?: string;
  private readonly _provides: DataKey[] = [];
  private readonly _consumes: DataKey[] = [];
  private readonly _dependencies: PluginName[] = [];

  private constructor(private readonly _name: PluginName) {}

  static create(name: PluginName): MetadataBuilder {
    return new MetadataBuilder(name);
  }

  version(version: string): this {
    this._version = version;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  author(author: string): this {
    this._author = author;
    return this;
  }

  provides(...keys: DataKey[]): this {
    this._provides.push(...keys);
    return this;
  }

  consumes(...keys: DataKey[]): this {
    this._consumes.push(...keys);
    return this;
  }

  dependsOn(...names: PluginName[]): this {
    this._dependencies.push(...names);
    return this;
  }

  build(): PluginMetadata {
    return Object.freeze({
      name: this._name,
      version: this._version,
      ...(this._description !== undefined ? { description: this._description } : {}),
      ...(this._author !== undefined ? { author: this._author } : {}),
      provides: Object.freeze([...this._provides]),
      consumes: Object.freeze([...this._consumes]),
      dependencies: Object.freeze([...this._dependencies]),
    });
  }
}

// ─── Metadata Validator ─────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate metadata before registration */
export function validateMetadata(metadata: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(metadata)) {
    errors.push("Plugin must expose metadata");
    return { valid: false, errors, warnings };
  }

  const m = metadata;

  if (typeof m.name !== "string" || m.name.trim().length === 0) {
    errors.push("Metadata must have a non-empty string 'name'");
  }
  if (typeof m.version !== "string" || m.version.length === 0) {
    errors.push("Metadata must have a non-empty string 'version'");
  } else if (!/^\d+\.\d+\.\d+/.test(m.version)) {
    warnings.push("Metadata 'version' should follow semver (e.g., '1.0.0')");
  }

  for (const field of ["provides", "consumes", "dependencies"] as const) {
    const value = m[field];
    if (value === undefined) continue;
    if (!Array.isArray(value)) {
      errors.push(`Metadata '${field}' must be an array of strings`);
      continue;
    }
    const items: unknown[] = value;
    if (items.some((v) => typeof v !== "string" || v.length === 0)) {
      errors.push(`Metadata '${field}' must contain only non-empty strings`);
    } else if (new Set(items).size !== items.length) {
      warnings.push(`Metadata '${field}' contains duplicate entries`);
    }
  }

  if (
    typeof m.name === "string" &&
    Array.isArray(m.dependencies) &&
    m.dependencies.includes(m.name)
  ) {
    errors.push(`Plugin "${m.name}" must not depend on itself`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Runtime shape check for anything claiming to be a plugin definition */
export function isPluginDefinition(value: unknown): value is PluginDefinition {
  return isObject(value) && typeof value.create === "function" && isObject(value.metadata);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
