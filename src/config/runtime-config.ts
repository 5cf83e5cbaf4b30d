/**
 * Runtime configuration
 *
 * Validates per-plugin config supplied by the host and reads the JSON
 * runtime manifest that lists plugin modules in registration order.
 * Only the fields the runtime acts on are checked; `settings` is passed
 * through to the plugin untouched.
 */

import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import type { PluginConfig, PluginSettings } from "../plugins/api.js";
import { ConfigurationError } from "../core/errors.js";

// ─── Plugin Config ──────────────────────────────────────────────────

export const DEFAULT_PLUGIN_CONFIG: PluginConfig = Object.freeze({
  enabled: true,
  visible: true,
  zIndex: 0,
  settings: Object.freeze({}),
});

export type PluginConfigInput = Partial<PluginConfig>;

/**
 * Fill defaults and check field types.
 * @throws ConfigurationError listing every invalid field
 */
export function normalizePluginConfig(raw: unknown = {}, plugin?: string): PluginConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(
      `${label(plugin)}config must be an object`,
      ["config must be an object"],
      plugin ? [plugin] : [],
    );
  }

  const errors: string[] = [];
  const { enabled, visible, zIndex, settings } = raw;

  if (enabled !== undefined && typeof enabled !== "boolean") {
    errors.push(`"enabled" must be a boolean`);
  }
  if (visible !== undefined && typeof visible !== "boolean") {
    errors.push(`"visible" must be a boolean`);
  }
  if (zIndex !== undefined && !Number.isInteger(zIndex)) {
    errors.push(`"zIndex" must be an integer`);
  }
  if (settings !== undefined && !isRecord(settings)) {
    errors.push(`"settings" must be an object`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `${label(plugin)}invalid config: ${errors.join("; ")}`,
      errors,
      plugin ? [plugin] : [],
    );
  }

  return {
    enabled: typeof enabled === "boolean" ? enabled : DEFAULT_PLUGIN_CONFIG.enabled,
    visible: typeof visible === "boolean" ? visible : DEFAULT_PLUGIN_CONFIG.visible,
    zIndex: typeof zIndex === "number" ? zIndex : DEFAULT_PLUGIN_CONFIG.zIndex,
    settings: isRecord(settings) ? { ...settings } : {},
  };
}

/** Apply a partial change on top of an existing config */
export function mergePluginConfig(
  base: PluginConfig,
  change: PluginConfigInput,
  plugin?: string,
): PluginConfig {
  return normalizePluginConfig(
    {
      enabled: change.enabled ?? base.enabled,
      visible: change.visible ?? base.visible,
      zIndex: change.zIndex ?? base.zIndex,
      settings: change.settings ?? base.settings,
    },
    plugin,
  );
}

// ─── Runtime Manifest ───────────────────────────────────────────────

export interface ManifestEntry {
  /** Absolute path of the plugin module */
  readonly module: string;
  readonly config: PluginConfig;
}

export interface RuntimeManifest {
  /** Entries in registration order */
  readonly plugins: readonly ManifestEntry[];
  readonly settings: PluginSettings;
}

/**
 * Validate a parsed manifest.
 * Relative module paths resolve against `baseDir`.
 */
export function parseRuntimeManifest(value: unknown, baseDir: string): RuntimeManifest {
  if (!isRecord(value)) {
    throw new ConfigurationError("Runtime manifest must be an object", ["manifest must be an object"]);
  }

  const { plugins, settings } = value;
  if (plugins !== undefined && !Array.isArray(plugins)) {
    throw new ConfigurationError(`Runtime manifest "plugins" must be an array`, [`"plugins" must be an array`]);
  }
  if (settings !== undefined && !isRecord(settings)) {
    throw new ConfigurationError(`Runtime manifest "settings" must be an object`, [`"settings" must be an object`]);
  }

  const list: unknown[] = Array.isArray(plugins) ? plugins : [];
  const entries: ManifestEntry[] = [];
  const errors: string[] = [];

  list.forEach((item, idx) => {
    if (!isRecord(item) || typeof item.module !== "string" || item.module.length === 0) {
      errors.push(`plugins[${idx}].module must be a non-empty string`);
      return;
    }
    const modulePath = item.module;
    try {
      entries.push({
        module: isAbsolute(modulePath) ? modulePath : resolve(baseDir, modulePath),
        config: normalizePluginConfig({
          enabled: item.enabled,
          visible: item.visible,
          zIndex: item.zIndex,
          settings: item.settings,
        }),
      });
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      errors.push(...err.errors.map((e) => `plugins[${idx}]: ${e}`));
    }
  });

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid runtime manifest: ${errors.join("; ")}`, errors);
  }

  return { plugins: entries, settings: isRecord(settings) ? { ...settings } : {} };
}

/** Read and validate a JSON runtime manifest from disk */
export function loadRuntimeManifest(path: string): RuntimeManifest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read runtime manifest "${path}": ${String(err)}`, [String(err)]);
  }
  return parseRuntimeManifest(parsed, dirname(resolve(path)));
}

// ─── Utilities ──────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function label(plugin?: string): string {
  return plugin ? `Plugin "${plugin}": ` : "";
}
