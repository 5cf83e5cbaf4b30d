/**
 * File-backed plugin definitions
 *
 * Loads plugin modules from disk with a cache-busting import so a changed
 * file yields a fresh definition, and remembers each file's mtime so the
 * hot-reload manager can ask which plugins changed.
 */

import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Logger, PluginDefinition, PluginName } from "../plugins/api.js";
import { ConfigurationError, ReloadError, describeCause } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { isPluginDefinition } from "../sdk/plugin-sdk.js";

// ─── Types ──────────────────────────────────────────────────────────

/** Anything that can produce a fresh definition for a registered plugin */
export interface DefinitionSource<TFrame = unknown> {
  load(name: PluginName): Promise<PluginDefinition<TFrame>>;
  /** Plugins whose source changed since they were last loaded */
  modified(): Promise<PluginName[]>;
}

export type ModuleImporter = (url: string) => Promise<unknown>;

export interface FileSourceOptions {
  /** Replaces dynamic `import()`; receives a file URL with a version query */
  importer?: ModuleImporter;
  log?: Logger;
}

interface TrackedFile {
  readonly path: string;
  mtimeMs: number;
}

const PLUGIN_FILE = /\.m?js$/;

// ─── File Source ────────────────────────────────────────────────────

export class FileDefinitionSource implements DefinitionSource {
  private readonly files = new Map<PluginName, TrackedFile>();
  private readonly importer: ModuleImporter;
  private readonly log: Logger;
  private loads = 0;

  constructor(options: FileSourceOptions = {}) {
    this.importer = options.importer ?? ((url) => import(url));
    this.log = options.log ?? createLogger("file-source");
  }

  /** Plugin modules in `dir`, sorted by file name. Files starting with `_` are skipped. */
  async discover(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && PLUGIN_FILE.test(e.name) && !e.name.startsWith("_"))
      .map((e) => e.name)
      .sort()
      .map((name) => join(resolve(dir), name));
  }

  /**
   * Import a plugin module and start tracking it under its plugin name.
   * @throws ConfigurationError when the module exports no definition
   */
  async loadFile(path: string): Promise<PluginDefinition> {
    const absolute = resolve(path);
    const info = await stat(absolute);
    const url = `${pathToFileURL(absolute).href}?v=${info.mtimeMs}-${++this.loads}`;

    const namespace = await this.importer(url);
    const definition = this.toDefinition(namespace, absolute);

    this.files.set(definition.metadata.name, { path: absolute, mtimeMs: info.mtimeMs });
    this.log.debug(`Loaded ${definition.metadata.name} from ${absolute}`);
    return definition;
  }

  /** Re-import the file a plugin was last loaded from */
  async load(name: PluginName): Promise<PluginDefinition> {
    const tracked = this.files.get(name);
    if (!tracked) {
      throw new ReloadError(name, "no source file is known for this plugin");
    }
    return this.loadFile(tracked.path);
  }

  async modified(): Promise<PluginName[]> {
    const changed: PluginName[] = [];
    for (const [name, tracked] of this.files) {
      try {
        const info = await stat(tracked.path);
        if (info.mtimeMs > tracked.mtimeMs) changed.push(name);
      } catch (err) {
        this.log.warn(`Cannot stat ${tracked.path}: ${describeCause(err)}`, { plugin: name });
      }
    }
    return changed;
  }

  /** File a plugin was loaded from */
  pathOf(name: PluginName): string | undefined {
    return this.files.get(name)?.path;
  }

  /**
   * Extract the definition from a module namespace. Accepts a `default`
   * export or a named `plugin` export.
   */
  toDefinition(namespace: unknown, path = "<module>"): PluginDefinition {
    if (typeof namespace === "object" && namespace !== null) {
      for (const exportName of ["default", "plugin"]) {
        const candidate: unknown = Reflect.get(namespace, exportName);
        if (isPluginDefinition(candidate)) return candidate;
      }
    }
    throw new ConfigurationError(
      `Module "${path}" must export a plugin definition as "default" or "plugin"`,
      ["missing plugin definition export"],
    );
  }
}
