/**
 * Hot-Reload Manager
 *
 * Swaps a plugin's code while the runtime keeps ticking. Definitions come
 * from a DefinitionSource; the swap itself is PluginRuntime.replace, which
 * only runs between ticks. Because ticks are synchronous, any reload driven
 * from here (an awaited load, a watcher callback) lands between two ticks.
 */

import { watch as fsWatch } from "node:fs";
import type { Logger, PluginName } from "../plugins/api.js";
import { ReloadError, describeCause } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import type { PluginRuntime, ReloadOutcome } from "../core/runtime.js";
import type { DefinitionSource } from "./file-source.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface Watcher {
  close(): void;
}

/** Starts watching `dir`; `onChange` receives the changed file name when known */
export type WatchFactory = (dir: string, onChange: (filename: string | null) => void) => Watcher;

export interface HotReloadOptions {
  /** Quiet period after the last file event before reloading (default 100 ms) */
  debounceMs?: number;
  watchFactory?: WatchFactory;
  /** Called with every outcome produced by a watcher-triggered reload */
  onReload?: (outcome: ReloadOutcome) => void;
  log?: Logger;
}

export const DEFAULT_DEBOUNCE_MS = 100;

const WATCHED_FILE = /\.m?js$/;

const nodeWatch: WatchFactory = (dir, onChange) =>
  fsWatch(dir, (_event, filename) => onChange(filename ? filename.toString() : null));

// ─── Manager ────────────────────────────────────────────────────────

export class HotReloadManager<TFrame = unknown> {
  private readonly queue: PluginName[] = [];
  private readonly debounceMs: number;
  private readonly watchFactory: WatchFactory;
  private readonly onReload?: (outcome: ReloadOutcome) => void;
  private readonly log: Logger;
  private watcher?: Watcher;
  private timer?: ReturnType<typeof setTimeout>;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly runtime: PluginRuntime<TFrame>,
    private readonly source: DefinitionSource<TFrame>,
    options: HotReloadOptions = {},
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.watchFactory = options.watchFactory ?? nodeWatch;
    this.onReload = options.onReload;
    this.log = options.log ?? createLogger("hot-reload");
  }

  /**
   * Load a fresh definition and swap it in. A definition that cannot be
   * loaded or is rejected by the runtime leaves the old instance running
   * (`aborted`); a failure after teardown leaves the plugin failed.
   */
  async reload(name: PluginName): Promise<ReloadOutcome> {
    let outcome: ReloadOutcome;
    try {
      const definition = await this.source.load(name);
      outcome = this.runtime.replace(name, definition);
    } catch (err) {
      if (this.runtime.getState(name) === undefined) throw err;
      const error = err instanceof ReloadError ? err : new ReloadError(name, describeCause(err), { cause: err });
      outcome = { name, ok: false, state: this.runtime.getState(name), error, aborted: true };
    }

    if (outcome.ok) this.log.info(`Reloaded ${name}`);
    else this.log.warn(outcome.error?.message ?? `Reload of ${name} failed`, { plugin: name });
    return outcome;
  }

  /** Queue a plugin for the next flush() */
  requestReload(name: PluginName): void {
    if (!this.queue.includes(name)) this.queue.push(name);
  }

  /** Names waiting for flush() */
  pending(): readonly PluginName[] {
    return [...this.queue];
  }

  /** Reload every queued plugin in request order */
  async flush(): Promise<ReloadOutcome[]> {
    const names = this.queue.splice(0, this.queue.length);
    return this.reloadAll(names);
  }

  /** Reload every registered plugin whose source changed */
  async reloadModified(): Promise<ReloadOutcome[]> {
    const changed = await this.source.modified();
    const registered = changed.filter((name) => this.runtime.getState(name) !== undefined);
    return this.reloadAll(registered);
  }

  /** Watch a directory and reload changed plugins after a quiet period */
  watch(dir: string): void {
    this.close();
    this.watcher = this.watchFactory(dir, (filename) => {
      if (filename !== null && !WATCHED_FILE.test(filename)) return;
      this.schedule();
    });
    this.log.info(`Watching ${dir} for plugin changes`);
  }

  /** Settles once every watcher-triggered reload has finished */
  whenIdle(): Promise<void> {
    return this.chain.then(() => undefined);
  }

  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = undefined;
    }
  }

  // ── Internal ────────────────────────────────────────────────────

  private async reloadAll(names: readonly PluginName[]): Promise<ReloadOutcome[]> {
    const outcomes: ReloadOutcome[] = [];
    for (const name of names) {
      outcomes.push(await this.reload(name));
    }
    return outcomes;
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.chain = this.chain.then(
        () => this.reloadModified().then((outcomes) => outcomes.forEach((o) => this.onReload?.(o))),
      ).catch((err: unknown) => {
        this.log.error(`Automatic reload failed: ${describeCause(err)}`);
      });
    }, this.debounceMs);
  }
}
