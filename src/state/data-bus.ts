/**
 * Tickframe Data Bus
 *
 * Process-wide key → last-written value store shared by all plugins of one
 * runtime. One current value per key, no history, no queueing: a write is
 * visible to every read that happens after it, including reads later in the
 * same tick.
 *
 * Properties:
 * - Last-write-wins
 * - Every entry records the tick it was written on and its writer
 * - Synchronous and single-threaded (no locking)
 */

import type { DataKey, PluginName } from "../plugins/api.js";
import { MissingDependencyError } from "../core/errors.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface DataEntry<T = unknown> {
  readonly key: DataKey;
  readonly value: T;
  /** Tick number the value was written on (0 = before the first tick) */
  readonly tick: number;
  readonly writtenBy: PluginName;
}

export interface DataBus {
  /** Write unconditionally */
  provide<T>(key: DataKey, value: T, writer: PluginName): DataEntry<T>;

  /** Current value, or `fallback` when absent. Never fails. */
  get<T>(key: DataKey, fallback: T): T;

  /** Current value, or throw MissingDependencyError */
  require<T>(key: DataKey, message?: string): T;

  has(key: DataKey): boolean;

  /** Full entry metadata */
  entry(key: DataKey): DataEntry | undefined;

  keys(): readonly DataKey[];

  /** Keys whose current value was written by `writer` */
  writesBy(writer: PluginName): readonly DataKey[];

  /** Plain copy of every entry */
  snapshot(): Record<DataKey, DataEntry>;

  clear(): void;
}

// ─── Implementation ─────────────────────────────────────────────────

export class CoreDataBus implements DataBus {
  private readonly store = new Map<DataKey, DataEntry>();

  /** @param clock supplies the current tick number */
  constructor(private readonly clock: () => number = () => 0) {}

  provide<T>(key: DataKey, value: T, writer: PluginName): DataEntry<T> {
    const entry: DataEntry<T> = {
      key,
      value,
      tick: this.clock(),
      writtenBy: writer,
    };
    this.store.set(key, entry);
    return entry;
  }

  get<T>(key: DataKey, fallback: T): T {
    const entry = this.store.get(key);
    return entry ? (entry.value as T) : fallback;
  }

  require<T>(key: DataKey, message?: string): T {
    const entry = this.store.get(key);
    if (!entry) {
      throw new MissingDependencyError(
        message ?? `Required data key "${key}" has not been provided. Make sure its provider is registered and runs earlier in load order.`,
        [key],
      );
    }
    return entry.value as T;
  }

  has(key: DataKey): boolean {
    return this.store.has(key);
  }

  entry(key: DataKey): DataEntry | undefined {
    return this.store.get(key);
  }

  keys(): readonly DataKey[] {
    return [...this.store.keys()];
  }

  writesBy(writer: PluginName): readonly DataKey[] {
    const keys: DataKey[] = [];
    for (const [key, entry] of this.store) {
      if (entry.writtenBy === writer) keys.push(key);
    }
    return keys;
  }

  snapshot(): Record<DataKey, DataEntry> {
    const entries: Record<DataKey, DataEntry> = {};
    for (const [key, entry] of this.store) {
      entries[key] = entry;
    }
    return entries;
  }

  clear(): void {
    this.store.clear();
  }
}
