import type {
  KeyCode,
  LifecycleResult,
  Plugin,
  PluginContext,
  PluginDefinition,
  PluginMetadata,
  RuntimeEvent,
} from "../src/plugins/api.js";
import type { LogEntry, LogSink } from "../src/core/logger.js";

// ─── Helper: scripted plugin ────────────────────────────────────────

export type Frame = string[];

export interface Hooks {
  initialize?: (ctx: PluginContext) => boolean | LifecycleResult;
  update?: (ctx: PluginContext, deltaTime: number) => void;
  render?: (ctx: PluginContext, frame: Frame) => Frame;
  handleKey?: (ctx: PluginContext, key: KeyCode) => boolean;
  handleEvent?: (ctx: PluginContext, event: RuntimeEvent) => void;
  cleanup?: (ctx: PluginContext) => void;
}

type MetadataInput = Partial<PluginMetadata> & { name: string };

/**
 * Plugin that appends "<name>.<hook>" to `trace` on every call and, by
 * default, renders by appending its name to the frame.
 */
export function scripted(meta: MetadataInput, trace: string[], hooks: Hooks = {}): PluginDefinition<Frame> {
  const metadata: PluginMetadata = { version: "1.0.0", ...meta };
  const name = metadata.name;

  return {
    metadata,
    create(ctx): Plugin<Frame> {
      const plugin: Plugin<Frame> = {
        initialize() {
          trace.push(`${name}.init`);
          return hooks.initialize ? hooks.initialize(ctx) : true;
        },
        update(deltaTime) {
          trace.push(`${name}.update`);
          hooks.update?.(ctx, deltaTime);
        },
        render(frame) {
          trace.push(`${name}.render`);
          return hooks.render ? hooks.render(ctx, frame) : [...frame, name];
        },
        handleEvent(event) {
          trace.push(`${name}.event:${event.topic}`);
          hooks.handleEvent?.(ctx, event);
        },
        cleanup() {
          trace.push(`${name}.cleanup`);
          hooks.cleanup?.(ctx);
        },
      };
      const onKey = hooks.handleKey;
      if (onKey) {
        plugin.handleKey = (key) => {
          trace.push(`${name}.key:${key}`);
          return onKey(ctx, key);
        };
      }
      return plugin;
    },
  };
}

/** Names of plugins whose `hook` ran, in call order */
export function calls(trace: readonly string[], hook: string): string[] {
  const suffix = `.${hook}`;
  return trace.filter((t) => t.endsWith(suffix)).map((t) => t.slice(0, -suffix.length));
}

// ─── Helper: captured logs ──────────────────────────────────────────

export function captureLogs(): { entries: LogEntry[]; sink: LogSink } {
  const entries: LogEntry[] = [];
  return { entries, sink: (entry) => entries.push(entry) };
}
