/**
 * Tickframe CLI Entrypoint
 *
 * Command dispatcher for inspecting a runtime assembled from a JSON
 * manifest. All commands go through the PluginRuntime; the CLI never
 * touches plugin instances directly.
 *
 * Commands:
 *   tickframe status     — tick, plugin states, event history
 *   tickframe plugins    — registered plugins with config
 *   tickframe order      — load order and render order
 *   tickframe failures   — recorded plugin failures
 *   tickframe tick [n]   — run n headless ticks and print the last frame
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { PluginRuntime } from "../core/runtime.js";
import { describeCause } from "../core/errors.js";
import type { LogLevel } from "../core/logger.js";
import { loadRuntimeManifest } from "../config/runtime-config.js";
import { FileDefinitionSource } from "../reload/file-source.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface CliContext {
  runtime: PluginRuntime;
  args: string[];
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
}

export interface CommandResult {
  exitCode: number;
  output?: string;
}

export type CommandHandler = (ctx: CliContext, subArgs: string[]) => Promise<CommandResult>;

export const DEFAULT_MANIFEST = "tickframe.json";

/** Delta used by `tick` when none is given (60 Hz) */
export const DEFAULT_TICK_DELTA = 1 / 60;

// ─── Command Registry ───────────────────────────────────────────────

const commands = new Map<string, CommandHandler>();

/** Register a CLI command */
export function registerCommand(name: string, handler: CommandHandler): void {
  commands.set(name, handler);
}

// ─── Built-in Commands ──────────────────────────────────────────────

registerCommand("status", async (ctx) => {
  ctx.stdout("Tickframe Status\n");

  const runtime = ctx.runtime;
  const plugins = runtime.pluginNames();

  ctx.stdout(`  Tick:           ${runtime.currentTick}\n`);
  ctx.stdout(`  Plugins:        ${plugins.length}\n`);
  for (const name of plugins) {
    ctx.stdout(`  [${runtime.getState(name)}] ${name}\n`);
  }
  ctx.stdout(`  Event history:  ${runtime.events.history().length} events\n`);

  return { exitCode: 0 };
});

registerCommand("plugins", async (ctx) => {
  ctx.stdout("Tickframe Plugins\n");

  const plugins = ctx.runtime.list();
  if (plugins.length === 0) {
    ctx.stdout("  No plugins registered.\n");
  }
  for (const p of plugins) {
    const flags = [p.enabled ? "enabled" : "disabled", p.visible ? "visible" : "hidden", `z=${p.zIndex}`];
    ctx.stdout(`  • ${p.name} v${p.version} [${p.state}] ${flags.join(" ")}\n`);
  }
  return { exitCode: 0 };
});

registerCommand("order", async (ctx) => {
  ctx.stdout("Tickframe Order\n");
  ctx.stdout(`  Load:   ${arrow(ctx.runtime.loadOrder())}\n`);
  ctx.stdout(`  Render: ${arrow(ctx.runtime.renderOrder())}\n`);
  return { exitCode: 0 };
});

registerCommand("failures", async (ctx) => {
  ctx.stdout("Tickframe Failures\n");

  const failures = ctx.runtime.failures();
  if (failures.length === 0) {
    ctx.stdout("  No failures.\n");
    return { exitCode: 0 };
  }
  for (const f of failures) {
    ctx.stdout(`  [${f.kind}] ${f.plugin}: ${f.message}\n`);
  }
  return { exitCode: 1, output: `${failures.length} failure(s)` };
});

registerCommand("tick", async (ctx, subArgs) => {
  const count = subArgs[0] === undefined ? 1 : Number(subArgs[0]);
  const delta = subArgs[1] === undefined ? DEFAULT_TICK_DELTA : Number(subArgs[1]);

  if (!Number.isInteger(count) || count < 1) {
    ctx.stderr(`  Tick count must be a positive integer, got "${subArgs[0]}"\n`);
    return { exitCode: 1 };
  }
  if (!Number.isFinite(delta) || delta < 0) {
    ctx.stderr(`  Tick delta must be a non-negative number, got "${subArgs[1]}"\n`);
    return { exitCode: 1 };
  }

  const before = ctx.runtime.failures().length;
  let frame: unknown = [];
  for (let i = 0; i < count; i++) {
    frame = ctx.runtime.tick(delta, []);
  }
  const added = ctx.runtime.failures().length - before;

  ctx.stdout(`Ran ${count} tick(s); now at tick ${ctx.runtime.currentTick}\n`);
  if (Array.isArray(frame)) {
    for (const line of frame) ctx.stdout(`  | ${String(line)}\n`);
  }
  if (added > 0) ctx.stdout(`  New failures: ${added}\n`);
  return { exitCode: added > 0 ? 1 : 0 };
});

registerCommand("help", async (ctx) => {
  ctx.stdout("Tickframe — per-frame plugin runtime\n\n");
  ctx.stdout("Usage: tickframe <command> [--manifest path] [--log-level level]\n\n");
  ctx.stdout("Commands:\n");
  ctx.stdout("  status     Tick, plugin states and event history\n");
  ctx.stdout("  plugins    List registered plugins and their config\n");
  ctx.stdout("  order      Show load order and render order\n");
  ctx.stdout("  failures   List recorded plugin failures\n");
  ctx.stdout("  tick       Run [n] headless ticks with delta [dt] seconds\n");
  ctx.stdout("  help       Show this help message\n");
  return { exitCode: 0 };
});

// ─── Dispatcher ─────────────────────────────────────────────────────

/** Dispatch a CLI command by name */
export async function dispatch(ctx: CliContext): Promise<CommandResult> {
  const [command, ...subArgs] = ctx.args;

  const handler = commands.get(!command || command === "--help" ? "help" : command);
  if (!handler) {
    ctx.stderr(`Unknown command: ${command}\nRun "tickframe help" for usage.\n`);
    return { exitCode: 1 };
  }

  return handler(ctx, subArgs);
}

/** Get all registered command names */
export function registeredCommands(): readonly string[] {
  return [...commands.keys()];
}

// ─── Main Entry Point ───────────────────────────────────────────────

export interface MainIo {
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
}

const processIo: MainIo = {
  stdout: (msg) => process.stdout.write(msg),
  stderr: (msg) => process.stderr.write(msg),
};

/**
 * Parse argv, assemble a runtime from the manifest, boot it, run the
 * command and shut down.
 */
export async function main(argv?: string[], io: MainIo = processIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv ?? process.argv.slice(2));
  } catch (err) {
    io.stderr(`${describeCause(err)}\n`);
    return 1;
  }

  const { values, positionals } = parsed;
  const logLevel = values["log-level"] ?? "warn";
  if (!isLogLevel(logLevel)) {
    io.stderr(`Unknown log level: ${logLevel}\n`);
    return 1;
  }

  const runtime = new PluginRuntime({ logLevel });
  const args = values.help ? ["help"] : positionals;
  const ctx: CliContext = { runtime, args, ...io };

  if (args.length === 0 || args[0] === "help") {
    return (await dispatch(ctx)).exitCode;
  }

  const manifestPath = values.manifest ?? DEFAULT_MANIFEST;
  if (values.manifest !== undefined || existsSync(manifestPath)) {
    try {
      await registerFromManifest(runtime, manifestPath, io);
    } catch (err) {
      io.stderr(`${describeCause(err)}\n`);
      return 1;
    }
  }

  runtime.boot();
  const result = await dispatch(ctx);
  runtime.shutdown();
  return result.exitCode;
}

/**
 * Import and register every module the manifest lists. A module that
 * cannot be loaded or registered is reported and skipped.
 */
export async function registerFromManifest(
  runtime: PluginRuntime,
  manifestPath: string,
  io: MainIo,
  source: FileDefinitionSource = new FileDefinitionSource(),
): Promise<number> {
  const manifest = loadRuntimeManifest(manifestPath);
  let registered = 0;

  for (const entry of manifest.plugins) {
    try {
      const definition = await source.loadFile(entry.module);
      runtime.register(definition, {
        ...entry.config,
        settings: { ...manifest.settings, ...entry.config.settings },
      });
      registered++;
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      io.stderr(`Skipping ${entry.module}: ${describeCause(err)}\n`);
    }
  }
  return registered;
}

// ─── Utilities ──────────────────────────────────────────────────────

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      manifest: { type: "string", short: "m" },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });
}

function arrow(names: readonly string[]): string {
  return names.length > 0 ? names.join(" → ") : "(none)";
}

function isLogLevel(value: string): value is LogLevel {
  return ["debug", "info", "warn", "error", "silent"].includes(value);
}
