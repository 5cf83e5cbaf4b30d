/**
 * Tickframe — per-frame plugin runtime
 *
 * Public API surface. This is the only entry point for consumers.
 */

// Core
export { PluginRuntime } from "./core/runtime.js";
export { TickEventBus, WILDCARD, DEFAULT_HISTORY_LIMIT, matches } from "./core/event-bus.js";
export { resolveLoadOrder, computeRenderOrder } from "./core/resolver.js";
export { createLogger, consoleSink } from "./core/logger.js";
export {
  TickframeError,
  ConfigurationError,
  CircularDependencyError,
  MissingDependencyError,
  InitializationError,
  RuntimeFaultError,
  ReloadError,
  RuntimeStateError,
} from "./core/errors.js";

// Types
export type { EventBus, EventBusOptions, EventHandler, Unsubscribe } from "./core/event-bus.js";
export type {
  FailureReport,
  PluginSummary,
  ReloadOutcome,
  RuntimeOptions,
} from "./core/runtime.js";
export type {
  MissingDependency,
  RenderCandidate,
  Resolution,
  ResolutionFailure,
  ResolverNode,
  SoftEdge,
} from "./core/resolver.js";
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from "./core/logger.js";
export type { ErrorCode, FaultPhase } from "./core/errors.js";
export { PLUGIN_API_VERSION } from "./plugins/api.js";
export type {
  DataKey,
  KeyCode,
  LifecycleResult,
  Logger,
  Plugin,
  PluginConfig,
  PluginContext,
  PluginDataAccess,
  PluginDefinition,
  PluginEventAccess,
  PluginMetadata,
  PluginName,
  PluginSettings,
  PluginState,
  RuntimeEvent,
  SemVer,
} from "./plugins/api.js";

// State
export { CoreDataBus } from "./state/data-bus.js";
export type { DataBus, DataEntry } from "./state/data-bus.js";

// Configuration
export {
  DEFAULT_PLUGIN_CONFIG,
  normalizePluginConfig,
  mergePluginConfig,
  parseRuntimeManifest,
  loadRuntimeManifest,
} from "./config/runtime-config.js";
export type { ManifestEntry, PluginConfigInput, RuntimeManifest } from "./config/runtime-config.js";

// Hot Reload
export { HotReloadManager, DEFAULT_DEBOUNCE_MS } from "./reload/hot-reload.js";
export type { HotReloadOptions, WatchFactory, Watcher } from "./reload/hot-reload.js";
export { FileDefinitionSource } from "./reload/file-source.js";
export type { DefinitionSource, FileSourceOptions, ModuleImporter } from "./reload/file-source.js";

// CLI
export { dispatch, registeredCommands, registerFromManifest, main as runCli } from "./cli/cli.js";
export type { CliContext, CommandResult, CommandHandler, MainIo } from "./cli/cli.js";

// Plugin SDK
export {
  BasePlugin,
  MetadataBuilder,
  definePlugin,
  isPluginDefinition,
  validateMetadata,
} from "./sdk/plugin-sdk.js";
export type { ValidationResult } from "./sdk/plugin-sdk.js";

// Bundled mock plugins
export { gpsProviderPlugin, GpsProviderPlugin } from "./mocks/gps-provider-plugin.js";
export type { Position } from "./mocks/gps-provider-plugin.js";
export { navigationPlugin, NavigationPlugin } from "./mocks/navigation-plugin.js";
export type { Route } from "./mocks/navigation-plugin.js";
export { fpsCounterPlugin, FpsCounterPlugin, FPS_TOGGLE_KEY } from "./mocks/fps-counter-plugin.js";
export type { TextFrame } from "./mocks/frame.js";
