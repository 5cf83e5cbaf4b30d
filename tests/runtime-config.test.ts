import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_PLUGIN_CONFIG,
  loadRuntimeManifest,
  mergePluginConfig,
  normalizePluginConfig,
  parseRuntimeManifest,
} from "../src/config/runtime-config.js";
import { ConfigurationError } from "../src/core/errors.js";

// ─── Plugin Config ──────────────────────────────────────────────────

describe("normalizePluginConfig", () => {
  it("fills every default", () => {
    expect(normalizePluginConfig()).toEqual({ enabled: true, visible: true, zIndex: 0, settings: {} });
  });

  it("keeps supplied values and copies settings", () => {
    const settings = { units: "metric" };
    const config = normalizePluginConfig({ enabled: false, zIndex: -2, settings });

    expect(config).toEqual({ enabled: false, visible: true, zIndex: -2, settings: { units: "metric" } });
    expect(config.settings).not.toBe(settings);
  });

  it("lists every invalid field in one error", () => {
    let caught: unknown;
    try {
      normalizePluginConfig({ enabled: "yes", zIndex: 1.5 }, "hud");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.message).toBe(
      'Plugin "hud": invalid config: "enabled" must be a boolean; "zIndex" must be an integer',
    );
    expect(caught.errors).toEqual(['"enabled" must be a boolean', '"zIndex" must be an integer']);
    expect(caught.plugins).toEqual(["hud"]);
  });

  it("rejects a non-object config", () => {
    expect(() => normalizePluginConfig(7)).toThrow("config must be an object");
    expect(() => normalizePluginConfig({ settings: [] })).toThrow('invalid config: "settings" must be an object');
  });

  it("exposes frozen defaults", () => {
    expect(Object.isFrozen(DEFAULT_PLUGIN_CONFIG)).toBe(true);
  });
});

describe("mergePluginConfig", () => {
  it("overrides only the supplied fields", () => {
    const base = normalizePluginConfig({ zIndex: 4, settings: { a: 1 } });
    expect(mergePluginConfig(base, { visible: false })).toEqual({
      enabled: true,
      visible: false,
      zIndex: 4,
      settings: { a: 1 },
    });
  });

  it("validates the merged result", () => {
    const base = normalizePluginConfig();
    expect(() => mergePluginConfig(base, { zIndex: Number.NaN }, "hud")).toThrow(
      'Plugin "hud": invalid config: "zIndex" must be an integer',
    );
  });
});

// ─── Runtime Manifest ───────────────────────────────────────────────

describe("parseRuntimeManifest", () => {
  it("resolves module paths against the base directory", () => {
    const manifest = parseRuntimeManifest(
      {
        plugins: [{ module: "./gps.js", zIndex: 2 }, { module: "/opt/hud.mjs", visible: false }],
        settings: { units: "metric" },
      },
      "/srv/app",
    );

    expect(manifest.plugins).toEqual([
      { module: "/srv/app/gps.js", config: { enabled: true, visible: true, zIndex: 2, settings: {} } },
      { module: "/opt/hud.mjs", config: { enabled: true, visible: false, zIndex: 0, settings: {} } },
    ]);
    expect(manifest.settings).toEqual({ units: "metric" });
  });

  it("accepts an empty manifest", () => {
    expect(parseRuntimeManifest({}, "/srv")).toEqual({ plugins: [], settings: {} });
  });

  it("reports every bad entry with its index", () => {
    expect(() =>
      parseRuntimeManifest({ plugins: [{ module: "" }, { module: "a.js", enabled: 1 }] }, "/srv"),
    ).toThrow(
      'Invalid runtime manifest: plugins[0].module must be a non-empty string; plugins[1]: "enabled" must be a boolean',
    );
  });

  it("rejects the wrong top-level shapes", () => {
    expect(() => parseRuntimeManifest([], "/srv")).toThrow("Runtime manifest must be an object");
    expect(() => parseRuntimeManifest({ plugins: {} }, "/srv")).toThrow('Runtime manifest "plugins" must be an array');
    expect(() => parseRuntimeManifest({ settings: 3 }, "/srv")).toThrow('Runtime manifest "settings" must be an object');
  });
});

describe("loadRuntimeManifest", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tickframe-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a manifest relative to its own directory", () => {
    const path = join(dir, "tickframe.json");
    writeFileSync(path, JSON.stringify({ plugins: [{ module: "plugins/gps.js" }] }));

    const manifest = loadRuntimeManifest(path);

    expect(manifest.plugins.map((p) => p.module)).toEqual([join(dir, "plugins", "gps.js")]);
  });

  it("wraps unreadable or malformed files in a ConfigurationError", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");

    expect(() => loadRuntimeManifest(path)).toThrow(ConfigurationError);
    expect(() => loadRuntimeManifest(join(dir, "missing.json"))).toThrow(
      `Cannot read runtime manifest "${join(dir, "missing.json")}"`,
    );
  });
});
