import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, unlinkSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { FileDefinitionSource } from "../src/reload/file-source.js";
import { ConfigurationError } from "../src/core/errors.js";
import { createLogger } from "../src/core/logger.js";
import { definePlugin, MetadataBuilder } from "../src/sdk/plugin-sdk.js";
import type { Plugin } from "../src/plugins/api.js";
import { captureLogs } from "./helpers.js";

const noop: Plugin = {
  initialize: () => true,
  update: () => undefined,
  render: (frame) => frame,
};

function definition(name: string) {
  return definePlugin(MetadataBuilder.create(name).build(), () => noop);
}

describe("FileDefinitionSource", () => {
  let dir: string;
  let imported: string[];
  let modules: Map<string, unknown>;
  let source: FileDefinitionSource;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tickframe-"));
    imported = [];
    modules = new Map();
    source = new FileDefinitionSource({
      log: createLogger("file-source", { level: "silent" }),
      importer: async (url) => {
        imported.push(url);
        return modules.get(url.split("?")[0]);
      },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  /** Write a placeholder file and register the namespace the fake importer returns for it */
  function pluginFile(file: string, namespace: unknown): string {
    const path = join(dir, file);
    writeFileSync(path, "export {};\n");
    modules.set(pathToFileURL(path).href, namespace);
    return path;
  }

  it("discovers plugin modules sorted by name, skipping private files", async () => {
    writeFileSync(join(dir, "b.js"), "");
    writeFileSync(join(dir, "a.mjs"), "");
    writeFileSync(join(dir, "_helpers.js"), "");
    writeFileSync(join(dir, "readme.md"), "");
    mkdirSync(join(dir, "nested.js"));

    expect(await source.discover(dir)).toEqual([join(dir, "a.mjs"), join(dir, "b.js")]);
  });

  it("imports a file with a cache-busting query and extracts the default export", async () => {
    const path = pluginFile("gps.js", { default: definition("gps") });

    const loaded = await source.loadFile(path);

    expect(loaded.metadata.name).toBe("gps");
    expect(imported).toHaveLength(1);
    expect(imported[0].startsWith(`${pathToFileURL(path).href}?v=`)).toBe(true);
    expect(source.pathOf("gps")).toBe(path);
  });

  it("accepts a named plugin export", async () => {
    const path = pluginFile("hud.mjs", { plugin: definition("hud") });
    const loaded = await source.loadFile(path);
    expect(loaded.metadata.name).toBe("hud");
  });

  it("rejects a module without a plugin definition", async () => {
    const path = pluginFile("empty.js", { helper: 1 });

    await expect(source.loadFile(path)).rejects.toThrow(ConfigurationError);
    await expect(source.loadFile(path)).rejects.toThrow(
      `Module "${path}" must export a plugin definition as "default" or "plugin"`,
    );
  });

  it("re-imports by plugin name with a fresh URL", async () => {
    const path = pluginFile("gps.js", { default: definition("gps") });
    await source.loadFile(path);

    await source.load("gps");

    expect(imported).toHaveLength(2);
    expect(imported[0]).not.toBe(imported[1]);
  });

  it("refuses to load a plugin it has never seen", async () => {
    await expect(source.load("ghost")).rejects.toThrow(
      'Reload of plugin "ghost" failed: no source file is known for this plugin',
    );
  });

  it("reports plugins whose file changed since the last load", async () => {
    const path = pluginFile("gps.js", { default: definition("gps") });
    await source.loadFile(path);
    expect(await source.modified()).toEqual([]);

    const later = new Date(Date.now() + 60_000);
    utimesSync(path, later, later);
    expect(await source.modified()).toEqual(["gps"]);

    await source.load("gps");
    expect(await source.modified()).toEqual([]);
  });

  it("skips and logs files that disappeared", async () => {
    const logs = captureLogs();
    const watched = new FileDefinitionSource({
      log: createLogger("file-source", { sink: logs.sink }),
      importer: async (url) => modules.get(url.split("?")[0]),
    });
    const path = pluginFile("gps.js", { default: definition("gps") });
    await watched.loadFile(path);
    logs.entries.length = 0;
    unlinkSync(path);

    expect(await watched.modified()).toEqual([]);
    expect(logs.entries.map((e) => e.level)).toEqual(["warn"]);
  });
});

describe("FileDefinitionSource.toDefinition", () => {
  const source = new FileDefinitionSource({ log: createLogger("file-source", { level: "silent" }) });

  it("prefers the default export", () => {
    const def = source.toDefinition({ default: definition("a"), plugin: definition("b") });
    expect(def.metadata.name).toBe("a");
  });

  it("rejects non-object namespaces", () => {
    expect(() => source.toDefinition(undefined, "x.js")).toThrow(
      'Module "x.js" must export a plugin definition as "default" or "plugin"',
    );
  });
});
