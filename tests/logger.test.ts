import { describe, it, expect, vi, afterEach } from "vitest";
import { consoleSink, createLogger } from "../src/core/logger.js";
import { captureLogs } from "./helpers.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tags entries with the scope and drops those below the level", () => {
    const logs = captureLogs();
    const log = createLogger("gps", { level: "warn", sink: logs.sink });

    log.debug("noise");
    log.info("noise");
    log.warn("no fix", { satellites: 2 });
    log.error("antenna lost");

    expect(logs.entries).toEqual([
      { level: "warn", scope: "gps", message: "no fix", data: { satellites: 2 } },
      { level: "error", scope: "gps", message: "antenna lost" },
    ]);
  });

  it("defaults to info", () => {
    const logs = captureLogs();
    const log = createLogger("runtime", { sink: logs.sink });

    log.debug("hidden");
    log.info("shown");

    expect(logs.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("emits nothing when silent", () => {
    const logs = captureLogs();
    const log = createLogger("runtime", { level: "silent", sink: logs.sink });

    log.error("dropped");

    expect(logs.entries).toEqual([]);
  });

  it("writes to the matching console method with a scope prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    consoleSink({ level: "warn", scope: "hud", message: "slow frame" });
    consoleSink({ level: "error", scope: "hud", message: "crash", data: { tick: 3 } });

    expect(warn).toHaveBeenCalledWith("[hud]", "slow frame");
    expect(error).toHaveBeenCalledWith("[hud]", "crash", { tick: 3 });
  });
});
