import { describe, it, expect } from "vitest";
import {
  computeRenderOrder,
  resolveLoadOrder,
  type ResolverNode,
} from "../src/core/resolver.js";
import type { PluginMetadata } from "../src/plugins/api.js";

// ─── Helper: resolver node ──────────────────────────────────────────

function node(
  name: string,
  order: number,
  meta: Partial<PluginMetadata> = {},
  flags: { enabled?: boolean; failed?: boolean } = {},
): ResolverNode {
  return {
    name,
    metadata: { name, version: "1.0.0", ...meta },
    order,
    enabled: flags.enabled ?? true,
    failed: flags.failed ?? false,
  };
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("resolveLoadOrder — hard dependencies", () => {
  it("places a dependency before its dependent regardless of registration order", () => {
    const result = resolveLoadOrder([
      node("navigation", 0, { dependencies: ["gps"] }),
      node("gps", 1),
    ]);

    expect(result.loadOrder).toEqual(["gps", "navigation"]);
    expect(result.failures.size).toBe(0);
  });

  it("orders a diamond with registration order as tie-break", () => {
    const result = resolveLoadOrder([
      node("D", 0, { dependencies: ["B", "C"] }),
      node("C", 1, { dependencies: ["A"] }),
      node("B", 2, { dependencies: ["A"] }),
      node("A", 3),
    ]);

    expect(result.loadOrder).toEqual(["A", "C", "B", "D"]);
  });

  it("keeps independent plugins in registration order", () => {
    const result = resolveLoadOrder([node("x", 0), node("y", 1), node("z", 2)]);
    expect(result.loadOrder).toEqual(["x", "y", "z"]);
  });

  it("breaks registration-order ties by name", () => {
    const result = resolveLoadOrder([node("b", 0), node("a", 0)]);
    expect(result.loadOrder).toEqual(["a", "b"]);
  });

  it("is independent of input array order", () => {
    const nodes = [
      node("D", 0, { dependencies: ["B", "C"] }),
      node("C", 1, { dependencies: ["A"] }),
      node("B", 2, { dependencies: ["A"] }),
      node("A", 3),
    ];
    const forward = resolveLoadOrder(nodes);
    const backward = resolveLoadOrder([...nodes].reverse());
    expect(backward.loadOrder).toEqual(forward.loadOrder);
  });
});

describe("resolveLoadOrder — cycles", () => {
  it("fails every cycle member and keeps unrelated plugins", () => {
    const result = resolveLoadOrder([
      node("X", 0, { dependencies: ["Y"] }),
      node("Y", 1, { dependencies: ["X"] }),
      node("Z", 2),
    ]);

    expect(result.loadOrder).toEqual(["Z"]);
    expect(result.cycles).toEqual([["X", "Y"]]);
    expect(result.failures.get("X")).toEqual({ kind: "circular-dependency", cycle: ["X", "Y"] });
    expect(result.failures.get("Y")).toEqual({ kind: "circular-dependency", cycle: ["X", "Y"] });
    expect(result.failures.has("Z")).toBe(false);
  });

  it("reports a three-member cycle with members in registration order", () => {
    const result = resolveLoadOrder([
      node("c", 0, { dependencies: ["a"] }),
      node("a", 1, { dependencies: ["b"] }),
      node("b", 2, { dependencies: ["c"] }),
    ]);

    expect(result.cycles).toEqual([["c", "a", "b"]]);
    expect(result.loadOrder).toEqual([]);
  });

  it("treats a self-dependency as a cycle", () => {
    const result = resolveLoadOrder([node("self", 0, { dependencies: ["self"] })]);
    expect(result.cycles).toEqual([["self"]]);
    expect(result.failures.get("self")?.kind).toBe("circular-dependency");
  });

  it("cascades a cycle failure to dependents", () => {
    const result = resolveLoadOrder([
      node("X", 0, { dependencies: ["Y"] }),
      node("Y", 1, { dependencies: ["X"] }),
      node("W", 2, { dependencies: ["X"] }),
    ]);

    expect(result.failures.get("W")).toEqual({
      kind: "missing-dependency",
      missing: [{ name: "X", reason: "failed" }],
    });
    expect(result.loadOrder).toEqual([]);
  });
});

describe("resolveLoadOrder — missing dependencies", () => {
  it("fails a plugin whose dependency is not registered", () => {
    const result = resolveLoadOrder([node("N", 0, { dependencies: ["Ghost"] }), node("ok", 1)]);

    expect(result.failures.get("N")).toEqual({
      kind: "missing-dependency",
      missing: [{ name: "Ghost", reason: "not-registered" }],
    });
    expect(result.loadOrder).toEqual(["ok"]);
  });

  it("cascades transitively to a fixpoint", () => {
    const result = resolveLoadOrder([
      node("top", 0, { dependencies: ["mid"] }),
      node("mid", 1, { dependencies: ["Ghost"] }),
    ]);

    expect(result.failures.get("mid")?.kind).toBe("missing-dependency");
    expect(result.failures.get("top")).toEqual({
      kind: "missing-dependency",
      missing: [{ name: "mid", reason: "failed" }],
    });
  });

  it("treats an already-failed plugin as a failed dependency", () => {
    const result = resolveLoadOrder([
      node("broken", 0, {}, { failed: true }),
      node("user", 1, { dependencies: ["broken"] }),
      node("other", 2),
    ]);

    expect(result.failures.has("broken")).toBe(false);
    expect(result.failures.get("user")).toEqual({
      kind: "missing-dependency",
      missing: [{ name: "broken", reason: "failed" }],
    });
    expect(result.loadOrder).toEqual(["other"]);
  });
});

describe("resolveLoadOrder — soft dependencies", () => {
  it("places a provider before its consumer", () => {
    const result = resolveLoadOrder([
      node("display", 0, { consumes: ["position"] }),
      node("gps", 1, { provides: ["position"] }),
    ]);

    expect(result.loadOrder).toEqual(["gps", "display"]);
    expect(result.softEdges).toEqual([{ provider: "gps", consumer: "display", key: "position" }]);
  });

  it("places a consumer after every provider of a key", () => {
    const result = resolveLoadOrder([
      node("consumer", 0, { consumes: ["k"] }),
      node("p1", 1, { provides: ["k"] }),
      node("p2", 2, { provides: ["k"] }),
    ]);

    expect(result.loadOrder).toEqual(["p1", "p2", "consumer"]);
  });

  it("ignores disabled providers", () => {
    const result = resolveLoadOrder([
      node("consumer", 0, { consumes: ["k"] }),
      node("provider", 1, { provides: ["k"] }, { enabled: false }),
    ]);

    expect(result.loadOrder).toEqual(["consumer", "provider"]);
    expect(result.softEdges).toEqual([]);
  });

  it("does not fail when a consumed key has no provider", () => {
    const result = resolveLoadOrder([node("lonely", 0, { consumes: ["nothing"] })]);
    expect(result.loadOrder).toEqual(["lonely"]);
    expect(result.failures.size).toBe(0);
  });

  it("drops the soft edge that would close a cycle instead of failing", () => {
    const result = resolveLoadOrder([
      node("A", 0, { provides: ["a"], consumes: ["b"] }),
      node("B", 1, { provides: ["b"], consumes: ["a"] }),
    ]);

    expect(result.failures.size).toBe(0);
    expect(result.loadOrder).toEqual(["B", "A"]);
    expect(result.softEdges).toEqual([{ provider: "B", consumer: "A", key: "b" }]);
    expect(result.ignoredSoftEdges).toEqual([{ provider: "A", consumer: "B", key: "a" }]);
  });

  it("never lets a soft edge override a hard edge", () => {
    const result = resolveLoadOrder([
      node("hud", 0, { provides: ["x"], dependencies: ["core"] }),
      node("core", 1, { consumes: ["x"] }),
    ]);

    expect(result.loadOrder).toEqual(["core", "hud"]);
    expect(result.ignoredSoftEdges).toEqual([{ provider: "hud", consumer: "core", key: "x" }]);
  });
});

describe("computeRenderOrder", () => {
  it("sorts by zIndex and breaks ties by load order", () => {
    const order = computeRenderOrder(
      [
        { name: "A", zIndex: 10 },
        { name: "B", zIndex: 5 },
        { name: "C", zIndex: 10 },
      ],
      ["A", "B", "C"],
    );
    expect(order).toEqual(["B", "A", "C"]);
  });

  it("handles negative zIndex", () => {
    const order = computeRenderOrder(
      [
        { name: "front", zIndex: 1 },
        { name: "back", zIndex: -3 },
      ],
      ["front", "back"],
    );
    expect(order).toEqual(["back", "front"]);
  });
});
