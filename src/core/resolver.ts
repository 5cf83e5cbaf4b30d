/**
 * Tickframe Dependency Resolver
 *
 * Pure function from the registry's (name, metadata) pairs to a load order.
 *
 * Graph:
 *   hard edges  dependency → dependent   (from `dependencies`; can fail a plugin)
 *   soft edges  provider   → consumer    (from `consumes`/`provides`; ordering only)
 *
 * Steps:
 *   1. Cycle detection over hard edges (Tarjan SCC). Every member of a cycle fails.
 *   2. Missing/failed hard dependencies, cascaded to a fixpoint.
 *   3. Soft edges from every enabled surviving provider, skipping any edge
 *      that would close a cycle.
 *   4. Kahn's algorithm; ready ties broken by registration order, then name.
 *
 * Same input → same output.
 */

import type { PluginMetadata, PluginName, DataKey } from "../plugins/api.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface ResolverNode {
  readonly name: PluginName;
  readonly metadata: PluginMetadata;
  /** Registration index (primary tie-break) */
  readonly order: number;
  /** Disabled providers do not create soft edges */
  readonly enabled: boolean;
  /** Already failed before this resolution (init, runtime or reload failure) */
  readonly failed: boolean;
}

export interface MissingDependency {
  readonly name: PluginName;
  readonly reason: "not-registered" | "failed";
}

export type ResolutionFailure =
  | { readonly kind: "circular-dependency"; readonly cycle: readonly PluginName[] }
  | { readonly kind: "missing-dependency"; readonly missing: readonly MissingDependency[] };

export interface SoftEdge {
  readonly provider: PluginName;
  readonly consumer: PluginName;
  readonly key: DataKey;
}

export interface Resolution {
  /** Every surviving plugin, dependencies strictly before dependents */
  readonly loadOrder: readonly PluginName[];
  /** Plugins that cannot be initialized, keyed by name */
  readonly failures: ReadonlyMap<PluginName, ResolutionFailure>;
  /** Hard-dependency cycles, members in registration order */
  readonly cycles: readonly (readonly PluginName[])[];
  readonly softEdges: readonly SoftEdge[];
  /** Soft edges dropped because they would have closed a cycle */
  readonly ignoredSoftEdges: readonly SoftEdge[];
}

// ─── Resolver ───────────────────────────────────────────────────────

export function resolveLoadOrder(nodes: readonly ResolverNode[]): Resolution {
  const sorted = [...nodes].sort(compareNodes);
  const byName = new Map<PluginName, ResolverNode>();
  for (const node of sorted) byName.set(node.name, node);

  const failures = new Map<PluginName, ResolutionFailure>();
  const isDead = (name: PluginName): boolean =>
    failures.has(name) || (byName.get(name)?.failed ?? false);

  // 1. Hard cycles
  const cycles = findHardCycles(sorted, byName);
  for (const cycle of cycles) {
    for (const member of cycle) {
      failures.set(member, { kind: "circular-dependency", cycle });
    }
  }

  // 2. Missing / failed dependencies, cascaded
  let changed = true;
  while (changed) {
    changed = false;
    for (const node of sorted) {
      if (isDead(node.name)) continue;

      const missing: MissingDependency[] = [];
      for (const dep of unique(node.metadata.dependencies ?? [])) {
        if (!byName.has(dep)) missing.push({ name: dep, reason: "not-registered" });
        else if (isDead(dep)) missing.push({ name: dep, reason: "failed" });
      }

      if (missing.length > 0) {
        failures.set(node.name, { kind: "missing-dependency", missing });
        changed = true;
      }
    }
  }

  const survivors = sorted.filter((n) => !isDead(n.name));

  // Adjacency over survivors: from → [to]
  const graph = new Map<PluginName, PluginName[]>();
  for (const node of survivors) graph.set(node.name, []);

  for (const node of survivors) {
    for (const dep of unique(node.metadata.dependencies ?? [])) {
      addEdge(graph, dep, node.name);
    }
  }

  // 3. Soft edges
  const providers = new Map<DataKey, ResolverNode[]>();
  for (const node of survivors) {
    if (!node.enabled) continue;
    for (const key of unique(node.metadata.provides ?? [])) {
      const list = providers.get(key) ?? [];
      list.push(node);
      providers.set(key, list);
    }
  }

  const softEdges: SoftEdge[] = [];
  const ignoredSoftEdges: SoftEdge[] = [];

  for (const consumer of survivors) {
    for (const key of unique(consumer.metadata.consumes ?? [])) {
      for (const provider of providers.get(key) ?? []) {
        if (provider.name === consumer.name) continue;

        const edge: SoftEdge = { provider: provider.name, consumer: consumer.name, key };
        if (hasEdge(graph, provider.name, consumer.name)) {
          softEdges.push(edge);
          continue;
        }
        if (reachable(graph, consumer.name, provider.name)) {
          ignoredSoftEdges.push(edge);
          continue;
        }
        addEdge(graph, provider.name, consumer.name);
        softEdges.push(edge);
      }
    }
  }

  // 4. Kahn's algorithm with deterministic ready-set ordering
  const inDegree = new Map<PluginName, number>();
  for (const node of survivors) inDegree.set(node.name, 0);
  for (const targets of graph.values()) {
    for (const to of targets) inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
  }

  const ready: ResolverNode[] = survivors.filter((n) => inDegree.get(n.name) === 0);
  const loadOrder: PluginName[] = [];

  while (ready.length > 0) {
    ready.sort(compareNodes);
    const current = ready.shift();
    if (!current) break;
    loadOrder.push(current.name);

    for (const to of graph.get(current.name) ?? []) {
      const remaining = (inDegree.get(to) ?? 1) - 1;
      inDegree.set(to, remaining);
      const target = byName.get(to);
      if (remaining === 0 && target) ready.push(target);
    }
  }

  return { loadOrder, failures, cycles, softEdges, ignoredSoftEdges };
}

// ─── Render Order ───────────────────────────────────────────────────

export interface RenderCandidate {
  readonly name: PluginName;
  readonly zIndex: number;
}

/**
 * Ascending zIndex, ties broken by load order. Independent of the
 * dependency graph; callers pass only visible, active plugins.
 */
export function computeRenderOrder(
  candidates: readonly RenderCandidate[],
  loadOrder: readonly PluginName[],
): PluginName[] {
  const position = new Map<PluginName, number>();
  loadOrder.forEach((name, idx) => position.set(name, idx));
  const rank = (name: PluginName) => position.get(name) ?? Number.MAX_SAFE_INTEGER;

  return [...candidates]
    .sort((a, b) => a.zIndex - b.zIndex || rank(a.name) - rank(b.name))
    .map((c) => c.name);
}

// ─── Internal ───────────────────────────────────────────────────────

function compareNodes(a: ResolverNode, b: ResolverNode): number {
  if (a.order !== b.order) return a.order - b.order;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)];
}

function addEdge(graph: Map<PluginName, PluginName[]>, from: PluginName, to: PluginName): void {
  const targets = graph.get(from);
  if (targets && !targets.includes(to)) targets.push(to);
}

function hasEdge(graph: Map<PluginName, PluginName[]>, from: PluginName, to: PluginName): boolean {
  return graph.get(from)?.includes(to) ?? false;
}

function reachable(graph: Map<PluginName, PluginName[]>, from: PluginName, to: PluginName): boolean {
  const seen = new Set<PluginName>();
  const stack = [from];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    if (current === to) return true;
    seen.add(current);
    stack.push(...(graph.get(current) ?? []));
  }
  return false;
}

/**
 * Tarjan's strongly connected components over hard edges between registered,
 * not-yet-failed plugins. Components with more than one member, or with a
 * self edge, are cycles.
 */
function findHardCycles(
  sorted: readonly ResolverNode[],
  byName: ReadonlyMap<PluginName, ResolverNode>,
): PluginName[][] {
  const live = (name: PluginName) => {
    const node = byName.get(name);
    return node !== undefined && !node.failed;
  };

  let counter = 0;
  const index = new Map<PluginName, number>();
  const lowLink = new Map<PluginName, number>();
  const onStack = new Set<PluginName>();
  const stack: PluginName[] = [];
  const cycles: PluginName[][] = [];

  const edgesOf = (name: PluginName): PluginName[] =>
    unique(byName.get(name)?.metadata.dependencies ?? []).filter(live);

  const strongConnect = (name: PluginName): void => {
    index.set(name, counter);
    lowLink.set(name, counter);
    counter++;
    stack.push(name);
    onStack.add(name);

    for (const dep of edgesOf(name)) {
      if (!index.has(dep)) {
        strongConnect(dep);
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, lowLink.get(dep) ?? 0));
      } else if (onStack.has(dep)) {
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, index.get(dep) ?? 0));
      }
    }

    if (lowLink.get(name) !== index.get(name)) return;

    const component: PluginName[] = [];
    let member: PluginName | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      component.push(member);
    } while (member !== name);

    const selfLoop = component.length === 1 && edgesOf(name).includes(name);
    if (component.length > 1 || selfLoop) {
      const ordered = component
        .map((n) => byName.get(n))
        .filter((n): n is ResolverNode => n !== undefined)
        .sort(compareNodes)
        .map((n) => n.name);
      cycles.push(ordered);
    }
  };

  for (const node of sorted) {
    if (!node.failed && !index.has(node.name)) strongConnect(node.name);
  }

  // Report cycles in order of their earliest-registered member
  const first = (cycle: PluginName[]) => byName.get(cycle[0])?.order ?? 0;
  return cycles.sort((a, b) => first(a) - first(b));
}
