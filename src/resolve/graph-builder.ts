/**
 * Graph builder.
 * Purpose: expand target nodes into the full dependency graph with per-node effective config.
 * Assumptions: visitation is keyed by node key, so shared dependencies resolve once and cycles
 *   terminate expansion (the sorter reports them).
 * Usage: const resolved = await buildGraph(store, { service: "web", version: "v1" });
 */

import type { DescriptorStore } from "../descriptors/store.js";
import { BuildGraph } from "../graph/graph.js";
import { nodeKey, type BuildNode } from "../graph/node.js";

import { resolveEffectiveConfig, type EffectiveConfig } from "./config-resolver.js";
import { resolveDependency, type ResolvedDependency } from "./dependency-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type GraphTarget = {
  service: string;
  version?: string | null;
  platform?: string | null;
};

export type ResolvedNode = {
  node: BuildNode;
  config: EffectiveConfig;
  dependencies: ResolvedDependency[];
};

export type ResolvedGraph = {
  graph: BuildGraph;
  roots: BuildNode[];
  nodes: Map<string, ResolvedNode>;
  notes: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function buildGraph(
  store: DescriptorStore,
  target: GraphTarget,
): Promise<ResolvedGraph> {
  const rootConfig = await resolveEffectiveConfig(
    store,
    target.service,
    target.version,
    target.platform,
  );

  const graph = new BuildGraph();
  const nodes = new Map<string, ResolvedNode>();
  const notes: string[] = [];
  const queue: EffectiveConfig[] = [rootConfig];

  graph.addNode(rootConfig.node);
  const discovered = new Set<string>([nodeKey(rootConfig.node)]);

  while (queue.length > 0) {
    const config = queue.shift();
    if (!config) break;

    const dependencies: ResolvedDependency[] = [];
    for (const declaration of config.dependencies) {
      const resolved = await resolveDependency(store, declaration, {
        service: config.service,
        version: config.version,
        platform: config.platform,
      });
      dependencies.push(resolved);
      graph.addEdge(config.node, resolved.node);

      if (resolved.note && !notes.includes(resolved.note)) {
        notes.push(resolved.note);
      }

      const key = nodeKey(resolved.node);
      if (discovered.has(key)) continue;
      discovered.add(key);

      queue.push(
        await resolveEffectiveConfig(
          store,
          resolved.node.service,
          resolved.node.version,
          resolved.node.platform,
        ),
      );
    }

    nodes.set(nodeKey(config.node), { node: config.node, config, dependencies });
  }

  return { graph, roots: [rootConfig.node], nodes, notes };
}

export async function buildGraphs(
  store: DescriptorStore,
  targets: GraphTarget[],
): Promise<ResolvedGraph> {
  const graphs: ResolvedGraph[] = [];
  for (const target of targets) {
    graphs.push(await buildGraph(store, target));
  }
  return mergeResolvedGraphs(graphs);
}

/** Union of several resolved graphs; nodes and edges are deduplicated structurally. */
export function mergeResolvedGraphs(graphs: ResolvedGraph[]): ResolvedGraph {
  const graph = new BuildGraph();
  const nodes = new Map<string, ResolvedNode>();
  const roots: BuildNode[] = [];
  const rootKeys = new Set<string>();
  const notes: string[] = [];

  for (const part of graphs) {
    graph.merge(part.graph);

    for (const [key, resolved] of part.nodes) {
      if (!nodes.has(key)) nodes.set(key, resolved);
    }
    for (const root of part.roots) {
      const key = nodeKey(root);
      if (rootKeys.has(key)) continue;
      rootKeys.add(key);
      roots.push(root);
    }
    for (const note of part.notes) {
      if (!notes.includes(note)) notes.push(note);
    }
  }

  return { graph, roots, nodes, notes };
}
