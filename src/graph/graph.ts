/**
 * Build graph container.
 * Purpose: hold deduplicated nodes and edges in insertion order.
 * Assumptions: nodes compare structurally through nodeKey.
 * Usage: graph.addEdge(from, to); mergeGraphs([a, b]).
 */

import { edgeKey, nodeKey, type BuildEdge, type BuildNode } from "./node.js";

export class BuildGraph {
  private readonly nodeMap = new Map<string, BuildNode>();
  private readonly edgeMap = new Map<string, BuildEdge>();
  private readonly outgoing = new Map<string, BuildNode[]>();

  get nodes(): BuildNode[] {
    return Array.from(this.nodeMap.values());
  }

  get edges(): BuildEdge[] {
    return Array.from(this.edgeMap.values());
  }

  get size(): number {
    return this.nodeMap.size;
  }

  hasNode(node: BuildNode): boolean {
    return this.nodeMap.has(nodeKey(node));
  }

  addNode(node: BuildNode): BuildNode {
    const key = nodeKey(node);
    const existing = this.nodeMap.get(key);
    if (existing) return existing;

    this.nodeMap.set(key, node);
    this.outgoing.set(key, []);
    return node;
  }

  addEdge(from: BuildNode, to: BuildNode): void {
    const source = this.addNode(from);
    const target = this.addNode(to);
    const edge: BuildEdge = { from: source, to: target };
    const key = edgeKey(edge);
    if (this.edgeMap.has(key)) return;

    this.edgeMap.set(key, edge);
    this.outgoing.get(nodeKey(source))?.push(target);
  }

  /** Direct dependencies of a node, in the order their edges were added. */
  dependenciesOf(node: BuildNode): BuildNode[] {
    return [...(this.outgoing.get(nodeKey(node)) ?? [])];
  }

  /** Nodes that declare a direct dependency on `node`. */
  dependentsOf(node: BuildNode): BuildNode[] {
    const key = nodeKey(node);
    return this.edges.filter((edge) => nodeKey(edge.to) === key).map((edge) => edge.from);
  }

  merge(other: BuildGraph): void {
    for (const node of other.nodes) {
      this.addNode(node);
    }
    for (const edge of other.edges) {
      this.addEdge(edge.from, edge.to);
    }
  }
}

export function mergeGraphs(graphs: BuildGraph[]): BuildGraph {
  const merged = new BuildGraph();
  for (const graph of graphs) {
    merged.merge(graph);
  }
  return merged;
}

/** Every node that transitively depends on one of `roots` (roots excluded). */
export function collectDependents(graph: BuildGraph, roots: BuildNode[]): BuildNode[] {
  const reverse = new Map<string, BuildNode[]>();
  for (const edge of graph.edges) {
    const key = nodeKey(edge.to);
    const list = reverse.get(key) ?? [];
    list.push(edge.from);
    reverse.set(key, list);
  }

  const rootKeys = new Set(roots.map(nodeKey));
  const seen = new Set<string>();
  const result: BuildNode[] = [];
  const queue = [...roots];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    for (const dependent of reverse.get(nodeKey(current)) ?? []) {
      const key = nodeKey(dependent);
      if (seen.has(key) || rootKeys.has(key)) continue;
      seen.add(key);
      result.push(dependent);
      queue.push(dependent);
    }
  }

  return result;
}

/** Every node reachable from `roots` along dependency edges (roots included). */
export function collectDependencies(graph: BuildGraph, roots: BuildNode[]): Set<string> {
  const seen = new Set<string>();
  const stack = [...roots];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    const key = nodeKey(current);
    if (seen.has(key)) continue;
    seen.add(key);
    stack.push(...graph.dependenciesOf(current));
  }

  return seen;
}
