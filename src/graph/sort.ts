/**
 * Topological sort with exhaustive cycle detection.
 * Purpose: turn a build graph into a dependencies-first build order.
 * Assumptions: edges point from dependent to dependency, so DFS post-order is already
 *   dependencies-first; ties follow node insertion order.
 * Usage: const order = topologicalSort(graph); // throws CycleError listing every cycle
 */

import { CycleError } from "../core/errors.js";

import type { BuildGraph } from "./graph.js";
import { nodeKey, type BuildNode } from "./node.js";

type Frame = {
  node: BuildNode;
  dependencies: BuildNode[];
  index: number;
};

export type CycleScan = {
  order: BuildNode[];
  cycles: BuildNode[][];
};

export function topologicalSort(graph: BuildGraph): BuildNode[] {
  const scan = scanGraph(graph);
  if (scan.cycles.length > 0) {
    throw new CycleError(scan.cycles);
  }
  return scan.order;
}

export function findCycles(graph: BuildGraph): BuildNode[][] {
  return scanGraph(graph).cycles;
}

export function scanGraph(graph: BuildGraph): CycleScan {
  const finished = new Set<string>();
  const onStack = new Set<string>();
  const order: BuildNode[] = [];
  const cycles: BuildNode[][] = [];

  for (const root of graph.nodes) {
    if (finished.has(nodeKey(root))) continue;

    const stack: Frame[] = [enter(root)];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.index >= frame.dependencies.length) {
        stack.pop();
        const key = nodeKey(frame.node);
        onStack.delete(key);
        finished.add(key);
        order.push(frame.node);
        continue;
      }

      const next = frame.dependencies[frame.index];
      frame.index += 1;
      const nextKey = nodeKey(next);

      if (onStack.has(nextKey)) {
        const start = stack.findIndex((entry) => nodeKey(entry.node) === nextKey);
        cycles.push([...stack.slice(start).map((entry) => entry.node), next]);
        continue;
      }

      if (finished.has(nextKey)) continue;

      stack.push(enter(next));
    }
  }

  return { order, cycles };

  function enter(node: BuildNode): Frame {
    onStack.add(nodeKey(node));
    return { node, dependencies: graph.dependenciesOf(node), index: 0 };
  }
}
