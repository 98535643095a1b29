import { describe, expect, it } from "vitest";

import { BuildGraph, collectDependencies, collectDependents, mergeGraphs } from "./graph.js";
import { createNode, nodeImageTag, nodeKey, parseNodeKey } from "./node.js";

describe("BuildGraph", () => {
  it("deduplicates structurally equal nodes and edges", () => {
    const graph = new BuildGraph();
    graph.addEdge(createNode("web", "v1"), createNode("lib", "v1"));
    graph.addEdge(createNode("web", "v1"), createNode("lib", "v1"));
    graph.addNode(createNode("lib", "v1", ""));

    expect(graph.size).toBe(2);
    expect(graph.edges).toHaveLength(1);
  });

  it("keeps every edge endpoint as a node", () => {
    const graph = new BuildGraph();
    graph.addEdge(createNode("web", "v1"), createNode("lib", "v1"));

    for (const edge of graph.edges) {
      expect(graph.hasNode(edge.from)).toBe(true);
      expect(graph.hasNode(edge.to)).toBe(true);
    }
  });

  it("merges graphs by union", () => {
    const a = new BuildGraph();
    a.addEdge(createNode("web", "v1"), createNode("lib", "v1"));
    const b = new BuildGraph();
    b.addEdge(createNode("api", "v1"), createNode("lib", "v1"));

    const merged = mergeGraphs([a, b]);

    expect(merged.nodes.map(nodeKey)).toEqual(["web:v1", "lib:v1", "api:v1"]);
    expect(merged.dependentsOf(createNode("lib", "v1")).map(nodeKey)).toEqual([
      "web:v1",
      "api:v1",
    ]);
  });

  it("collects transitive dependents and dependencies", () => {
    const graph = new BuildGraph();
    const a = createNode("a", "v1");
    const b = createNode("b", "v1");
    const c = createNode("c", "v1");
    graph.addEdge(a, b);
    graph.addEdge(b, c);

    expect(collectDependents(graph, [c]).map(nodeKey)).toEqual(["b:v1", "a:v1"]);
    expect(collectDependents(graph, [b]).map(nodeKey)).toEqual(["a:v1"]);
    expect([...collectDependencies(graph, [b])].sort()).toEqual(["b:v1", "c:v1"]);
  });
});

describe("node keys", () => {
  it("formats and parses keys with and without a platform", () => {
    const node = createNode("app", "v1.0.0", "debian");

    expect(nodeKey(node)).toBe("app:v1.0.0:debian");
    expect(nodeImageTag(node)).toBe("v1.0.0-debian");
    expect(parseNodeKey("app:v1.0.0:debian")).toEqual(node);
    expect(nodeImageTag(parseNodeKey("lib:v2"))).toBe("v2");
  });

  it("rejects malformed keys", () => {
    expect(() => parseNodeKey("app")).toThrow("Invalid node key");
    expect(() => parseNodeKey("app::x")).toThrow("Invalid node key");
  });
});
