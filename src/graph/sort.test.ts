import { describe, expect, it } from "vitest";

import { CycleError } from "../core/errors.js";

import { BuildGraph } from "./graph.js";
import { createNode, nodeKey } from "./node.js";
import { findCycles, topologicalSort } from "./sort.js";

const web = createNode("web", "v1");
const api = createNode("api", "v1");
const lib = createNode("lib", "v1");
const base = createNode("base", "v1");

describe("topologicalSort", () => {
  it("orders dependencies before dependents", () => {
    const graph = new BuildGraph();
    graph.addEdge(web, api);
    graph.addEdge(api, lib);
    graph.addEdge(web, lib);

    expect(topologicalSort(graph).map(nodeKey)).toEqual(["lib:v1", "api:v1", "web:v1"]);
  });

  it("breaks ties by insertion order", () => {
    const graph = new BuildGraph();
    graph.addEdge(web, api);
    graph.addEdge(web, lib);
    graph.addNode(base);

    expect(topologicalSort(graph).map(nodeKey)).toEqual(["api:v1", "lib:v1", "web:v1", "base:v1"]);
  });

  it("produces the same order for the same graph", () => {
    const build = (): BuildGraph => {
      const graph = new BuildGraph();
      graph.addEdge(web, lib);
      graph.addEdge(api, lib);
      graph.addEdge(lib, base);
      return graph;
    };

    expect(topologicalSort(build()).map(nodeKey)).toEqual(topologicalSort(build()).map(nodeKey));
  });

  it("keeps platform variants apart", () => {
    const graph = new BuildGraph();
    graph.addEdge(createNode("app", "v1", "debian"), createNode("lib", "v1", "debian"));
    graph.addEdge(createNode("app", "v1", "alpine"), createNode("lib", "v1", "alpine"));

    expect(topologicalSort(graph).map(nodeKey)).toEqual([
      "lib:v1:debian",
      "app:v1:debian",
      "lib:v1:alpine",
      "app:v1:alpine",
    ]);
  });

  it("reports every independent cycle in one error", () => {
    const graph = new BuildGraph();
    graph.addEdge(web, api);
    graph.addEdge(api, web);
    graph.addEdge(lib, base);
    graph.addEdge(base, lib);

    let error: unknown;
    try {
      topologicalSort(graph);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(CycleError);
    const cycleError = error as CycleError;
    expect(cycleError.cycles.map((cycle) => cycle.map(nodeKey))).toEqual([
      ["web:v1", "api:v1", "web:v1"],
      ["lib:v1", "base:v1", "lib:v1"],
    ]);
    expect(cycleError.message).toBe(
      [
        "Dependency graph contains 2 cycles:",
        "  - web:v1 -> api:v1 -> web:v1",
        "  - lib:v1 -> base:v1 -> lib:v1",
      ].join("\n"),
    );
  });

  it("reports a self-dependency as a cycle", () => {
    const graph = new BuildGraph();
    graph.addEdge(lib, lib);

    expect(findCycles(graph).map((cycle) => cycle.map(nodeKey))).toEqual([["lib:v1", "lib:v1"]]);
  });

  it("returns no cycles for an acyclic graph", () => {
    const graph = new BuildGraph();
    graph.addEdge(web, lib);
    graph.addEdge(api, lib);

    expect(findCycles(graph)).toEqual([]);
  });
});
