import { describe, expect, it } from "vitest";

import { dockerfiles, MemoryDescriptorStore, service } from "../__tests__/fakes.js";
import { nodeKey } from "../graph/node.js";
import { topologicalSort } from "../graph/sort.js";

import { buildGraph, buildGraphs } from "./graph-builder.js";

function store(): MemoryDescriptorStore {
  return new MemoryDescriptorStore(
    {
      app: {
        descriptor: service("app", {
          dependencies: {
            runtime: { build_arg: "RUNTIME_IMAGE" },
            lib: { build_arg: "LIB_IMAGE", version: "v1.0.0" },
          },
        }),
        platforms: { default: "debian", platforms: [{ name: "debian" }, { name: "alpine" }] },
        versions: { versions: [{ name: "v1.0.0", latest: true }] },
      },
      runtime: {
        descriptor: service("runtime", {
          dependencies: { lib: { build_arg: "LIB_IMAGE" } },
        }),
        platforms: { default: "debian", platforms: [{ name: "debian" }, { name: "alpine" }] },
        versions: { versions: [{ name: "v1.0.0" }] },
      },
      lib: {
        descriptor: service("lib"),
        versions: { versions: [{ name: "v1.0.0" }] },
      },
      cli: {
        descriptor: service("cli", {
          version: "v1.0.0",
          dependencies: { lib: { build_arg: "LIB_IMAGE" } },
        }),
      },
    },
    dockerfiles("app", "runtime", "lib", "cli"),
  );
}

describe("buildGraph", () => {
  it("expands dependencies and visits shared nodes once", async () => {
    const resolved = await buildGraph(store(), { service: "app", version: "v1.0.0", platform: "alpine" });

    expect(resolved.graph.nodes.map(nodeKey)).toEqual([
      "app:v1.0.0:alpine",
      "runtime:v1.0.0:alpine",
      "lib:v1.0.0",
    ]);
    expect(resolved.graph.edges.map((edge) => `${nodeKey(edge.from)} -> ${nodeKey(edge.to)}`)).toEqual([
      "app:v1.0.0:alpine -> runtime:v1.0.0:alpine",
      "app:v1.0.0:alpine -> lib:v1.0.0",
      "runtime:v1.0.0:alpine -> lib:v1.0.0",
    ]);
    expect([...resolved.nodes.keys()].sort()).toEqual([
      "app:v1.0.0:alpine",
      "lib:v1.0.0",
      "runtime:v1.0.0:alpine",
    ]);
    expect(resolved.roots.map(nodeKey)).toEqual(["app:v1.0.0:alpine"]);
    expect(resolved.notes).toEqual([
      "lib is single-platform; app:v1.0.0:alpine reuses lib:v1.0.0.",
      "lib is single-platform; runtime:v1.0.0:alpine reuses lib:v1.0.0.",
    ]);
  });

  it("builds identical graphs for identical inputs", async () => {
    const first = await buildGraph(store(), { service: "app", version: "v1.0.0", platform: "debian" });
    const second = await buildGraph(store(), { service: "app", version: "v1.0.0", platform: "debian" });

    expect(topologicalSort(first.graph).map(nodeKey)).toEqual(
      topologicalSort(second.graph).map(nodeKey),
    );
    expect(first.graph.edges.length).toBe(second.graph.edges.length);
  });

  it("records resolved dependencies in declaration order", async () => {
    const resolved = await buildGraph(store(), { service: "app", platform: "debian" });
    const app = resolved.nodes.get("app:v1.0.0:debian");

    expect(app?.dependencies.map((dep) => dep.declaration.buildArg)).toEqual([
      "RUNTIME_IMAGE",
      "LIB_IMAGE",
    ]);
  });
});

describe("buildGraphs", () => {
  it("merges several targets and deduplicates shared nodes", async () => {
    const resolved = await buildGraphs(store(), [
      { service: "app", version: "v1.0.0", platform: "debian" },
      { service: "app", version: "v1.0.0", platform: "alpine" },
      { service: "cli" },
    ]);

    expect(resolved.roots.map(nodeKey)).toEqual([
      "app:v1.0.0:debian",
      "app:v1.0.0:alpine",
      "cli:v1.0.0",
    ]);
    expect(resolved.graph.nodes.filter((node) => node.service === "lib").map(nodeKey)).toEqual([
      "lib:v1.0.0",
    ]);
    expect(resolved.graph.size).toBe(6);
  });
});
