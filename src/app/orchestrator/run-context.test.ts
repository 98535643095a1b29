import { describe, expect, it } from "vitest";

import { dockerfiles, MemoryDescriptorStore, service } from "../../__tests__/fakes.js";
import type { ProjectConfig } from "../../core/config.js";
import { MemoryLogger } from "../../core/logger.js";

import { FakeClock, FakeImageBuilder, FakeRevisionResolver } from "./__tests__/fakes.js";
import {
  buildRunContext,
  planFromContext,
  runBuildFromContext,
  type RunOptions,
} from "./run-context.js";

// =============================================================================
// FIXTURES
// =============================================================================

const config: ProjectConfig = {
  services_dir: "services",
  label_namespace: "com.example",
  registries: ["registry.example"],
  logs_dir: ".foundry/logs",
  build: { dep_cache: "soft", progress: "auto", provenance: false, target_platforms: ["linux/amd64"] },
  repo_root: "/repo",
  ci: false,
};

const options: RunOptions = {
  depCache: "soft",
  failFast: false,
  push: true,
  tagLatest: true,
  provenance: true,
  progress: "plain",
  extraTags: ["pr-7"],
};

function store(): MemoryDescriptorStore {
  return new MemoryDescriptorStore(
    {
      lib: { descriptor: service("lib", { version: "v1" }) },
      app: {
        descriptor: service("app", {
          version: "v1",
          dependencies: { lib: { build_arg: "LIB_IMAGE" } },
        }),
      },
    },
    dockerfiles("lib", "app"),
  );
}

// =============================================================================
// TESTS
// =============================================================================

describe("RunContext", () => {
  it("threads project config and run options through planning and building", async () => {
    const builder = new FakeImageBuilder();
    const logger = new MemoryLogger();
    const ctx = buildRunContext({
      runId: "run-1",
      config,
      options,
      ports: {
        descriptorStore: store(),
        imageBuilder: builder,
        sourceRevisions: new FakeRevisionResolver(),
        logSink: { createRunLogger: () => logger },
        clock: new FakeClock(),
      },
    });

    const plan = await planFromContext(ctx, [{ service: "app" }]);
    const summary = await runBuildFromContext(ctx, plan);

    expect(plan.steps.map((step) => step.imageRefs)).toEqual([
      ["registry.example/lib:v1"],
      ["registry.example/app:v1", "registry.example/app:pr-7"],
    ]);
    expect(builder.builds[1]).toMatchObject({
      context: "/repo/app",
      dockerfile: "/repo/app/Dockerfile",
      buildArgs: { LIB_IMAGE: "registry.example/lib:v1" },
      targetPlatforms: ["linux/amd64"],
      push: true,
      progress: "plain",
      provenance: true,
    });
    expect(Object.keys(builder.builds[1]?.labels ?? {})).toEqual(["com.example.service-def-hash"]);
    expect(summary.status).toBe("SUCCESS");
    expect(logger.ofType("run.complete")).toHaveLength(1);
  });
});
