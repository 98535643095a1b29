/**
 * RunContext + composition root for build runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: const ctx = buildRunContext({ config, options, runId }); const plan = await planFromContext(ctx, targets); await runBuildFromContext(ctx, plan).
 */

import type { ProjectConfig } from "../../core/config.js";
import { serviceHashLabel } from "../../core/config.js";
import {
  ConsoleLogger,
  FanoutLogger,
  JsonlLogger,
  type EventLogger,
} from "../../core/logger.js";
import { runLogPath } from "../../core/paths.js";
import { FileDescriptorStore } from "../../descriptors/store.js";
import { DockerImageBuilder } from "../../docker/docker.js";
import { lsRemoteRevision } from "../../git/remote.js";
import type { GraphTarget } from "../../resolve/graph-builder.js";

import { runBuild, type BuildOptions, type BuildSummary } from "./build-engine.js";
import { createBuildPlan, type BuildPlan } from "./build-plan.js";
import type { OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  depCache: BuildOptions["depCache"];
  failFast: boolean;
  push: boolean;
  tagLatest: boolean;
  provenance: boolean;
  progress: BuildOptions["progress"];
  extraTags: string[];
  isStopped?: () => boolean;
};

export type RunContext = {
  runId: string;
  config: ProjectConfig;
  options: RunOptions;
  ports: OrchestratorPorts;
  logger: EventLogger;
};

export type BuildRunContextInput = {
  runId: string;
  config: ProjectConfig;
  options: RunOptions;
  color?: boolean;
  ports?: Partial<OrchestratorPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(
  config: ProjectConfig,
  opts: { color?: boolean } = {},
): OrchestratorPorts {
  return {
    descriptorStore: new FileDescriptorStore(config.repo_root, config.services_dir),
    imageBuilder: new DockerImageBuilder(),
    sourceRevisions: { lookup: lsRemoteRevision },
    logSink: {
      createRunLogger: (runId) =>
        new FanoutLogger([
          new JsonlLogger(runLogPath(config, runId), { runId }),
          new ConsoleLogger({ color: opts.color }),
        ]),
    },
    clock: { now: () => new Date() },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const ports: OrchestratorPorts = {
    ...createDefaultPorts(input.config, { color: input.color }),
    ...input.ports,
  };

  return {
    runId: input.runId,
    config: input.config,
    options: input.options,
    ports,
    logger: ports.logSink.createRunLogger(input.runId),
  };
}

export async function planFromContext(ctx: RunContext, targets: GraphTarget[]): Promise<BuildPlan> {
  return createBuildPlan({
    store: ctx.ports.descriptorStore,
    targets,
    settings: {
      repoRoot: ctx.config.repo_root,
      registries: ctx.config.registries,
      hashLabel: serviceHashLabel(ctx.config),
      tagLatest: ctx.options.tagLatest,
      extraTags: ctx.options.extraTags,
    },
  });
}

export async function runBuildFromContext(ctx: RunContext, plan: BuildPlan): Promise<BuildSummary> {
  return runBuild(
    plan,
    {
      depCache: ctx.options.depCache,
      failFast: ctx.options.failFast,
      push: ctx.options.push,
      progress: ctx.options.progress,
      provenance: ctx.options.provenance,
      targetPlatforms: ctx.config.build.target_platforms,
      ci: ctx.config.ci,
      hashLabel: serviceHashLabel(ctx.config),
      isStopped: ctx.options.isStopped,
    },
    {
      imageBuilder: ctx.ports.imageBuilder,
      sourceRevisions: ctx.ports.sourceRevisions,
      logger: ctx.logger,
      clock: ctx.ports.clock,
    },
  );
}
