/**
 * BuildEngine drives a build plan to completion.
 * Purpose: walk the ordered steps, decide build vs skip per node, and summarize the run.
 * Assumptions: steps list dependencies first; the run is sequential and owns its revision cache.
 * Usage: const summary = await runBuild(plan, options, { imageBuilder, sourceRevisions, logger, clock });
 */

import type { DepCacheMode, ProgressMode } from "../../core/config.js";
import { ExternalBuildError, StaleDependencyError } from "../../core/errors.js";
import type { EventLogger, JsonObject, LogLevel } from "../../core/logger.js";
import { logOrchestratorEvent } from "../../core/logger.js";
import type { ImageBuilder } from "../../docker/image-builder.js";
import { collectDependents } from "../../graph/graph.js";
import { nodeKey } from "../../graph/node.js";
import {
  emptyRevisionCache,
  resolveSourceRevisions,
  type RevisionCache,
} from "../../git/revision-cache.js";

import { sourceBuildArgs, type BuildPlan, type PlannedNode } from "./build-plan.js";
import type { Clock, SourceRevisionResolver } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildOptions = {
  depCache: DepCacheMode;
  failFast: boolean;
  push: boolean;
  progress: ProgressMode;
  provenance: boolean;
  targetPlatforms: string[];
  ci: boolean;
  hashLabel: string;
  /** Polled between nodes; a true result ends the run with the remaining nodes skipped. */
  isStopped?: () => boolean;
};

export type BuildEnginePorts = {
  imageBuilder: ImageBuilder;
  sourceRevisions: SourceRevisionResolver;
  logger: EventLogger;
  clock: Clock;
};

export type SkipReason = "fresh" | "dependency_failed" | "fail_fast" | "not_needed" | "stopped";

export type NodeOutcome =
  | { key: string; status: "built"; ref: string; durationMs: number }
  | { key: string; status: "skipped"; reason: SkipReason; detail?: string }
  | { key: string; status: "failed"; error: string; exitCode: number | null };

export type RunStatus = "SUCCESS" | "PARTIAL" | "FAILED";

export type BuildSummary = {
  status: RunStatus;
  outcomes: NodeOutcome[];
  built: number;
  skipped: number;
  failed: number;
  stopped: boolean;
  durationMs: number;
};

type Freshness = { fresh: true } | { fresh: false; actual: string | null; remoteOnly: boolean };

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runBuild(
  plan: BuildPlan,
  options: BuildOptions,
  ports: BuildEnginePorts,
): Promise<BuildSummary> {
  const startedAt = ports.clock.now().getTime();
  const outcomes = new Map<string, NodeOutcome>();
  const stepsByKey = new Map(plan.steps.map((step) => [step.key, step]));
  let revisionCache: RevisionCache = emptyRevisionCache();
  let failFastTriggered = false;
  let stopped = false;

  const emit = (
    type: string,
    payload: JsonObject,
    opts: { level?: LogLevel; message?: string } = {},
  ): void => logOrchestratorEvent(ports.logger, type, payload, opts);

  const skip = (step: PlannedNode, reason: SkipReason, detail?: string): void => {
    outcomes.set(step.key, { key: step.key, status: "skipped", reason, detail });
    emit(
      "node.skipped",
      { node: step.key, reason, ...(detail ? { detail } : {}) },
      { message: `${step.key}: skipped (${reason}${detail ? `: ${detail}` : ""})` },
    );
  };

  const fail = (step: PlannedNode, failure: { error: string; exitCode: number | null }): void => {
    outcomes.set(step.key, { key: step.key, status: "failed", ...failure });
    emit(
      "node.failed",
      { node: step.key, error: failure.error, exit_code: failure.exitCode },
      { level: "error", message: `${step.key}: ${failure.error}` },
    );

    for (const dependent of collectDependents(plan.graph, [step.node])) {
      const dependentStep = stepsByKey.get(nodeKey(dependent));
      if (!dependentStep || outcomes.has(dependentStep.key)) continue;
      skip(dependentStep, "dependency_failed", step.key);
    }

    if (options.failFast) failFastTriggered = true;
  };

  emit(
    "run.start",
    {
      nodes: plan.steps.map((step) => step.key),
      targets: plan.targetKeys,
      dep_cache: options.depCache,
      fail_fast: options.failFast,
      push: options.push,
      ci: options.ci,
    },
    { message: `Building ${plan.targetKeys.length} target(s) across ${plan.steps.length} node(s).` },
  );
  for (const note of plan.notes) {
    emit("dependency.note", { note }, { message: note });
  }

  for (const step of plan.steps) {
    if (outcomes.has(step.key)) continue;

    if (!stopped && options.isStopped?.()) {
      stopped = true;
      emit("run.stop", {}, { level: "warn", message: "Stop requested; remaining nodes are skipped." });
    }
    if (stopped) {
      skip(step, "stopped");
      continue;
    }
    if (failFastTriggered) {
      skip(step, "fail_fast");
      continue;
    }
    if (!isNeeded(step, plan, outcomes)) {
      skip(step, "not_needed");
      continue;
    }

    if (!step.isTarget && options.depCache !== "off") {
      let freshness: Freshness;
      try {
        freshness = await checkFreshness(step, options, ports.imageBuilder);
      } catch (err) {
        fail(step, { error: errorMessage(err), exitCode: null });
        continue;
      }
      if (freshness.fresh) {
        skip(step, "fresh");
        continue;
      }
      if (freshness.remoteOnly) {
        emit(
          "dependency.remote_only",
          { node: step.key, ref: step.primaryRef },
          { message: `${step.primaryRef} exists in the registry but not locally.` },
        );
      }

      const detail =
        freshness.actual === null
          ? `no ${options.hashLabel} label on ${step.primaryRef}`
          : `stored hash ${freshness.actual} does not match ${step.hash}`;

      if (options.depCache === "strict") {
        emit(
          "dependency.stale",
          { node: step.key, expected: step.hash, actual: freshness.actual, mode: "strict" },
          { level: "error", message: `${step.key} is stale: ${detail}.` },
        );
        throw new StaleDependencyError(
          `Dependency ${step.key} is stale (${detail}); dep-cache mode is strict.`,
          step.key,
          step.hash,
          freshness.actual,
        );
      }
      emit(
        "dependency.stale",
        { node: step.key, expected: step.hash, actual: freshness.actual, mode: "soft" },
        { level: "warn", message: `${step.key} is stale (${detail}); rebuilding.` },
      );
    }

    const nodeStart = ports.clock.now().getTime();
    emit(
      "node.build.start",
      { node: step.key, refs: step.imageRefs, hash: step.hash },
      { message: `${step.key}: building ${step.primaryRef}` },
    );

    let failure: { error: string; exitCode: number | null } | null = null;
    try {
      const revisions = await resolveSourceRevisions(
        step.config.sources,
        revisionCache,
        ports.sourceRevisions.lookup,
      );
      revisionCache = revisions.cache;

      const result = await ports.imageBuilder.build({
        context: step.contextPath,
        dockerfile: step.dockerfilePath,
        tags: step.imageRefs,
        buildArgs: { ...sourceBuildArgs(step.config.sources, revisions.revisions), ...step.buildArgs },
        labels: step.labels,
        targetPlatforms: options.targetPlatforms,
        push: options.push,
        progress: options.progress,
        provenance: options.provenance,
      });
      if (result.exitCode !== 0) {
        const error = new ExternalBuildError(
          `Image build for ${step.key} exited with code ${result.exitCode}.`,
          result.exitCode,
        );
        failure = { error: error.message, exitCode: error.exitCode };
      }
    } catch (err) {
      failure = { error: errorMessage(err), exitCode: null };
    }

    if (failure) {
      fail(step, failure);
      continue;
    }

    const durationMs = ports.clock.now().getTime() - nodeStart;
    outcomes.set(step.key, { key: step.key, status: "built", ref: step.primaryRef, durationMs });
    emit(
      "node.built",
      { node: step.key, refs: step.imageRefs, hash: step.hash, duration_ms: durationMs },
      { message: `${step.key}: built ${step.primaryRef}` },
    );
  }

  const ordered = plan.steps.flatMap((step) => {
    const outcome = outcomes.get(step.key);
    return outcome ? [outcome] : [];
  });
  const summary = summarize(ordered, stopped, ports.clock.now().getTime() - startedAt);

  emit(
    "run.complete",
    {
      status: summary.status,
      built: summary.built,
      skipped: summary.skipped,
      failed: summary.failed,
      stopped: summary.stopped,
      duration_ms: summary.durationMs,
    },
    {
      level: summary.failed > 0 ? "error" : "info",
      message: `${summary.status}: ${summary.built} built, ${summary.skipped} skipped, ${summary.failed} failed.`,
    },
  );

  return summary;
}

export function summarize(outcomes: NodeOutcome[], stopped: boolean, durationMs: number): BuildSummary {
  const built = outcomes.filter((o) => o.status === "built").length;
  const failed = outcomes.filter((o) => o.status === "failed").length;
  const skipped = outcomes.filter((o) => o.status === "skipped").length;
  const fresh = outcomes.filter((o) => o.status === "skipped" && o.reason === "fresh").length;

  let status: RunStatus = "SUCCESS";
  if (failed > 0) {
    status = built + fresh > 0 ? "PARTIAL" : "FAILED";
  }

  return { status, outcomes, built, skipped, failed, stopped, durationMs };
}

// =============================================================================
// INTERNALS
// =============================================================================

/** A node is needed while at least one target that requires it can still be built. */
function isNeeded(
  step: PlannedNode,
  plan: BuildPlan,
  outcomes: Map<string, NodeOutcome>,
): boolean {
  for (const [targetKey, required] of plan.requirements) {
    if (!required.has(step.key)) continue;
    const outcome = outcomes.get(targetKey);
    if (!outcome || outcome.status === "built") return true;
  }
  return false;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function checkFreshness(
  step: PlannedNode,
  options: BuildOptions,
  builder: ImageBuilder,
): Promise<Freshness> {
  const exists = await builder.imageExistsLocally(step.primaryRef);
  if (!exists) {
    const remoteOnly = options.ci ? await builder.inspectRemoteManifest(step.primaryRef) : false;
    return { fresh: false, actual: null, remoteOnly };
  }

  const actual = await builder.readLabel(step.primaryRef, options.hashLabel);
  if (actual === step.hash) return { fresh: true };
  return { fresh: false, actual, remoteOnly: false };
}
