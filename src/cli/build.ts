import { Command, InvalidArgumentError } from "commander";

import {
  buildRunContext,
  planFromContext,
  runBuildFromContext,
} from "../app/orchestrator/run-context.js";
import type { BuildSummary, NodeOutcome } from "../app/orchestrator/build-engine.js";
import type { BuildPlan } from "../app/orchestrator/build-plan.js";
import {
  DEP_CACHE_MODES,
  PROGRESS_MODES,
  type DepCacheMode,
  type ProgressMode,
} from "../core/config.js";
import { resolveColorEnabled } from "../core/error-format.js";
import { defaultRunId, formatDurationMs } from "../core/utils.js";

import { loadConfigForCli } from "./config.js";
import { reportCliError } from "./output.js";
import { createBuildStopSignalHandler } from "./signal-handlers.js";
import { selectTargets } from "./targets.js";

type BuildCommandOptions = {
  service: string[];
  version: string[];
  allVersions: boolean;
  platform?: string;
  depCache?: DepCacheMode;
  failFast: boolean;
  push: boolean;
  latest: boolean;
  provenance?: boolean;
  extraTag: string[];
  progress?: ProgressMode;
  showBuildOrder: boolean;
};

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
  color?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerBuildCommand(program: Command): void {
  program
    .command("build")
    .description("Build service images and the dependencies they need, in dependency order")
    .option("-s, --service <glob...>", "Services to build (glob patterns; default: all)", [])
    .option("-v, --version <spec...>", "Version names, extra tags, or 'latest'", [])
    .option("--all-versions", "Build every version of each selected service", false)
    .option("-p, --platform <name>", "Only build this platform of multi-platform services")
    .option("--dep-cache <mode>", "Dependency cache mode: off, soft, strict", parseDepCache)
    .option("--fail-fast", "Stop after the first failed node", false)
    .option("--push", "Push images to the registry instead of loading them locally", false)
    .option("--no-latest", "Do not apply the 'latest' tag")
    .option("--provenance", "Attach build provenance attestations")
    .option("--extra-tag <tag...>", "Additional tags for the requested targets", [])
    .option("--progress <mode>", "Build output: auto, plain, tty, quiet", parseProgress)
    .option("--show-build-order", "Print the resolved build order and exit", false)
    .action(async (opts: BuildCommandOptions, command: Command) => {
      await handleBuild(opts, command.optsWithGlobals<GlobalOptions>());
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

async function handleBuild(opts: BuildCommandOptions, globals: GlobalOptions): Promise<void> {
  const color = resolveColorEnabled({ useColor: globals.color });
  const runId = defaultRunId();
  const stopHandler = createBuildStopSignalHandler({
    onSignal: (signal) => {
      console.error(
        `Received ${signal}. Finishing the current node, then stopping run ${runId}. Press Ctrl-C again to abort.`,
      );
    },
  });

  try {
    const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
    const ctx = buildRunContext({
      runId,
      config,
      color,
      options: {
        depCache: opts.depCache ?? config.build.dep_cache,
        failFast: opts.failFast,
        push: opts.push,
        tagLatest: opts.latest,
        provenance: opts.provenance ?? config.build.provenance,
        progress: opts.progress ?? config.build.progress,
        extraTags: opts.extraTag,
        isStopped: stopHandler.isStopped,
      },
    });

    const targets = await selectTargets(ctx.ports.descriptorStore, {
      serviceGlobs: opts.service,
      versions: opts.version,
      allVersions: opts.allVersions,
      platform: opts.platform,
    });
    const plan = await planFromContext(ctx, targets);

    if (opts.showBuildOrder) {
      printBuildOrder(plan);
      return;
    }

    const summary = await runBuildFromContext(ctx, plan);
    printSummary(runId, summary);
    if (summary.failed > 0 || summary.stopped) {
      process.exitCode = 1;
    }
  } catch (err) {
    reportCliError(err, { debug: globals.debug, color });
  } finally {
    stopHandler.cleanup();
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatBuildOrder(plan: BuildPlan): string[] {
  const lines = [`Build order (${plan.steps.length} node(s)):`];
  plan.steps.forEach((step, index) => {
    const role = step.isTarget ? "target" : "dependency";
    lines.push(`  ${index + 1}. ${step.key} [${role}] ${step.primaryRef}`);
  });
  for (const note of plan.notes) {
    lines.push(`note: ${note}`);
  }
  return lines;
}

export function formatSummary(runId: string, summary: BuildSummary): string[] {
  const lines = [
    `Run ${runId}: ${summary.status} (${summary.built} built, ${summary.skipped} skipped, ${summary.failed} failed) in ${formatDurationMs(summary.durationMs)}`,
  ];
  for (const outcome of summary.outcomes) {
    lines.push(`  ${describeOutcome(outcome)}`);
  }
  if (summary.stopped) {
    lines.push("Run stopped before all nodes were processed.");
  }
  return lines;
}

function describeOutcome(outcome: NodeOutcome): string {
  switch (outcome.status) {
    case "built":
      return `built    ${outcome.key} -> ${outcome.ref}`;
    case "failed":
      return `failed   ${outcome.key}: ${outcome.error}`;
    case "skipped":
      return `skipped  ${outcome.key} (${outcome.reason}${outcome.detail ? `: ${outcome.detail}` : ""})`;
  }
}

function printBuildOrder(plan: BuildPlan): void {
  console.log(formatBuildOrder(plan).join("\n"));
}

function printSummary(runId: string, summary: BuildSummary): void {
  console.log(formatSummary(runId, summary).join("\n"));
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function parseDepCache(value: string): DepCacheMode {
  const mode = DEP_CACHE_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of: ${DEP_CACHE_MODES.join(", ")}.`);
  }
  return mode;
}

function parseProgress(value: string): ProgressMode {
  const mode = PROGRESS_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of: ${PROGRESS_MODES.join(", ")}.`);
  }
  return mode;
}
