/**
 * Build plan.
 * Purpose: turn requested targets into an ordered, hashed, fully tagged list of build steps.
 * Assumptions: planning is pure apart from descriptor reads; nothing here touches Docker or git.
 * Usage: const plan = await createBuildPlan({ store, targets, settings });
 */

import path from "node:path";

import type { DescriptorStore } from "../../descriptors/store.js";
import type { BuildGraph } from "../../graph/graph.js";
import { collectDependencies } from "../../graph/graph.js";
import { nodeKey, nodeImageTag, type BuildNode } from "../../graph/node.js";
import { topologicalSort } from "../../graph/sort.js";
import { computeGraphHashes } from "../../hash/service-hash.js";
import type { EffectiveConfig, ResolvedSource } from "../../resolve/config-resolver.js";
import type { ResolvedDependency } from "../../resolve/dependency-resolver.js";
import { buildGraphs, type GraphTarget } from "../../resolve/graph-builder.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanSettings = {
  repoRoot: string;
  registries: string[];
  /** Label key that stores the service definition hash. */
  hashLabel: string;
  /** Tag the manifest's `latest` version as `latest`. */
  tagLatest: boolean;
  /** Additional tags applied to the requested targets only. */
  extraTags: string[];
};

export type PlannedNode = {
  key: string;
  node: BuildNode;
  config: EffectiveConfig;
  dependencies: ResolvedDependency[];
  hash: string;
  isTarget: boolean;
  /** First tag of the first registry; the reference dependents and freshness checks use. */
  primaryRef: string;
  imageRefs: string[];
  contextPath: string;
  dockerfilePath: string;
  /** Build args known at plan time; source revisions are added when the node is built. */
  buildArgs: Record<string, string>;
  labels: Record<string, string>;
};

export type BuildPlan = {
  graph: BuildGraph;
  steps: PlannedNode[];
  targetKeys: string[];
  /** Target key to every node key it needs, itself included. */
  requirements: Map<string, Set<string>>;
  notes: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createBuildPlan(args: {
  store: DescriptorStore;
  targets: GraphTarget[];
  settings: PlanSettings;
}): Promise<BuildPlan> {
  const { settings } = args;
  const resolved = await buildGraphs(args.store, args.targets);
  const order = topologicalSort(resolved.graph);
  const hashes = await computeGraphHashes({ order, nodes: resolved.nodes, store: args.store });

  const targetKeys = resolved.roots.map(nodeKey);
  const targetSet = new Set(targetKeys);
  const primaryRefs = new Map<string, string>();
  const sharedRefs = new Map<string, string>();
  const steps: PlannedNode[] = [];

  for (const node of order) {
    const key = nodeKey(node);
    const entry = resolved.nodes.get(key);
    const hash = hashes.get(key);
    if (!entry || hash === undefined) continue;

    const isTarget = targetSet.has(key);
    const imageRefs = imageReferences(entry.config, settings, isTarget);
    const primaryRef = imageRefs[0] ?? `${entry.config.service}:${nodeImageTag(node)}`;
    primaryRefs.set(key, primaryRef);
    sharedRefs.set(key, imageRefs.find((ref) => ref.endsWith(`:${node.version}`)) ?? primaryRef);

    const dependencyArgs: Record<string, string> = {};
    for (const dependency of entry.dependencies) {
      const refs = dependency.rule === "single-platform" ? sharedRefs : primaryRefs;
      const ref = refs.get(nodeKey(dependency.node));
      if (ref !== undefined) dependencyArgs[dependency.declaration.buildArg] = ref;
    }

    steps.push({
      key,
      node,
      config: entry.config,
      dependencies: entry.dependencies,
      hash,
      isTarget,
      primaryRef,
      imageRefs,
      contextPath: path.resolve(settings.repoRoot, entry.config.context),
      dockerfilePath: path.resolve(settings.repoRoot, entry.config.dockerfile),
      buildArgs: {
        ...externalImageArgs(entry.config),
        ...tlsArgs(entry.config),
        ...entry.config.buildArgs,
        ...dependencyArgs,
      },
      labels: { ...entry.config.labels, [settings.hashLabel]: hash },
    });
  }

  const requirements = new Map<string, Set<string>>();
  for (const root of resolved.roots) {
    requirements.set(nodeKey(root), collectDependencies(resolved.graph, [root]));
  }

  return { graph: resolved.graph, steps, targetKeys, requirements, notes: resolved.notes };
}

/**
 * Tags for a node. The default platform of a multi-platform service also receives the
 * unsuffixed tags, so `web:v1` and `web:v1-debian` point at the same image.
 */
export function imageTags(
  config: Pick<EffectiveConfig, "node" | "platform" | "defaultPlatform" | "extraTags" | "latest">,
  opts: { tagLatest: boolean; extraTags: string[] },
): string[] {
  const bases = [config.node.version, ...config.extraTags, ...opts.extraTags];
  if (config.latest && opts.tagLatest) bases.push("latest");

  const tags: string[] = [];
  const add = (tag: string): void => {
    if (!tags.includes(tag)) tags.push(tag);
  };

  for (const base of bases) {
    if (config.platform) {
      add(`${base}-${config.platform}`);
      if (config.platform === config.defaultPlatform) add(base);
    } else {
      add(base);
    }
  }
  return tags;
}

/** `<KEY>_URL`, `<KEY>_REF`, `<KEY>_SHA` for git sources and `<KEY>_PATH` for local ones. */
export function sourceBuildArgs(
  sources: Record<string, ResolvedSource>,
  revisions: Record<string, string>,
): Record<string, string> {
  const args: Record<string, string> = {};
  for (const key of Object.keys(sources).sort()) {
    const source = sources[key];
    if (source === undefined) continue;

    const prefix = buildArgName(key);
    if (source.kind === "local") {
      args[`${prefix}_PATH`] = source.path;
      continue;
    }
    args[`${prefix}_URL`] = source.url;
    if (source.ref !== null) args[`${prefix}_REF`] = source.ref;
    const sha = revisions[key];
    if (sha !== undefined) args[`${prefix}_SHA`] = sha;
  }
  return args;
}

export function buildArgName(key: string): string {
  return key.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

// =============================================================================
// INTERNALS
// =============================================================================

function imageReferences(config: EffectiveConfig, settings: PlanSettings, isTarget: boolean): string[] {
  const tags = imageTags(config, {
    tagLatest: settings.tagLatest,
    extraTags: isTarget ? settings.extraTags : [],
  });
  const names =
    settings.registries.length > 0
      ? settings.registries.map((registry) => `${registry.replace(/\/+$/, "")}/${config.service}`)
      : [config.service];

  return names.flatMap((name) => tags.map((tag) => `${name}:${tag}`));
}

function externalImageArgs(config: EffectiveConfig): Record<string, string> {
  const args: Record<string, string> = {};
  for (const image of Object.values(config.externalImages)) {
    if (image.buildArg) args[image.buildArg] = image.reference;
  }
  return args;
}

function tlsArgs(config: EffectiveConfig): Record<string, string> {
  if (!config.tls.enabled) return {};
  const args: Record<string, string> = { TLS_ENABLED: "true" };
  if (config.tls.certName) args.TLS_CERT_NAME = config.tls.certName;
  if (config.tls.caName) args.TLS_CA_NAME = config.tls.caName;
  return args;
}
