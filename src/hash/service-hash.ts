/**
 * Service Definition Hash.
 * Purpose: deterministic digest of a node's effective configuration folded with its
 *   dependencies' hashes.
 * Assumptions: dependency hashes are computed first (topological order); field order is fixed.
 * Usage: computeServiceDefinitionHash({ node, config, dockerfileContent, dependencyHashes }).
 */

import crypto from "node:crypto";

import { HashComputationError } from "../core/errors.js";
import type { DescriptorStore } from "../descriptors/store.js";
import { nodeKey, type BuildNode } from "../graph/node.js";
import type { EffectiveConfig } from "../resolve/config-resolver.js";
import type { ResolvedNode } from "../resolve/graph-builder.js";

// =============================================================================
// TYPES
// =============================================================================

export type ServiceHashInput = {
  node: BuildNode;
  config: EffectiveConfig;
  dockerfileContent: string;
  /** Hashes of the direct dependencies, in resolved declaration order. */
  dependencyHashes: string[];
};

export const SERVICE_HASH_PATTERN = /^[0-9a-f]{64}$/;

// =============================================================================
// PURE HASH
// =============================================================================

export function computeServiceDefinitionHash(input: ServiceHashInput): string {
  const { node, config } = input;

  const sources = Object.entries(config.sources)
    .map(([key, source]) =>
      source.kind === "git" ? `${key}:${source.ref ?? source.url}` : `${key}:${source.path}`,
    )
    .sort();

  const externalImages = Object.values(config.externalImages)
    .map((image) => image.reference)
    .sort();

  const buildArgs = Object.entries(config.buildArgs)
    .map(([key, value]) => `${key}=${value}`)
    .sort();

  const tls = [
    `enabled=${config.tls.enabled}`,
    `cert_name=${config.tls.certName ?? ""}`,
    `ca_name=${config.tls.caName ?? ""}`,
  ];

  const sections = [
    `node=${nodeKey(node)}`,
    `dockerfile=${sha256(input.dockerfileContent)}`,
    `sources=${sources.join(",")}`,
    `external_images=${externalImages.join(",")}`,
    `build_args=${buildArgs.join(",")}`,
    `tls=${tls.join(",")}`,
    `dependencies=${input.dependencyHashes.join(",")}`,
  ];

  return sha256(sections.join("\n"));
}

// =============================================================================
// GRAPH HASHING
// =============================================================================

/**
 * Hash every node of `order`, which must list dependencies before dependents.
 * Dockerfile contents are read once per path.
 */
export async function computeGraphHashes(args: {
  order: BuildNode[];
  nodes: Map<string, ResolvedNode>;
  store: Pick<DescriptorStore, "readFile">;
}): Promise<Map<string, string>> {
  const hashes = new Map<string, string>();
  const dockerfiles = new Map<string, string>();

  for (const node of args.order) {
    const key = nodeKey(node);
    const resolved = args.nodes.get(key);
    if (!resolved) {
      throw new HashComputationError(`No resolved configuration for ${key}.`);
    }

    const dependencyHashes = resolved.dependencies.map((dependency) => {
      const depKey = nodeKey(dependency.node);
      const hash = hashes.get(depKey);
      if (hash === undefined) {
        throw new HashComputationError(
          `Hash of dependency ${depKey} is not available while hashing ${key}; nodes were not processed in dependency order.`,
        );
      }
      return hash;
    });

    const dockerfilePath = resolved.config.dockerfile;
    let dockerfileContent = dockerfiles.get(dockerfilePath);
    if (dockerfileContent === undefined) {
      dockerfileContent = await args.store.readFile(dockerfilePath);
      dockerfiles.set(dockerfilePath, dockerfileContent);
    }

    hashes.set(
      key,
      computeServiceDefinitionHash({
        node,
        config: resolved.config,
        dockerfileContent,
        dependencyHashes,
      }),
    );
  }

  return hashes;
}

function sha256(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex");
}
