/**
 * Dependency resolver.
 * Purpose: decide the concrete (service, version, platform?) a dependency declaration points at.
 * Assumptions: versions are pinned explicitly or inherited from the parent, never defaulted
 *   from the dependency's own manifest; platform reuse across parents is advisory.
 * Usage: const dep = await resolveDependency(store, declaration, { service, version, platform });
 */

import { DependencyResolutionError } from "../core/errors.js";
import type { DescriptorStore } from "../descriptors/store.js";
import { createNode, nodeKey, type BuildNode } from "../graph/node.js";

import {
  findVersionEntry,
  LATEST_VERSION_SPEC,
  loadServiceDocuments,
  splitPlatformSuffix,
  type DependencyDeclaration,
  type ServiceDocumentSet,
} from "./config-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type DependencyParent = {
  service: string;
  version: string | null;
  platform: string | null;
};

export type DependencyResolutionRule =
  | "explicit-platform"
  | "single-platform"
  | "platform-inherited"
  | "cross-platform-reuse"
  | "default-platform";

export type ResolvedDependency = {
  declaration: DependencyDeclaration;
  node: BuildNode;
  rule: DependencyResolutionRule;
  /** Informational message for advisory resolutions (platform reuse, default platform). */
  note: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveDependency(
  store: DescriptorStore,
  declaration: DependencyDeclaration,
  parent: DependencyParent,
): Promise<ResolvedDependency> {
  const docs = await loadServiceDocuments(store, declaration.service);
  return resolveDependencyFromDocuments(declaration, parent, docs);
}

export function resolveDependencyFromDocuments(
  declaration: DependencyDeclaration,
  parent: DependencyParent,
  docs: ServiceDocumentSet,
): ResolvedDependency {
  const depService = declaration.service;
  const parentLabel = describeParent(parent);
  const explicit = declaration.version;

  if (explicit !== null) {
    const split = splitPlatformSuffix(explicit, docs.platforms);
    if (split) {
      const version = canonicalVersion(docs, split.version, depService, parentLabel, "pins");
      return {
        declaration,
        node: createNode(depService, version, split.platform),
        rule: "explicit-platform",
        note: null,
      };
    }
  }

  const requested = explicit ?? parent.version;
  if (requested === null) {
    throw new DependencyResolutionError(
      `Dependency "${declaration.name}" of ${parentLabel} has no version: declare one explicitly or build a versioned parent.`,
    );
  }
  const version = canonicalVersion(
    docs,
    requested,
    depService,
    parentLabel,
    explicit === null ? "inherits" : "pins",
  );

  if (declaration.singlePlatform) {
    // Every parent platform shares one image, referenced by its unsuffixed tag.
    return {
      declaration,
      node: createNode(depService, version, docs.platforms?.default ?? null),
      rule: "single-platform",
      note: null,
    };
  }

  if (!docs.platforms) {
    const node = createNode(depService, version);
    return {
      declaration,
      node,
      rule: "cross-platform-reuse",
      note: parent.platform
        ? `${depService} is single-platform; ${parentLabel} reuses ${nodeKey(node)}.`
        : null,
    };
  }

  if (parent.platform) {
    if (!platformNames(docs).includes(parent.platform)) {
      throw new DependencyResolutionError(
        `Dependency "${declaration.name}" of ${parentLabel} inherits platform "${parent.platform}", which "${depService}" does not define (available: ${platformNames(docs).join(", ")}).`,
      );
    }
    return {
      declaration,
      node: createNode(depService, version, parent.platform),
      rule: "platform-inherited",
      note: null,
    };
  }

  const node = createNode(depService, version, docs.platforms.default);
  return {
    declaration,
    node,
    rule: "default-platform",
    note: `${parentLabel} is single-platform; using default platform of ${depService}: ${nodeKey(node)}.`,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function canonicalVersion(
  docs: ServiceDocumentSet,
  version: string,
  depService: string,
  parentLabel: string,
  verb: "pins" | "inherits",
): string {
  if (version === LATEST_VERSION_SPEC) {
    throw new DependencyResolutionError(
      `${parentLabel} ${verb} "${depService}" at "latest"; dependency versions must be pinned explicitly.`,
    );
  }

  if (docs.versions) {
    const entry = findVersionEntry(docs.versions, version);
    if (entry) return entry.name;
  } else if (docs.descriptor.version === version) {
    return version;
  }

  throw new DependencyResolutionError(
    `${parentLabel} ${verb} version "${version}" of "${depService}", which does not define it.`,
  );
}

function platformNames(docs: ServiceDocumentSet): string[] {
  return docs.platforms ? docs.platforms.platforms.map((p) => p.name) : [];
}

function describeParent(parent: DependencyParent): string {
  const version = parent.version ?? "<unversioned>";
  return parent.platform
    ? `${parent.service}:${version}:${parent.platform}`
    : `${parent.service}:${version}`;
}
