import { minimatch } from "minimatch";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { DescriptorStore } from "../descriptors/store.js";
import {
  findVersionEntry,
  loadServiceDocuments,
  splitPlatformSuffix,
  type ServiceDocumentSet,
} from "../resolve/config-resolver.js";
import type { GraphTarget } from "../resolve/graph-builder.js";

export type TargetSelection = {
  serviceGlobs: string[];
  versions: string[];
  allVersions: boolean;
  platform?: string;
};

/**
 * Expand CLI selectors into graph targets: every matching service, each requested version
 * (default when none given), and each platform (the filter, or all platforms).
 */
export async function selectTargets(
  store: DescriptorStore,
  selection: TargetSelection,
): Promise<GraphTarget[]> {
  const available = await store.listServiceNames();
  const services = matchServices(available, selection.serviceGlobs);
  const lenient = services.length > 1;
  const targets: GraphTarget[] = [];

  for (const service of services) {
    const docs = await loadServiceDocuments(store, service);

    for (const version of requestedVersions(docs, selection, lenient)) {
      for (const platform of requestedPlatforms(docs, version, selection.platform, lenient)) {
        targets.push({ service, version, platform });
      }
    }
  }

  if (targets.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Nothing to build.",
      message: "No service matched the requested version and platform filters.",
      hint: "Run `foundry list-services` to see the available services and versions.",
    });
  }

  return targets;
}

export function matchServices(available: string[], globs: string[]): string[] {
  const patterns = globs.map((glob) => glob.trim()).filter(Boolean);
  if (patterns.length === 0) return [...available];

  const selected = new Set<string>();
  for (const pattern of patterns) {
    const matches = available.filter((name) => minimatch(name, pattern));
    if (matches.length === 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Unknown service.",
        message: `No service matches "${pattern}". Available: ${available.join(", ") || "(none)"}`,
        hint: "Check the spelling or quote glob patterns so the shell does not expand them.",
      });
    }
    for (const match of matches) selected.add(match);
  }

  return available.filter((name) => selected.has(name));
}

// =============================================================================
// INTERNALS
// =============================================================================

/** `undefined` defers to the resolver's default version. */
function requestedVersions(
  docs: ServiceDocumentSet,
  selection: TargetSelection,
  lenient: boolean,
): Array<string | undefined> {
  if (selection.allVersions) {
    if (docs.versions) return docs.versions.versions.map((entry) => entry.name);
    return docs.descriptor.version ? [docs.descriptor.version] : [];
  }

  if (selection.versions.length === 0) return [undefined];
  if (!lenient) return [...selection.versions];

  return selection.versions.filter((spec) => hasVersion(docs, spec));
}

function hasVersion(docs: ServiceDocumentSet, spec: string): boolean {
  if (!docs.versions) return docs.descriptor.version === spec;
  if (findVersionEntry(docs.versions, spec)) return true;

  const split = splitPlatformSuffix(spec, docs.platforms);
  return split !== null && findVersionEntry(docs.versions, split.version) !== null;
}

/**
 * `undefined` means a single-platform service. A platform-suffixed version spec pins its
 * own platform.
 */
function requestedPlatforms(
  docs: ServiceDocumentSet,
  version: string | undefined,
  filter: string | undefined,
  lenient: boolean,
): Array<string | undefined> {
  const pinned =
    version !== undefined && !(docs.versions && findVersionEntry(docs.versions, version))
      ? splitPlatformSuffix(version, docs.platforms)
      : null;
  const names = pinned
    ? [pinned.platform]
    : (docs.platforms?.platforms.map((p) => p.name) ?? []);

  if (pinned && filter && filter !== pinned.platform) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Conflicting platform selection.",
      message: `Version "${version}" pins platform "${pinned.platform}", but --platform requests "${filter}".`,
      hint: `Drop --platform, or pass the unsuffixed version "${pinned.version}".`,
    });
  }

  if (!filter) return names.length > 0 ? names : [undefined];
  if (names.includes(filter) || !lenient) return [filter];
  return [];
}
