/*
Purpose: resolve git source refs to commit SHAs once per (url, ref) pair within a build run.
Assumptions: the cache is a plain value owned by the caller; it is never mutated in place.
Usage: const { revisions, cache: next } = await resolveSourceRevisions(config.sources, cache, lookup);
*/

import type { ResolvedSource } from "../resolve/config-resolver.js";

import type { RevisionLookup } from "./remote.js";

export type RevisionCache = ReadonlyMap<string, string>;

export type SourceRevisions = {
  /** Source key to commit SHA, for git sources only. */
  revisions: Record<string, string>;
  cache: RevisionCache;
};

export function emptyRevisionCache(): RevisionCache {
  return new Map<string, string>();
}

export async function resolveSourceRevisions(
  sources: Record<string, ResolvedSource>,
  cache: RevisionCache,
  lookup: RevisionLookup,
): Promise<SourceRevisions> {
  const next = new Map(cache);
  const revisions: Record<string, string> = {};

  for (const key of Object.keys(sources).sort()) {
    const source = sources[key];
    if (source === undefined || source.kind !== "git") continue;

    const cacheKey = revisionCacheKey(source.url, source.ref);
    let sha = next.get(cacheKey);
    if (sha === undefined) {
      sha = await lookup(source.url, source.ref);
      next.set(cacheKey, sha);
    }
    revisions[key] = sha;
  }

  return { revisions, cache: next };
}

function revisionCacheKey(url: string, ref: string | null): string {
  return `${url}#${ref ?? "HEAD"}`;
}
