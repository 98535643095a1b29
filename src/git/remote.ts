import { execa } from "execa";

import { GitError } from "../core/errors.js";

// =============================================================================
// REMOTE LOOKUPS
// =============================================================================

const FULL_SHA_PATTERN = /^[0-9a-f]{40}$/;

export type RevisionLookup = (url: string, ref: string | null) => Promise<string>;

/**
 * Resolve a remote ref (branch, tag, or HEAD when null) to a commit SHA with `git ls-remote`.
 * Full SHAs are returned as-is without touching the network.
 */
export async function lsRemoteRevision(url: string, ref: string | null): Promise<string> {
  const target = ref?.trim() || "HEAD";
  if (FULL_SHA_PATTERN.test(target)) return target;

  const result = await execa("git", ["ls-remote", url, target], {
    stdio: "pipe",
    reject: false,
  });

  if (result.exitCode !== 0) {
    const stderr = String(result.stderr ?? "").trim();
    throw new GitError(
      `git ls-remote ${url} ${target} failed${stderr ? `: ${stderr}` : ` with exit code ${result.exitCode}`}`,
    );
  }

  const sha = pickRevision(String(result.stdout ?? ""), target);
  if (!sha) {
    throw new GitError(`Ref "${target}" not found on remote ${url}.`);
  }
  return sha;
}

/**
 * Choose the commit for `target` from ls-remote output. Peeled tag lines (`^{}`) win over the
 * tag object itself.
 */
export function pickRevision(stdout: string, target: string): string | null {
  const rows = stdout
    .split("\n")
    .map((line) => line.trim().split(/\s+/))
    .filter((parts): parts is [string, string] => parts.length === 2 && FULL_SHA_PATTERN.test(parts[0]));

  const peeled = rows.find(([, name]) => name.endsWith("^{}"));
  if (peeled) return peeled[0];

  const exact = rows.find(
    ([, name]) => name === target || name === `refs/heads/${target}` || name === `refs/tags/${target}`,
  );
  return exact?.[0] ?? rows[0]?.[0] ?? null;
}
