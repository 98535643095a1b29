import fs from "node:fs";
import path from "node:path";

export const PROJECT_CONFIG_FILE = "foundry.yaml";

export type ConfigSource = "explicit" | "repo" | "defaults";

export type ConfigResolution = {
  configPath: string;
  repoRoot: string;
  source: ConfigSource;
};

/**
 * Locate the project config. An explicit path wins; otherwise foundry.yaml at the repository
 * root (found by walking up to `.git`), falling back to the working directory.
 */
export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = path.resolve(args.cwd ?? process.cwd());

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return { configPath, repoRoot: path.dirname(configPath), source: "explicit" };
  }

  const repoRoot = findRepoRoot(cwd) ?? cwd;
  const configPath = path.join(repoRoot, PROJECT_CONFIG_FILE);
  return {
    configPath,
    repoRoot,
    source: fs.existsSync(configPath) ? "repo" : "defaults",
  };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
