/*
Purpose: read foundry.yaml, validate it, and apply defaults plus environment overrides.
Assumptions: relative paths in the file are relative to the repository root that holds it.
Usage: const config = loadProjectConfig(configPath, { repoRoot, env: process.env });
*/

import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { DepCacheModeSchema, ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export const DEP_CACHE_ENV = "FOUNDRY_DEP_CACHE";

export type LoadProjectConfigOptions = {
  repoRoot?: string;
  env?: NodeJS.ProcessEnv;
  /** When false, a missing file yields the defaults instead of an error. */
  required?: boolean;
};

export function loadProjectConfig(
  configPath: string,
  opts: LoadProjectConfigOptions = {},
): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  const repoRoot = path.resolve(opts.repoRoot ?? path.dirname(resolvedPath));
  const env = opts.env ?? process.env;

  let raw: unknown = {};
  if (fs.existsSync(resolvedPath)) {
    raw = parseYaml(resolvedPath);
  } else if (opts.required ?? true) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No project config found at ${resolvedPath}.`,
      hint: "Create foundry.yaml at the repository root or drop --config to use the defaults.",
    });
  }

  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config is invalid.",
      message: [`Invalid project config at ${resolvedPath}:`, ...formatIssues(parsed.error.issues)].join(
        "\n",
      ),
      hint: "Fix the listed fields and rerun.",
      cause: new ConfigError(`Invalid project config at ${resolvedPath}`, parsed.error),
    });
  }

  const config: ProjectConfig = { ...parsed.data, repo_root: repoRoot, ci: isCi(env) };

  const depCacheOverride = env[DEP_CACHE_ENV]?.trim();
  if (depCacheOverride) {
    const mode = DepCacheModeSchema.safeParse(depCacheOverride);
    if (!mode.success) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Invalid dependency cache mode.",
        message: `${DEP_CACHE_ENV}=${depCacheOverride} is not one of: off, soft, strict.`,
      });
    }
    config.build = { ...config.build, dep_cache: mode.data };
  }

  return config;
}

function parseYaml(filePath: string): unknown {
  const text = fs.readFileSync(filePath, "utf8");
  try {
    return yaml.load(text);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config is invalid.",
      message: `Could not parse YAML in ${filePath}.`,
      hint: "Check the file for indentation or quoting mistakes.",
      cause: new ConfigError(`YAML parse error in ${filePath}`, err),
    });
  }
}

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `  - ${where}: ${issue.message}`;
  });
}

function isCi(env: NodeJS.ProcessEnv): boolean {
  const value = env.CI?.trim().toLowerCase();
  return value === "true" || value === "1";
}
