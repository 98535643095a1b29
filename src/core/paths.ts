import path from "node:path";

import type { ProjectConfig } from "./config.js";

export function logsDirPath(config: Pick<ProjectConfig, "repo_root" | "logs_dir">): string {
  return path.resolve(config.repo_root, config.logs_dir);
}

export function runLogPath(
  config: Pick<ProjectConfig, "repo_root" | "logs_dir">,
  runId: string,
): string {
  return path.join(logsDirPath(config), `${runId}.jsonl`);
}
