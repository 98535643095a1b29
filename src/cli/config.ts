import type { ProjectConfig } from "../core/config.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath, type ConfigSource } from "../core/config-discovery.js";

export function loadConfigForCli(args: {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): {
  config: ProjectConfig;
  configPath: string;
  source: ConfigSource;
} {
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
  });

  const config = loadProjectConfig(resolved.configPath, {
    repoRoot: resolved.repoRoot,
    env: args.env,
    required: resolved.source === "explicit",
  });

  return { config, configPath: resolved.configPath, source: resolved.source };
}
