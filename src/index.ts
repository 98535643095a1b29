import { Command } from "commander";

import { registerBuildCommand } from "./cli/build.js";
import { registerHashCommand } from "./cli/hash.js";
import { registerListServicesCommand } from "./cli/list-services.js";

export const CLI_VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("foundry")
    .description("Dependency-aware container image builds for multi-service repositories")
    .version(CLI_VERSION, "-V")
    .option("-c, --config <path>", "Path to foundry.yaml (default: repository root)")
    .option("--debug", "Show error codes, causes, and stack traces", false)
    .option("--no-color", "Disable colored output");

  registerBuildCommand(program);
  registerListServicesCommand(program);
  registerHashCommand(program);

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await createProgram().parseAsync(argv);
}
