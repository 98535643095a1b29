import { Command } from "commander";

import { resolveColorEnabled } from "../core/error-format.js";
import type { DescriptorStore } from "../descriptors/store.js";
import { FileDescriptorStore } from "../descriptors/store.js";
import { nodeKey } from "../graph/node.js";
import { topologicalSort } from "../graph/sort.js";
import { computeGraphHashes } from "../hash/service-hash.js";
import { buildGraph, type GraphTarget } from "../resolve/graph-builder.js";

import type { GlobalOptions } from "./build.js";
import { loadConfigForCli } from "./config.js";
import { reportCliError } from "./output.js";

type HashCommandOptions = {
  service: string;
  version?: string;
  platform?: string;
  all: boolean;
};

export type NodeHash = { key: string; hash: string };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerHashCommand(program: Command): void {
  program
    .command("hash")
    .description("Print the service definition hash of a node")
    .requiredOption("-s, --service <name>", "Service name")
    .option("-v, --version <spec>", "Version name, extra tag, or 'latest'")
    .option("-p, --platform <name>", "Platform of a multi-platform service")
    .option("--all", "Also print the hash of every dependency", false)
    .action(async (opts: HashCommandOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      try {
        const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
        const store = new FileDescriptorStore(config.repo_root, config.services_dir);
        const hashes = await hashTarget(store, {
          service: opts.service,
          version: opts.version,
          platform: opts.platform,
        });
        const shown = opts.all ? hashes : hashes.slice(-1);
        console.log(shown.map((entry) => `${entry.hash}  ${entry.key}`).join("\n"));
      } catch (err) {
        reportCliError(err, {
          debug: globals.debug,
          color: resolveColorEnabled({ useColor: globals.color }),
        });
      }
    });
}

/** Hashes of the target's graph in build order; the target itself comes last. */
export async function hashTarget(store: DescriptorStore, target: GraphTarget): Promise<NodeHash[]> {
  const resolved = await buildGraph(store, target);
  const order = topologicalSort(resolved.graph);
  const hashes = await computeGraphHashes({ order, nodes: resolved.nodes, store });

  return order.flatMap((node) => {
    const key = nodeKey(node);
    const hash = hashes.get(key);
    return hash === undefined ? [] : [{ key, hash }];
  });
}
