import { Command } from "commander";

import { resolveColorEnabled } from "../core/error-format.js";
import type { DescriptorStore } from "../descriptors/store.js";
import { FileDescriptorStore } from "../descriptors/store.js";
import { loadServiceDocuments } from "../resolve/config-resolver.js";

import type { GlobalOptions } from "./build.js";
import { loadConfigForCli } from "./config.js";
import { reportCliError } from "./output.js";

export type ServiceListing = {
  name: string;
  versions: Array<{ name: string; latest: boolean; isDefault: boolean; tags: string[] }>;
  platforms: string[];
  defaultPlatform: string | null;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerListServicesCommand(program: Command): void {
  program
    .command("list-services")
    .alias("ls")
    .description("List services with their versions and platforms")
    .option("--json", "Print machine-readable JSON", false)
    .action(async (opts: { json: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      try {
        const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
        const store = new FileDescriptorStore(config.repo_root, config.services_dir);
        const listings = await listServices(store);
        console.log(
          opts.json ? JSON.stringify(listings, null, 2) : formatServiceListings(listings).join("\n"),
        );
      } catch (err) {
        reportCliError(err, {
          debug: globals.debug,
          color: resolveColorEnabled({ useColor: globals.color }),
        });
      }
    });
}

// =============================================================================
// LISTING
// =============================================================================

export async function listServices(store: DescriptorStore): Promise<ServiceListing[]> {
  const listings: ServiceListing[] = [];

  for (const name of await store.listServiceNames()) {
    const docs = await loadServiceDocuments(store, name);
    const manifest = docs.versions;
    const defaultVersion = manifest?.default ?? null;

    listings.push({
      name,
      versions: manifest
        ? manifest.versions.map((entry) => ({
            name: entry.name,
            latest: entry.latest,
            isDefault: entry.name === defaultVersion,
            tags: [...entry.tags],
          }))
        : docs.descriptor.version
          ? [{ name: docs.descriptor.version, latest: false, isDefault: true, tags: [] }]
          : [],
      platforms: docs.platforms ? docs.platforms.platforms.map((p) => p.name) : [],
      defaultPlatform: docs.platforms?.default ?? null,
    });
  }

  return listings;
}

export function formatServiceListings(listings: ServiceListing[]): string[] {
  if (listings.length === 0) return ["No services found."];

  return listings.map((listing) => {
    const versions = listing.versions
      .map((version) => {
        const marks = [
          version.isDefault ? "default" : null,
          version.latest ? "latest" : null,
          ...version.tags,
        ].filter((mark): mark is string => mark !== null);
        return marks.length > 0 ? `${version.name} (${marks.join(", ")})` : version.name;
      })
      .join(", ");
    const platforms =
      listing.platforms.length > 0
        ? `  platforms: ${listing.platforms
            .map((p) => (p === listing.defaultPlatform ? `${p}*` : p))
            .join(", ")}`
        : "";
    return `${listing.name}: ${versions || "(no versions)"}${platforms}`;
  });
}
