/**
 * Config resolver.
 * Purpose: merge base, platform, and version layers into one effective configuration per node.
 * Assumptions: the descriptor store returns fresh documents on every call; nothing here is cached.
 * Usage: const config = await resolveEffectiveConfig(store, "web", "v1.0.0", "debian");
 */

import { ConfigValidationError } from "../core/errors.js";
import {
  platformEntryFragment,
  versionGlobalOverrides,
  type ConfigFragment,
  type PlatformManifest,
  type ServiceDescriptor,
  type SourceFragment,
  type VersionEntry,
  type VersionManifest,
} from "../descriptors/schema.js";
import type { DescriptorStore } from "../descriptors/store.js";
import { validateServiceDocuments } from "../descriptors/validate.js";
import { createNode, type BuildNode } from "../graph/node.js";

import { mergeFragments } from "./merge.js";

// =============================================================================
// TYPES
// =============================================================================

export const LATEST_VERSION_SPEC = "latest";

export type ResolvedSource =
  | { kind: "git"; url: string; ref: string | null }
  | { kind: "local"; path: string };

export type ResolvedExternalImage = {
  image: string;
  tag: string | null;
  buildArg: string | null;
  reference: string;
};

export type DependencyDeclaration = {
  name: string;
  service: string;
  buildArg: string;
  version: string | null;
  singlePlatform: boolean;
};

export type TlsSettings = {
  enabled: boolean;
  certName: string | null;
  caName: string | null;
};

export type EffectiveConfig = {
  node: BuildNode;
  service: string;
  version: string;
  platform: string | null;
  platforms: string[];
  defaultPlatform: string | null;
  context: string;
  dockerfile: string;
  sources: Record<string, ResolvedSource>;
  externalImages: Record<string, ResolvedExternalImage>;
  dependencies: DependencyDeclaration[];
  buildArgs: Record<string, string>;
  labels: Record<string, string>;
  tls: TlsSettings;
  extraTags: string[];
  latest: boolean;
};

export type ServiceDocumentSet = {
  descriptor: ServiceDescriptor;
  versions: VersionManifest | null;
  platforms: PlatformManifest | null;
};

export type ResolvedVersion = {
  name: string;
  entry: VersionEntry | null;
  platform: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadServiceDocuments(
  store: DescriptorStore,
  service: string,
): Promise<ServiceDocumentSet> {
  const [descriptor, versions, platforms] = await Promise.all([
    store.loadServiceDescriptor(service),
    store.loadVersionManifest(service),
    store.loadPlatformManifest(service),
  ]);

  const issues = validateServiceDocuments(service, { descriptor, versions, platforms });
  if (issues.length > 0) {
    throw new ConfigValidationError(
      [`Invalid configuration for service "${service}":`, ...issues.map((i) => `  - ${i}`)].join(
        "\n",
      ),
    );
  }

  return { descriptor, versions, platforms };
}

export async function resolveEffectiveConfig(
  store: DescriptorStore,
  service: string,
  versionSpec?: string | null,
  platform?: string | null,
): Promise<EffectiveConfig> {
  const docs = await loadServiceDocuments(store, service);
  return resolveFromDocuments(service, docs, versionSpec, platform);
}

export function resolveFromDocuments(
  service: string,
  docs: ServiceDocumentSet,
  versionSpec?: string | null,
  platform?: string | null,
): EffectiveConfig {
  const version = resolveVersionSpec(service, docs, versionSpec);
  const platformName = resolvePlatform(service, docs.platforms, platform ?? version.platform);

  const layers: ConfigFragment[] = [stripIdentity(docs.descriptor)];
  if (platformName && docs.platforms) {
    const entry = docs.platforms.platforms.find((p) => p.name === platformName);
    if (entry) layers.push(platformEntryFragment(entry));
  }
  if (version.entry) {
    layers.push(versionGlobalOverrides(version.entry));
    const platformOverrides = platformName
      ? version.entry.overrides.platforms?.[platformName]
      : undefined;
    if (platformOverrides) layers.push(platformOverrides);
  }

  const merged = layers.reduce<ConfigFragment>((acc, layer) => mergeFragments(acc, layer), {});
  const node = createNode(service, version.name, platformName);

  return {
    node,
    service,
    version: version.name,
    platform: platformName,
    platforms: docs.platforms ? docs.platforms.platforms.map((p) => p.name) : [],
    defaultPlatform: docs.platforms?.default ?? null,
    context: requireField(merged.context, "context", node),
    dockerfile: requireField(merged.dockerfile, "dockerfile", node),
    sources: finalizeSources(merged.sources ?? {}, service),
    externalImages: finalizeExternalImages(merged.external_images ?? {}, service),
    dependencies: finalizeDependencies(merged.dependencies ?? {}, service),
    buildArgs: { ...(merged.build_args ?? {}) },
    labels: { ...(merged.labels ?? {}) },
    tls: {
      enabled: merged.tls?.enabled ?? false,
      certName: merged.tls?.cert_name ?? null,
      caName: merged.tls?.ca_name ?? null,
    },
    extraTags: version.entry ? [...version.entry.tags] : [],
    latest: version.entry?.latest ?? false,
  };
}

/**
 * Resolve a version spec (name, extra tag, or "latest") against a service's manifest.
 * An undefined spec selects the manifest default, then the latest entry.
 */
export function resolveVersionSpec(
  service: string,
  docs: ServiceDocumentSet,
  versionSpec?: string | null,
): ResolvedVersion {
  const spec = versionSpec?.trim() || null;

  if (!docs.versions) {
    const single = docs.descriptor.version;
    if (!single) {
      throw new ConfigValidationError(
        `Service "${service}" has neither a version manifest nor a version field.`,
      );
    }
    if (spec !== null && spec !== LATEST_VERSION_SPEC && spec !== single) {
      throw new ConfigValidationError(
        `Version "${spec}" not found for service "${service}". Available: ${single}`,
      );
    }
    return { name: single, entry: null, platform: null };
  }

  const manifest = docs.versions;
  const target = spec ?? manifest.default ?? null;

  if (target === null) {
    const latest = manifest.versions.find((entry) => entry.latest);
    if (!latest) {
      throw new ConfigValidationError(
        `Service "${service}" has no default or latest version; pass a version explicitly.`,
      );
    }
    return { name: latest.name, entry: latest, platform: null };
  }

  const direct = findVersionEntry(manifest, target);
  if (direct) return { name: direct.name, entry: direct, platform: null };

  const split = splitPlatformSuffix(target, docs.platforms);
  if (split) {
    const entry = findVersionEntry(manifest, split.version);
    if (entry) return { name: entry.name, entry, platform: split.platform };
  }

  const available = manifest.versions.map((entry) => entry.name).join(", ");
  throw new ConfigValidationError(
    `Version "${target}" not found for service "${service}". Available: ${available}`,
  );
}

export function findVersionEntry(manifest: VersionManifest, spec: string): VersionEntry | null {
  if (spec === LATEST_VERSION_SPEC) {
    return manifest.versions.find((entry) => entry.latest) ?? null;
  }
  return (
    manifest.versions.find((entry) => entry.name === spec) ??
    manifest.versions.find((entry) => entry.tags.includes(spec)) ??
    null
  );
}

export function splitPlatformSuffix(
  version: string,
  platforms: PlatformManifest | null,
): { version: string; platform: string } | null {
  if (!platforms) return null;

  // Longest platform name first so "debian-slim" wins over "slim".
  const names = platforms.platforms.map((p) => p.name).sort((a, b) => b.length - a.length);
  for (const name of names) {
    const suffix = `-${name}`;
    if (version.length > suffix.length && version.endsWith(suffix)) {
      return { version: version.slice(0, -suffix.length), platform: name };
    }
  }
  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolvePlatform(
  service: string,
  platforms: PlatformManifest | null,
  requested: string | null | undefined,
): string | null {
  const platform = requested?.trim() || null;

  if (!platforms) {
    if (platform !== null) {
      throw new ConfigValidationError(
        `Service "${service}" is single-platform; platform "${platform}" cannot be applied.`,
      );
    }
    return null;
  }

  if (platform === null) return platforms.default;

  if (!platforms.platforms.some((p) => p.name === platform)) {
    const available = platforms.platforms.map((p) => p.name).join(", ");
    throw new ConfigValidationError(
      `Platform "${platform}" not found for service "${service}". Available: ${available}`,
    );
  }
  return platform;
}

function stripIdentity(descriptor: ServiceDescriptor): ConfigFragment {
  const { name: _name, version: _version, ...fragment } = descriptor;
  return fragment;
}

function requireField(value: string | undefined, field: string, node: BuildNode): string {
  if (value === undefined || value.trim().length === 0) {
    throw new ConfigValidationError(
      `Service "${node.service}" (version ${node.version}${node.platform ? `, platform ${node.platform}` : ""}) is missing required field "${field}".`,
    );
  }
  return value;
}

function finalizeSources(
  sources: Record<string, SourceFragment>,
  service: string,
): Record<string, ResolvedSource> {
  const resolved: Record<string, ResolvedSource> = {};

  for (const [key, source] of Object.entries(sources)) {
    const isGit = source.url !== undefined || source.ref !== undefined;
    if (source.path !== undefined && isGit) {
      throw new ConfigValidationError(
        `Source "${key}" of service "${service}" mixes path with url/ref; a source is either git or local.`,
      );
    }
    if (source.path !== undefined) {
      resolved[key] = { kind: "local", path: source.path };
      continue;
    }
    if (source.url === undefined) {
      throw new ConfigValidationError(
        `Source "${key}" of service "${service}" needs a url (git) or a path (local).`,
      );
    }
    resolved[key] = { kind: "git", url: source.url, ref: source.ref ?? null };
  }

  return resolved;
}

function finalizeExternalImages(
  images: NonNullable<ConfigFragment["external_images"]>,
  service: string,
): Record<string, ResolvedExternalImage> {
  const resolved: Record<string, ResolvedExternalImage> = {};

  for (const [slot, entry] of Object.entries(images)) {
    if (!entry.image) {
      throw new ConfigValidationError(
        `External image "${slot}" of service "${service}" is missing required field "image".`,
      );
    }
    resolved[slot] = {
      image: entry.image,
      tag: entry.tag ?? null,
      buildArg: entry.build_arg ?? null,
      reference: entry.tag ? `${entry.image}:${entry.tag}` : entry.image,
    };
  }

  return resolved;
}

function finalizeDependencies(
  dependencies: NonNullable<ConfigFragment["dependencies"]>,
  service: string,
): DependencyDeclaration[] {
  return Object.entries(dependencies).map(([name, entry]) => {
    if (!entry.build_arg) {
      throw new ConfigValidationError(
        `Dependency "${name}" of service "${service}" is missing required field "build_arg".`,
      );
    }
    return {
      name,
      service: entry.service ?? name,
      buildArg: entry.build_arg,
      version: entry.version ?? null,
      singlePlatform: entry.single_platform ?? false,
    };
  });
}
