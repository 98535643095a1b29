/**
 * Cross-document descriptor validation.
 * Purpose: enforce the manifest invariants zod cannot express on a single document.
 * Assumptions: inputs already passed schema parsing.
 * Usage: validateServiceDocuments(name, { descriptor, versions, platforms }) returns issue strings.
 */

import type { PlatformManifest, ServiceDescriptor, VersionManifest } from "./schema.js";

export type ServiceDocuments = {
  descriptor: ServiceDescriptor;
  versions: VersionManifest | null;
  platforms: PlatformManifest | null;
};

export function validateServiceDocuments(serviceName: string, docs: ServiceDocuments): string[] {
  const issues: string[] = [];

  if (docs.descriptor.name !== undefined && docs.descriptor.name !== serviceName) {
    issues.push(`descriptor name "${docs.descriptor.name}" does not match service "${serviceName}"`);
  }

  if (docs.descriptor.version !== undefined) {
    if (docs.platforms) {
      issues.push("version: not allowed in the base descriptor of a multi-platform service");
    } else if (docs.versions) {
      issues.push("version: not allowed in the base descriptor when a version manifest exists");
    }
  }

  const platformNames = docs.platforms ? docs.platforms.platforms.map((p) => p.name) : [];
  if (docs.platforms) {
    issues.push(...validatePlatformManifest(docs.platforms));
  }
  if (docs.versions) {
    issues.push(...validateVersionManifest(docs.versions, platformNames));
  }

  return issues;
}

export function validatePlatformManifest(manifest: PlatformManifest): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const [index, platform] of manifest.platforms.entries()) {
    if (seen.has(platform.name)) {
      issues.push(`platforms.${index}.name: duplicate platform "${platform.name}"`);
    }
    seen.add(platform.name);

    if (platform.version !== undefined) {
      issues.push(`platforms.${index}.version: not allowed in a platform entry`);
    }
  }

  if (!seen.has(manifest.default)) {
    issues.push(`default: platform "${manifest.default}" is not declared`);
  }

  return issues;
}

export function validateVersionManifest(
  manifest: VersionManifest,
  platformNames: string[],
): string[] {
  const issues: string[] = [];
  const names = new Set<string>();
  const tagOwners = new Map<string, string>();
  const latest: string[] = [];

  for (const [index, entry] of manifest.versions.entries()) {
    if (names.has(entry.name)) {
      issues.push(`versions.${index}.name: duplicate version "${entry.name}"`);
    }
    names.add(entry.name);

    const suffix = platformNames.find((platform) => entry.name.endsWith(`-${platform}`));
    if (suffix) {
      issues.push(
        `versions.${index}.name: "${entry.name}" must not carry the platform suffix "-${suffix}"`,
      );
    }

    if (entry.latest) latest.push(entry.name);

    for (const tag of entry.tags) {
      const owner = tagOwners.get(tag);
      if (owner !== undefined) {
        issues.push(`versions.${index}.tags: tag "${tag}" already used by version "${owner}"`);
      }
      tagOwners.set(tag, entry.name);
    }

    if (entry.overrides.name !== undefined || entry.overrides.version !== undefined) {
      issues.push(`versions.${index}.overrides: name and version cannot be overridden`);
    }

    for (const [platform, fragment] of Object.entries(entry.overrides.platforms ?? {})) {
      if (!platformNames.includes(platform)) {
        issues.push(`versions.${index}.overrides.platforms.${platform}: unknown platform`);
      }
      if (fragment.name !== undefined || fragment.version !== undefined) {
        issues.push(
          `versions.${index}.overrides.platforms.${platform}: name and version cannot be overridden`,
        );
      }
    }
  }

  for (const [tag, owner] of tagOwners) {
    if (names.has(tag)) {
      issues.push(`tags: tag "${tag}" of version "${owner}" collides with a version name`);
    }
  }

  if (latest.length > 1) {
    issues.push(`versions: only one version may be latest (found ${latest.join(", ")})`);
  }

  if (manifest.default !== undefined && !names.has(manifest.default)) {
    issues.push(`default: version "${manifest.default}" is not declared`);
  }

  return issues;
}
