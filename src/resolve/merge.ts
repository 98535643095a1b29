/**
 * Layer merge primitives.
 * Purpose: combine descriptor fragments with field-class specific rules.
 * Assumptions: fragments are plain parsed YAML (no class instances); inputs are never mutated.
 * Usage: mergeFragments(base, override); mergeSources(baseSources, overrideSources).
 */

import type { ConfigFragment, SourceFragment } from "../descriptors/schema.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function mergeFragments(base: ConfigFragment, override: ConfigFragment): ConfigFragment {
  const merged: ConfigFragment = { ...base };

  if (override.name !== undefined) merged.name = override.name;
  if (override.version !== undefined) merged.version = override.version;
  if (override.context !== undefined) merged.context = override.context;
  if (override.dockerfile !== undefined) merged.dockerfile = override.dockerfile;

  if (override.sources !== undefined) {
    merged.sources = mergeSources(base.sources ?? {}, override.sources);
  }
  if (override.external_images !== undefined) {
    merged.external_images = mergeRecords(
      base.external_images ?? {},
      override.external_images,
      mergeObjects,
    );
  }
  if (override.dependencies !== undefined) {
    merged.dependencies = mergeRecords(base.dependencies ?? {}, override.dependencies, mergeObjects);
  }
  if (override.build_args !== undefined) {
    merged.build_args = mergeRecords(base.build_args ?? {}, override.build_args, replaceValue);
  }
  if (override.labels !== undefined) {
    merged.labels = mergeRecords(base.labels ?? {}, override.labels, replaceValue);
  }
  if (override.tls !== undefined) {
    merged.tls = mergeObjects(base.tls ?? {}, override.tls);
  }

  return merged;
}

export function mergeSources(
  base: Record<string, SourceFragment>,
  override: Record<string, SourceFragment>,
): Record<string, SourceFragment> {
  const merged: Record<string, SourceFragment> = {};
  for (const [key, entry] of Object.entries(base)) {
    merged[key] = { ...entry };
  }

  for (const [key, entry] of Object.entries(override)) {
    merged[key] = mergeSourceEntry(base[key], entry);
  }

  return merged;
}

/**
 * Git sources (url + ref) and local sources (path) are mutually exclusive.
 * A git override naming only one of url/ref inherits the other from a git base entry;
 * anything else replaces the entry wholesale.
 */
export function mergeSourceEntry(
  base: SourceFragment | undefined,
  override: SourceFragment,
): SourceFragment {
  const overrideIsGit = override.url !== undefined || override.ref !== undefined;
  const overrideIsLocal = override.path !== undefined;
  const baseIsGit = base !== undefined && (base.url !== undefined || base.ref !== undefined);
  const partial = (override.url === undefined) !== (override.ref === undefined);

  if (overrideIsGit && !overrideIsLocal && partial && baseIsGit && base.path === undefined) {
    return {
      url: override.url ?? base.url,
      ref: override.ref ?? base.ref,
    };
  }

  return { ...override };
}

/**
 * Keyed records merge key by key: keys missing from the override survive, keys present in
 * both are combined with `mergeValue`.
 */
export function mergeRecords<V>(
  base: Record<string, V>,
  override: Record<string, V>,
  mergeValue: (base: V, override: V) => V,
): Record<string, V> {
  const merged: Record<string, V> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    merged[key] = key in base ? mergeValue(base[key], value) : value;
  }

  return merged;
}

export function mergeObjects<V extends object>(base: V, override: V): V {
  return { ...base, ...override };
}

function replaceValue<V>(_base: V, override: V): V {
  return override;
}
