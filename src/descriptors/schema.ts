import { z, type ZodIssue } from "zod";

// =============================================================================
// SHARED FRAGMENTS
// =============================================================================

export const PLATFORM_NAME_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

// Sources stay loose here so layers can carry partial entries; the resolver
// enforces the git/local split after merging.
export const SourceFragmentSchema = z
  .object({
    url: z.string().min(1).optional(),
    ref: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
  })
  .strict();

export const ExternalImageFragmentSchema = z
  .object({
    image: z.string().min(1).optional(),
    tag: z.string().min(1).optional(),
    build_arg: z.string().min(1).optional(),
  })
  .strict();

export const DependencyFragmentSchema = z
  .object({
    service: z.string().min(1).optional(),
    build_arg: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    single_platform: z.boolean().optional(),
  })
  .strict();

export const TlsFragmentSchema = z
  .object({
    enabled: z.boolean().optional(),
    cert_name: z.string().min(1).optional(),
    ca_name: z.string().min(1).optional(),
  })
  .strict();

const StringRecordSchema = z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String));

const fragmentShape = {
  name: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  dockerfile: z.string().min(1).optional(),
  sources: z.record(SourceFragmentSchema).optional(),
  external_images: z.record(ExternalImageFragmentSchema).optional(),
  dependencies: z.record(DependencyFragmentSchema).optional(),
  build_args: StringRecordSchema.optional(),
  labels: StringRecordSchema.optional(),
  tls: TlsFragmentSchema.optional(),
};

export const ConfigFragmentSchema = z.object(fragmentShape).strict();

export type ConfigFragment = z.infer<typeof ConfigFragmentSchema>;
export type SourceFragment = z.infer<typeof SourceFragmentSchema>;
export type ExternalImageFragment = z.infer<typeof ExternalImageFragmentSchema>;
export type DependencyFragment = z.infer<typeof DependencyFragmentSchema>;
export type TlsFragment = z.infer<typeof TlsFragmentSchema>;

// =============================================================================
// DOCUMENTS
// =============================================================================

export const ServiceDescriptorSchema = ConfigFragmentSchema;

export type ServiceDescriptor = ConfigFragment;

export const VersionOverridesSchema = z
  .object({
    ...fragmentShape,
    platforms: z.record(ConfigFragmentSchema).optional(),
  })
  .strict();

export type VersionOverrides = z.infer<typeof VersionOverridesSchema>;

export const VersionEntrySchema = z
  .object({
    name: z.string().min(1),
    latest: z.boolean().default(false),
    tags: z.array(z.string().min(1)).default([]),
    overrides: VersionOverridesSchema.default({}),
  })
  .strict();

export type VersionEntry = z.infer<typeof VersionEntrySchema>;

export const VersionManifestSchema = z
  .object({
    default: z.string().min(1).optional(),
    versions: z.array(VersionEntrySchema).min(1),
  })
  .strict();

export type VersionManifest = z.infer<typeof VersionManifestSchema>;

export const PlatformEntrySchema = z
  .object({
    ...fragmentShape,
    name: z.string().regex(PLATFORM_NAME_PATTERN, "must match ^[a-z0-9]+(-[a-z0-9]+)*$"),
  })
  .strict();

export type PlatformEntry = z.infer<typeof PlatformEntrySchema>;

export const PlatformManifestSchema = z
  .object({
    default: z.string().min(1),
    platforms: z.array(PlatformEntrySchema).min(1),
  })
  .strict();

export type PlatformManifest = z.infer<typeof PlatformManifestSchema>;

// =============================================================================
// ISSUE FORMATTING
// =============================================================================

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function platformEntryFragment(entry: PlatformEntry): ConfigFragment {
  const { name: _name, ...fragment } = entry;
  return fragment;
}

export function versionGlobalOverrides(entry: VersionEntry): ConfigFragment {
  const { platforms: _platforms, ...fragment } = entry.overrides;
  return fragment;
}
