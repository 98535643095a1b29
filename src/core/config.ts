import { z } from "zod";

export const DEP_CACHE_MODES = ["off", "soft", "strict"] as const;
export const PROGRESS_MODES = ["auto", "plain", "tty", "quiet"] as const;

export const DepCacheModeSchema = z.enum(DEP_CACHE_MODES);
export const ProgressModeSchema = z.enum(PROGRESS_MODES);

export type DepCacheMode = z.infer<typeof DepCacheModeSchema>;
export type ProgressMode = z.infer<typeof ProgressModeSchema>;

export const BuildSettingsSchema = z
  .object({
    dep_cache: DepCacheModeSchema.default("soft"),
    progress: ProgressModeSchema.default("auto"),
    provenance: z.boolean().default(false),
    target_platforms: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    services_dir: z.string().min(1).default("services"),
    label_namespace: z
      .string()
      .regex(/^[a-z0-9]+(?:[.-][a-z0-9]+)*$/, "must be a reverse-DNS style label prefix")
      .default("io.foundry"),
    registries: z.array(z.string().min(1)).default([]),
    logs_dir: z.string().min(1).default(".foundry/logs"),
    build: BuildSettingsSchema.default({}),
  })
  .strict();

export type BuildSettings = z.infer<typeof BuildSettingsSchema>;

/** Project config with every default applied; `repo_root` is filled in by the loader. */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema> & {
  repo_root: string;
  ci: boolean;
};

export function serviceHashLabel(config: Pick<ProjectConfig, "label_namespace">): string {
  return `${config.label_namespace}.service-def-hash`;
}
