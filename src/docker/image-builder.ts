import type { ProgressMode } from "../core/config.js";

export type ImageBuildRequest = {
  /** Absolute path of the build context. */
  context: string;
  /** Absolute path of the Dockerfile. */
  dockerfile: string;
  tags: string[];
  buildArgs: Record<string, string>;
  labels: Record<string, string>;
  /** docker --platform values; empty builds for the daemon's platform. */
  targetPlatforms: string[];
  push: boolean;
  progress: ProgressMode;
  provenance: boolean;
};

export type ImageBuildResult = {
  exitCode: number;
};

export interface ImageBuilder {
  build(request: ImageBuildRequest): Promise<ImageBuildResult>;
  imageExistsLocally(ref: string): Promise<boolean>;
  readLabel(ref: string, key: string): Promise<string | null>;
  inspectRemoteManifest(ref: string): Promise<boolean>;
}
