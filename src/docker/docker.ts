import Docker from "dockerode";
import { execa } from "execa";

import { DockerError } from "../core/errors.js";

import type { ImageBuilder, ImageBuildRequest, ImageBuildResult } from "./image-builder.js";

/** The slice of `docker image inspect` output the builder reads. */
export type InspectedImage = {
  Config?: { Labels?: Record<string, string> | null };
};

/** The slice of the dockerode client used for local image inspection. */
export type ImageInspector = {
  getImage(ref: string): { inspect(): Promise<InspectedImage> };
};

export function dockerClient(): Docker {
  return new Docker();
}

// =============================================================================
// BUILDX COMMAND
// =============================================================================

export function buildxArgs(request: ImageBuildRequest): string[] {
  const args = ["buildx", "build", "--file", request.dockerfile];

  for (const tag of request.tags) {
    args.push("--tag", tag);
  }
  for (const key of Object.keys(request.buildArgs).sort()) {
    args.push("--build-arg", `${key}=${request.buildArgs[key]}`);
  }
  for (const key of Object.keys(request.labels).sort()) {
    args.push("--label", `${key}=${request.labels[key]}`);
  }
  if (request.targetPlatforms.length > 0) {
    args.push("--platform", request.targetPlatforms.join(","));
  }
  if (request.progress !== "auto") {
    args.push("--progress", request.progress);
  }
  args.push(`--provenance=${request.provenance ? "true" : "false"}`);
  args.push(request.push ? "--push" : "--load");
  args.push(request.context);

  return args;
}

// =============================================================================
// IMAGE BUILDER
// =============================================================================

export class DockerImageBuilder implements ImageBuilder {
  constructor(private readonly docker: ImageInspector = dockerClient()) {}

  async build(request: ImageBuildRequest): Promise<ImageBuildResult> {
    const quiet = request.progress === "quiet";
    try {
      const result = await execa("docker", buildxArgs(request), {
        stdio: quiet ? "pipe" : "inherit",
        reject: false,
      });
      return { exitCode: result.exitCode ?? 1 };
    } catch (err) {
      throw new DockerError(
        `Failed to run docker buildx for ${request.tags[0] ?? request.context}: ${errorMessage(err)}`,
        err,
      );
    }
  }

  async imageExistsLocally(ref: string): Promise<boolean> {
    const info = await this.inspect(ref);
    return info !== null;
  }

  async readLabel(ref: string, key: string): Promise<string | null> {
    const info = await this.inspect(ref);
    if (!info) return null;
    return info.Config?.Labels?.[key] ?? null;
  }

  async inspectRemoteManifest(ref: string): Promise<boolean> {
    try {
      const result = await execa("docker", ["buildx", "imagetools", "inspect", ref], {
        stdio: "pipe",
        reject: false,
      });
      return result.exitCode === 0;
    } catch (err) {
      throw new DockerError(`Failed to inspect remote manifest ${ref}: ${errorMessage(err)}`, err);
    }
  }

  private async inspect(ref: string): Promise<InspectedImage | null> {
    try {
      return await this.docker.getImage(ref).inspect();
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new DockerError(`Failed to inspect image ${ref}: ${errorMessage(err)}`, err);
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "statusCode" in err && err.statusCode === 404;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
