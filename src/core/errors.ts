/*
Purpose: error taxonomy for planning, resolution, and build execution, plus CLI-safe wrappers.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigValidationError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

import { nodeKey, type BuildNode } from "../graph/node.js";

// =============================================================================
// CORE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DescriptorNotFoundError extends OrchestratorError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DescriptorNotFoundError";
  }
}

export class DescriptorParseError extends OrchestratorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: string[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DescriptorParseError";
  }
}

export class ConfigValidationError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigValidationError";
  }
}

export class DependencyResolutionError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DependencyResolutionError";
  }
}

export class CycleError extends OrchestratorError {
  constructor(public readonly cycles: BuildNode[][]) {
    super(formatCycles(cycles));
    this.name = "CycleError";
  }
}

export class HashComputationError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "HashComputationError";
  }
}

export class ExternalBuildError extends OrchestratorError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ExternalBuildError";
  }
}

export class StaleDependencyError extends OrchestratorError {
  constructor(
    message: string,
    public readonly nodeKey: string,
    public readonly expectedHash: string,
    public readonly actualHash: string | null,
  ) {
    super(message);
    this.name = "StaleDependencyError";
  }
}

export class DockerError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

function formatCycles(cycles: BuildNode[][]): string {
  const count = cycles.length;
  const lines = cycles.map((cycle) => `  - ${cycle.map(nodeKey).join(" -> ")}`);
  return [`Dependency graph contains ${count} cycle${count === 1 ? "" : "s"}:`, ...lines].join(
    "\n",
  );
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  descriptor: "DESCRIPTOR_ERROR",
  resolution: "RESOLUTION_ERROR",
  cycle: "CYCLE_ERROR",
  stale: "STALE_DEPENDENCY",
  docker: "DOCKER_ERROR",
  git: "GIT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigValidationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Service configuration is invalid.",
      message: error.message,
      hint: "Fix the descriptor layer named above and rerun the build.",
      cause: error,
    });
  }

  if (error instanceof DescriptorNotFoundError || error instanceof DescriptorParseError) {
    const details =
      error instanceof DescriptorParseError && error.issues.length > 0
        ? `${error.message}\n${error.issues.map((issue) => `  - ${issue}`).join("\n")}`
        : error.message;
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.descriptor,
      title: "Service descriptor could not be loaded.",
      message: details,
      hint: `Check ${error.filePath}.`,
      next: "Run `foundry list-services` to see the services that were found.",
      cause: error,
    });
  }

  if (error instanceof DependencyResolutionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.resolution,
      title: "Dependency could not be resolved.",
      message: error.message,
      hint: "Pin an explicit version on the dependency declaration or build a versioned parent.",
      cause: error,
    });
  }

  if (error instanceof CycleError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.cycle,
      title: "Dependency cycle detected.",
      message: error.message,
      hint: "Remove one dependency declaration from each listed cycle.",
      cause: error,
    });
  }

  if (error instanceof StaleDependencyError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.stale,
      title: "Dependency image is stale.",
      message: error.message,
      hint: "Rebuild the dependency first, or rerun with --dep-cache soft to rebuild it automatically.",
      cause: error,
    });
  }

  if (error instanceof DockerError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.docker,
      title: "Docker operation failed.",
      message: error.message,
      hint: "Check that the Docker daemon is running and buildx is installed.",
      cause: error,
    });
  }

  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git operation failed.",
      message: error.message,
      hint: "Check the source url and ref, and your network access to the remote.",
      cause: error,
    });
  }

  return null;
}
