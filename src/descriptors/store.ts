/**
 * Descriptor store.
 * Purpose: load service descriptors, version manifests, and platform manifests from disk.
 * Assumptions: documents are YAML; every call re-reads the file so callers never share state.
 * Usage: const store = new FileDescriptorStore(repoRoot, "services"); await store.loadServiceDescriptor("web").
 */

import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import type { ZodType, ZodTypeDef } from "zod";

import { DescriptorNotFoundError, DescriptorParseError } from "../core/errors.js";

import {
  formatSchemaIssues,
  PlatformManifestSchema,
  ServiceDescriptorSchema,
  VersionManifestSchema,
  type PlatformManifest,
  type ServiceDescriptor,
  type VersionManifest,
} from "./schema.js";

// =============================================================================
// TYPES
// =============================================================================

export interface DescriptorStore {
  listServiceNames(): Promise<string[]>;
  loadServiceDescriptor(service: string): Promise<ServiceDescriptor>;
  loadVersionManifest(service: string): Promise<VersionManifest | null>;
  loadPlatformManifest(service: string): Promise<PlatformManifest | null>;
  /** Read a file relative to the repository root (dockerfiles). */
  readFile(relativePath: string): Promise<string>;
}

const DESCRIPTOR_EXTENSION = ".yaml";
const VERSION_MANIFEST_FILE = "versions.yaml";
const PLATFORM_MANIFEST_FILE = "platforms.yaml";

// =============================================================================
// FILE-BACKED STORE
// =============================================================================

export class FileDescriptorStore implements DescriptorStore {
  readonly repoRoot: string;
  readonly servicesDir: string;

  constructor(repoRoot: string, servicesDir: string) {
    this.repoRoot = path.resolve(repoRoot);
    this.servicesDir = path.resolve(this.repoRoot, servicesDir);
  }

  async listServiceNames(): Promise<string[]> {
    if (!(await fse.pathExists(this.servicesDir))) {
      throw new DescriptorNotFoundError(
        `Services directory not found: ${this.servicesDir}`,
        this.servicesDir,
      );
    }

    const entries = await fse.readdir(this.servicesDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(DESCRIPTOR_EXTENSION))
      .map((entry) => entry.name.slice(0, -DESCRIPTOR_EXTENSION.length))
      .sort();
  }

  async loadServiceDescriptor(service: string): Promise<ServiceDescriptor> {
    const filePath = this.descriptorPath(service);
    const parsed = await readDocument(filePath, ServiceDescriptorSchema, "service descriptor");
    if (parsed === null) {
      throw new DescriptorNotFoundError(`Service "${service}" not found.`, filePath);
    }
    return parsed;
  }

  async loadVersionManifest(service: string): Promise<VersionManifest | null> {
    const filePath = path.join(this.servicesDir, service, VERSION_MANIFEST_FILE);
    return readDocument(filePath, VersionManifestSchema, "version manifest");
  }

  async loadPlatformManifest(service: string): Promise<PlatformManifest | null> {
    const filePath = path.join(this.servicesDir, service, PLATFORM_MANIFEST_FILE);
    return readDocument(filePath, PlatformManifestSchema, "platform manifest");
  }

  async readFile(relativePath: string): Promise<string> {
    const filePath = path.resolve(this.repoRoot, relativePath);
    if (!(await fse.pathExists(filePath))) {
      throw new DescriptorNotFoundError(`File not found: ${relativePath}`, filePath);
    }
    return fse.readFile(filePath, "utf8");
  }

  descriptorPath(service: string): string {
    return path.join(this.servicesDir, `${service}${DESCRIPTOR_EXTENSION}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readDocument<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string,
): Promise<T | null> {
  if (!(await fse.pathExists(filePath))) {
    return null;
  }

  const raw = await fse.readFile(filePath, "utf8");

  let data: unknown;
  try {
    data = yaml.load(raw, { filename: filePath });
  } catch (err) {
    throw new DescriptorParseError(`Invalid YAML in ${label} ${filePath}`, filePath, [], err);
  }

  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    throw new DescriptorParseError(
      `Invalid ${label} ${filePath}`,
      filePath,
      formatSchemaIssues(result.error.issues),
      result.error,
    );
  }

  return result.data;
}
