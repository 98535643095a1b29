/**
 * Build node identity.
 * Purpose: value-key helpers for (service, version, platform?) tuples.
 * Assumptions: an empty platform string means single-platform.
 * Usage: createNode("web", "v1", "debian"); nodeKey(node) === "web:v1:debian".
 */

// =============================================================================
// TYPES
// =============================================================================

export type BuildNode = {
  readonly service: string;
  readonly version: string;
  readonly platform?: string;
};

export type BuildEdge = {
  readonly from: BuildNode;
  readonly to: BuildNode;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createNode(service: string, version: string, platform?: string | null): BuildNode {
  const normalizedPlatform = platform?.trim() ?? "";
  if (normalizedPlatform.length === 0) {
    return Object.freeze({ service, version });
  }
  return Object.freeze({ service, version, platform: normalizedPlatform });
}

export function nodeKey(node: BuildNode): string {
  return node.platform
    ? `${node.service}:${node.version}:${node.platform}`
    : `${node.service}:${node.version}`;
}

export function edgeKey(edge: BuildEdge): string {
  return `${nodeKey(edge.from)} -> ${nodeKey(edge.to)}`;
}

export function parseNodeKey(key: string): BuildNode {
  const parts = key.split(":");
  if (parts.length < 2 || parts.length > 3 || parts.some((part) => part.length === 0)) {
    throw new Error(`Invalid node key "${key}". Expected service:version[:platform].`);
  }
  const [service, version, platform] = parts;
  return createNode(service, version, platform);
}

// Image tag for a node: the version, suffixed with the platform for multi-platform services.
export function nodeImageTag(node: BuildNode): string {
  return node.platform ? `${node.version}-${node.platform}` : node.version;
}
