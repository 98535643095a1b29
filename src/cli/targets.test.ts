import { describe, expect, it } from "vitest";

import { dockerfiles, MemoryDescriptorStore, service } from "../__tests__/fakes.js";
import { UserFacingError } from "../core/errors.js";

import { matchServices, selectTargets, type TargetSelection } from "./targets.js";

// =============================================================================
// FIXTURES
// =============================================================================

function store(): MemoryDescriptorStore {
  return new MemoryDescriptorStore(
    {
      web: {
        descriptor: service("web"),
        platforms: { default: "debian", platforms: [{ name: "debian" }, { name: "alpine" }] },
        versions: {
          default: "v1",
          versions: [{ name: "v1", tags: ["stable"] }, { name: "v2", latest: true }],
        },
      },
      api: { descriptor: service("api", { version: "v1" }) },
      worker: { descriptor: service("worker"), versions: { versions: [{ name: "v2" }] } },
    },
    dockerfiles("web", "api", "worker"),
  );
}

function selection(overrides: Partial<TargetSelection> = {}): TargetSelection {
  return { serviceGlobs: [], versions: [], allVersions: false, ...overrides };
}

// =============================================================================
// TESTS
// =============================================================================

describe("selectTargets", () => {
  it("expands a multi-platform service into one target per platform", async () => {
    const targets = await selectTargets(store(), selection({ serviceGlobs: ["web"] }));

    expect(targets).toEqual([
      { service: "web", version: undefined, platform: "debian" },
      { service: "web", version: undefined, platform: "alpine" },
    ]);
  });

  it("narrows to the requested platform", async () => {
    const targets = await selectTargets(
      store(),
      selection({ serviceGlobs: ["web"], platform: "alpine" }),
    );

    expect(targets).toEqual([{ service: "web", version: undefined, platform: "alpine" }]);
  });

  it("pins the platform named by a suffixed version", async () => {
    const targets = await selectTargets(
      store(),
      selection({ serviceGlobs: ["web"], versions: ["v1-alpine"] }),
    );

    expect(targets).toEqual([{ service: "web", version: "v1-alpine", platform: "alpine" }]);
  });

  it("builds every manifest version with --all-versions", async () => {
    const targets = await selectTargets(
      store(),
      selection({ serviceGlobs: ["web"], allVersions: true }),
    );

    expect(targets.map((t) => `${t.version}/${t.platform}`)).toEqual([
      "v1/debian",
      "v1/alpine",
      "v2/debian",
      "v2/alpine",
    ]);
  });

  it("skips services without the requested version when several match", async () => {
    const targets = await selectTargets(store(), selection({ serviceGlobs: ["*"], versions: ["v2"] }));

    expect(targets).toEqual([
      { service: "web", version: "v2", platform: "debian" },
      { service: "web", version: "v2", platform: "alpine" },
      { service: "worker", version: "v2", platform: undefined },
    ]);
  });

  it("rejects a suffixed version whose platform differs from the requested one", async () => {
    const error = await selectTargets(
      store(),
      selection({ serviceGlobs: ["web"], versions: ["v1-alpine"], platform: "debian" }),
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).title).toBe("Conflicting platform selection.");
    expect((error as UserFacingError).message).toBe(
      'Version "v1-alpine" pins platform "alpine", but --platform requests "debian".',
    );
  });

  it("accepts a suffixed version that agrees with the requested platform", async () => {
    const targets = await selectTargets(
      store(),
      selection({ serviceGlobs: ["web"], versions: ["v1-alpine"], platform: "alpine" }),
    );

    expect(targets).toEqual([{ service: "web", version: "v1-alpine", platform: "alpine" }]);
  });

  it("fails when the filters leave nothing to build", async () => {
    const error = await selectTargets(
      store(),
      selection({ serviceGlobs: ["api", "worker"], platform: "alpine" }),
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).title).toBe("Nothing to build.");
  });
});

describe("matchServices", () => {
  it("matches glob patterns and keeps the listing order", () => {
    expect(matchServices(["api", "web", "worker"], ["w*"])).toEqual(["web", "worker"]);
    expect(matchServices(["api", "web"], [])).toEqual(["api", "web"]);
  });

  it("rejects patterns that match nothing", () => {
    expect(() => matchServices(["api", "web"], ["db*"])).toThrow(
      'No service matches "db*". Available: api, web',
    );
  });
});
