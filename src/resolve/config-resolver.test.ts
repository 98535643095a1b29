import { describe, expect, it } from "vitest";

import { dockerfiles, MemoryDescriptorStore, service } from "../__tests__/fakes.js";
import { ConfigValidationError } from "../core/errors.js";

import { resolveEffectiveConfig } from "./config-resolver.js";

// =============================================================================
// FIXTURES
// =============================================================================

function appStore(): MemoryDescriptorStore {
  return new MemoryDescriptorStore(
    {
      app: {
        descriptor: service("app", {
          sources: { app: { url: "https://git.example/app.git", ref: "main" } },
          build_args: { LOG_LEVEL: "info", MODE: "base" },
          labels: { team: "core" },
        }),
        platforms: {
          default: "debian",
          platforms: [
            { name: "debian", build_args: { MODE: "platform", DISTRO: "debian" } },
            { name: "alpine", dockerfile: "app/Dockerfile.alpine", build_args: { DISTRO: "alpine" } },
          ],
        },
        versions: {
          default: "v2.0.0",
          versions: [
            {
              name: "v1.0.0",
              tags: ["stable"],
              overrides: {
                sources: { app: { ref: "v1.0.0" } },
                build_args: { MODE: "version" },
                platforms: { debian: { build_args: { MODE: "version-debian" } } },
              },
            },
            { name: "v2.0.0", latest: true, overrides: { sources: { app: { ref: "v2.0.0" } } } },
          ],
        },
      },
      legacy: { descriptor: service("legacy", { version: "1.4", build_args: { PORT: 8080 } }) },
    },
    dockerfiles("app", "legacy"),
  );
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveEffectiveConfig", () => {
  it("applies base, platform, version, and version-platform layers in order", async () => {
    const config = await resolveEffectiveConfig(appStore(), "app", "v1.0.0", "debian");

    expect(config.node).toEqual({ service: "app", version: "v1.0.0", platform: "debian" });
    expect(config.buildArgs).toEqual({
      LOG_LEVEL: "info",
      MODE: "version-debian",
      DISTRO: "debian",
    });
    expect(config.sources).toEqual({
      app: { kind: "git", url: "https://git.example/app.git", ref: "v1.0.0" },
    });
    expect(config.labels).toEqual({ team: "core" });
    expect(config.extraTags).toEqual(["stable"]);
    expect(config.latest).toBe(false);
  });

  it("lets the global version override win over the platform fragment", async () => {
    const config = await resolveEffectiveConfig(appStore(), "app", "v1.0.0", "alpine");

    expect(config.buildArgs.MODE).toBe("version");
    expect(config.buildArgs.DISTRO).toBe("alpine");
    expect(config.dockerfile).toBe("app/Dockerfile.alpine");
  });

  it("resolves extra tags, latest, and platform-suffixed specs", async () => {
    const store = appStore();

    expect((await resolveEffectiveConfig(store, "app", "stable", "alpine")).version).toBe("v1.0.0");
    expect((await resolveEffectiveConfig(store, "app", "latest", "alpine")).version).toBe("v2.0.0");

    const suffixed = await resolveEffectiveConfig(store, "app", "v1.0.0-alpine");
    expect(suffixed.node).toEqual({ service: "app", version: "v1.0.0", platform: "alpine" });
  });

  it("falls back to the manifest default version and the default platform", async () => {
    const config = await resolveEffectiveConfig(appStore(), "app");

    expect(config.node).toEqual({ service: "app", version: "v2.0.0", platform: "debian" });
    expect(config.platforms).toEqual(["debian", "alpine"]);
    expect(config.defaultPlatform).toBe("debian");
    expect(config.latest).toBe(true);
  });

  it("uses the descriptor version for services without a manifest", async () => {
    const config = await resolveEffectiveConfig(appStore(), "legacy");

    expect(config.node).toEqual({ service: "legacy", version: "1.4" });
    expect(config.buildArgs).toEqual({ PORT: "8080" });
    expect(config.platform).toBeNull();
  });

  it("rejects unknown versions and platforms", async () => {
    const store = appStore();

    await expect(resolveEffectiveConfig(store, "app", "v9")).rejects.toThrow(
      'Version "v9" not found for service "app". Available: v1.0.0, v2.0.0',
    );
    await expect(resolveEffectiveConfig(store, "app", "v1.0.0", "arch")).rejects.toThrow(
      'Platform "arch" not found for service "app". Available: debian, alpine',
    );
    await expect(resolveEffectiveConfig(store, "legacy", "1.4", "debian")).rejects.toThrow(
      ConfigValidationError,
    );
  });

  it("rejects a base version next to a platform manifest", async () => {
    const store = new MemoryDescriptorStore(
      {
        svc: {
          descriptor: service("svc", { version: "v1" }),
          platforms: { default: "debian", platforms: [{ name: "debian" }] },
        },
      },
      dockerfiles("svc"),
    );

    await expect(resolveEffectiveConfig(store, "svc")).rejects.toThrow(
      "version: not allowed in the base descriptor of a multi-platform service",
    );
  });

  it("rejects a source that mixes path with git fields after merging", async () => {
    const store = new MemoryDescriptorStore(
      {
        svc: {
          descriptor: service("svc", {
            version: "v1",
            sources: { code: { url: "https://git.example/c.git", path: "./c" } },
          }),
        },
      },
      dockerfiles("svc"),
    );

    await expect(resolveEffectiveConfig(store, "svc")).rejects.toThrow(
      'Source "code" of service "svc" mixes path with url/ref',
    );
  });

  it("requires build_arg on every dependency", async () => {
    const store = new MemoryDescriptorStore(
      {
        svc: { descriptor: service("svc", { version: "v1", dependencies: { lib: { version: "v1" } } }) },
      },
      dockerfiles("svc"),
    );

    await expect(resolveEffectiveConfig(store, "svc")).rejects.toThrow(
      'Dependency "lib" of service "svc" is missing required field "build_arg".',
    );
  });

  it("requires a dockerfile after merging", async () => {
    const store = new MemoryDescriptorStore({
      svc: { descriptor: { name: "svc", version: "v1", context: "svc" } },
    });

    await expect(resolveEffectiveConfig(store, "svc")).rejects.toThrow(
      'Service "svc" (version v1) is missing required field "dockerfile".',
    );
  });

  it("returns fresh values on every resolution", async () => {
    const store = appStore();
    const first = await resolveEffectiveConfig(store, "app", "v1.0.0", "debian");
    first.buildArgs.MODE = "mutated";

    const second = await resolveEffectiveConfig(store, "app", "v1.0.0", "debian");
    expect(second.buildArgs.MODE).toBe("version-debian");
  });
});
