import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { GitError, toUserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { lsRemoteRevision, pickRevision } from "./remote.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

const SHA_A = "a".repeat(40);
const SHA_B = "b".repeat(40);

// =============================================================================
// TESTS
// =============================================================================

describe("pickRevision", () => {
  it("prefers the peeled commit of an annotated tag", () => {
    const stdout = [`${SHA_A}\trefs/tags/v1.0.0`, `${SHA_B}\trefs/tags/v1.0.0^{}`].join("\n");

    expect(pickRevision(stdout, "v1.0.0")).toBe(SHA_B);
  });

  it("matches branch refs by name", () => {
    const stdout = [`${SHA_A}\trefs/heads/main`, `${SHA_B}\trefs/heads/main-old`].join("\n");

    expect(pickRevision(stdout, "main")).toBe(SHA_A);
  });

  it("returns null for empty output", () => {
    expect(pickRevision("", "main")).toBeNull();
  });
});

describe("lsRemoteRevision", () => {
  it("returns full SHAs without calling git", async () => {
    await expect(lsRemoteRevision("https://git.example/web.git", SHA_A)).resolves.toBe(SHA_A);
    expect(execaMock).not.toHaveBeenCalled();
  });

  it("looks up HEAD when no ref is given", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: `${SHA_A}\tHEAD\n`,
      stderr: "",
      exitCode: 0,
    } as Awaited<ReturnType<typeof execa>>);

    await expect(lsRemoteRevision("https://git.example/web.git", null)).resolves.toBe(SHA_A);
    expect(execaMock).toHaveBeenCalledWith(
      "git",
      ["ls-remote", "https://git.example/web.git", "HEAD"],
      { stdio: "pipe", reject: false },
    );
  });

  it("maps ls-remote failures to a user-facing git error", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "fatal: repository not found",
      exitCode: 128,
    } as Awaited<ReturnType<typeof execa>>);

    const error = await lsRemoteRevision("https://git.example/missing.git", "main").catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(GitError);
    expect((error as GitError).message).toBe(
      "git ls-remote https://git.example/missing.git main failed: fatal: repository not found",
    );
    expect(toUserFacingError(error)?.code).toBe(USER_FACING_ERROR_CODES.git);
  });

  it("fails when the ref does not exist on the remote", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "",
      exitCode: 0,
    } as Awaited<ReturnType<typeof execa>>);

    await expect(lsRemoteRevision("https://git.example/web.git", "v9")).rejects.toThrow(
      'Ref "v9" not found on remote https://git.example/web.git.',
    );
  });
});
