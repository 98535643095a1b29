import { describe, expect, it } from "vitest";

import { CLI_VERSION, createProgram } from "./index.js";

describe("createProgram", () => {
  it("registers the build, list-services, and hash commands", () => {
    const program = createProgram();

    expect(program.name()).toBe("foundry");
    expect(program.version()).toBe(CLI_VERSION);
    expect(program.commands.map((command) => command.name())).toEqual([
      "build",
      "list-services",
      "hash",
    ]);
  });

  it("rejects an unknown dependency cache mode", async () => {
    const program = createProgram().exitOverride();
    const build = program.commands.find((command) => command.name() === "build");
    build?.exitOverride().configureOutput({ writeErr: () => undefined });

    await expect(
      program.parseAsync(["build", "--dep-cache", "sometimes"], { from: "user" }),
    ).rejects.toThrow("Expected one of: off, soft, strict.");
  });
});
