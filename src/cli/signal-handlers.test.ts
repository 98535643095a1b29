import { afterEach, describe, expect, it, vi } from "vitest";

import { createBuildStopSignalHandler, type BuildStopSignalHandler } from "./signal-handlers.js";

let handler: BuildStopSignalHandler | null = null;

afterEach(() => {
  handler?.cleanup();
  handler = null;
});

describe("createBuildStopSignalHandler", () => {
  it("requests a graceful stop on the first signal", () => {
    const onSignal = vi.fn();
    const exit = vi.fn();
    handler = createBuildStopSignalHandler({ onSignal, exit });

    process.emit("SIGINT", "SIGINT");

    expect(handler.isStopped()).toBe(true);
    expect(onSignal).toHaveBeenCalledWith("SIGINT");
    expect(exit).not.toHaveBeenCalled();
  });

  it("exits with 130 on the second signal", () => {
    const exit = vi.fn();
    handler = createBuildStopSignalHandler({ exit });

    process.emit("SIGTERM", "SIGTERM");
    process.emit("SIGINT", "SIGINT");

    expect(exit).toHaveBeenCalledWith(130);
  });

  it("removes its listeners on cleanup", () => {
    const before = process.listenerCount("SIGINT");
    handler = createBuildStopSignalHandler({ exit: vi.fn() });

    expect(process.listenerCount("SIGINT")).toBe(before + 1);
    handler.cleanup();
    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
