export type BuildStopSignalHandler = {
  cleanup: () => void;
  isStopped: () => boolean;
};

/**
 * First SIGINT/SIGTERM requests a graceful stop (honoured between nodes); a second one
 * exits immediately with 130.
 */
export function createBuildStopSignalHandler(
  opts: {
    onSignal?: (signal: NodeJS.Signals) => void;
    exit?: (code: number) => void;
  } = {},
): BuildStopSignalHandler {
  const controller = new AbortController();
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      cleanup();
      exit(130);
      return;
    }
    opts.onSignal?.(signal);
    controller.abort(signal);
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
