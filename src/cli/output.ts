import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "../core/error-format.js";

export type CliWriter = (line: string) => void;

const writeStderr: CliWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export function reportCliError(
  error: unknown,
  opts: { debug?: boolean; color?: boolean; write?: CliWriter } = {},
): void {
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });
  const style = createAnsiFormatter(opts.color ?? resolveColorEnabled());
  for (const line of renderErrorLines(lines, style)) {
    (opts.write ?? writeStderr)(line);
  }
  process.exitCode = 1;
}
