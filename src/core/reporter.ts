import { createAnsiFormatter, resolveColorEnabled, type AnsiStyle } from "./error-format.js";

/** Human-readable progress output, separate from the JSONL event log. */
export type Reporter = {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type ReporterLevel = keyof Reporter;

const LEVEL_STYLES: Record<ReporterLevel, AnsiStyle[]> = {
  info: ["cyan"],
  success: ["green"],
  warn: ["yellow"],
  error: ["red"],
};

export function createConsoleReporter(opts: { useColor?: boolean } = {}): Reporter {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stdout, useColor: opts.useColor }),
  );
  const write =
    (level: ReporterLevel) =>
    (message: string): void => {
      const line = format(message, LEVEL_STYLES[level]);
      if (level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    };

  return {
    info: write("info"),
    success: write("success"),
    warn: write("warn"),
    error: write("error"),
  };
}

export type RecordedLine = { level: ReporterLevel; message: string };

export function createRecordingReporter(): Reporter & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  const record =
    (level: ReporterLevel) =>
    (message: string): void => {
      lines.push({ level, message });
    };

  return {
    lines,
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
  };
}
