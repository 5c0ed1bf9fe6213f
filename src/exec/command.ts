import { execa } from "execa";

import { CommandLaunchError } from "../core/errors.js";
import { appendTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandSpec = {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Captured stdout is appended here when set. */
  stdoutPath?: string;
  /** Captured stderr is appended here when set. */
  stderrPath?: string;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs an external command to completion. A non-zero exit is a result, not an error;
 * only a command that cannot be started at all throws `CommandLaunchError`.
 */
export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

// =============================================================================
// EXECA RUNNER
// =============================================================================

// No timeout: long jobs are bounded by the scheduler's wall-time limit, never here.
export const execaCommandRunner: CommandRunner = async (spec) => {
  let result: CommandResult;
  try {
    const res = await execa(spec.command, spec.args, {
      cwd: spec.cwd,
      env: spec.env ? { ...process.env, ...spec.env } : process.env,
      stdio: "pipe",
    });
    result = { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr };
  } catch (err) {
    const exitCode = readNumberField(err, "exitCode");
    if (exitCode === undefined) {
      throw new CommandLaunchError(
        `Failed to start ${formatCommandLine(spec)} (cwd=${spec.cwd}): ${readStringField(err, "message")}`,
        spec.command,
        err,
      );
    }
    result = {
      exitCode,
      stdout: readStringField(err, "stdout"),
      stderr: readStringField(err, "stderr"),
    };
  }

  await persistOutput(spec, result);
  return result;
};

export function formatCommandLine(spec: Pick<CommandSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].map(quoteArg).join(" ");
}

// =============================================================================
// INTERNALS
// =============================================================================

async function persistOutput(spec: CommandSpec, result: CommandResult): Promise<void> {
  if (spec.stdoutPath) {
    await appendTextFile(spec.stdoutPath, withTrailingNewline(result.stdout));
  }
  if (spec.stderrPath) {
    await appendTextFile(spec.stderrPath, withTrailingNewline(result.stderr));
  }
}

function withTrailingNewline(text: string): string {
  return text.length === 0 || text.endsWith("\n") ? text : `${text}\n`;
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

function readNumberField(err: unknown, field: string): number | undefined {
  if (!err || typeof err !== "object" || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function readStringField(err: unknown, field: string): string {
  if (!err || typeof err !== "object" || !(field in err)) return "";
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : value === undefined || value === null ? "" : String(value);
}
