#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { normalizeArgv } from "./cli/argv.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli, colorPreference, type GlobalOptions } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

// `--help` exits with status 1.
const HELP_EXIT_CODE = 1;

// Errors are rendered by main(); commander only reports them by throwing.
function configureCliErrorHandling(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      outputError: (_message: string, _write: (chunk: string) => void) => undefined,
    });
    command.exitOverride();
  }
}

function isHelpExit(error: unknown): boolean {
  return (
    error instanceof CommanderError &&
    (error.code === "commander.helpDisplayed" || error.code === "commander.help")
  );
}

function isVersionExit(error: unknown): boolean {
  return error instanceof CommanderError && error.code === "commander.version";
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<GlobalOptions>().debug);
}

function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }
  }

  return debugFlag;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);
  const normalized = normalizeArgv(argv);

  try {
    await program.parseAsync(normalized);
  } catch (error) {
    if (isHelpExit(error)) {
      process.exitCode = HELP_EXIT_CODE;
      return;
    }
    if (isVersionExit(error)) {
      process.exitCode = 0;
      return;
    }

    const debug = resolveDebugEnabled(normalized, program);
    const useColor = colorPreference(program.opts<GlobalOptions>());
    console.error(renderCliError(error, { debug, useColor, stream: process.stderr }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// Allow `node dist/src/index.js` direct execution, including through the npm bin symlink
const entry = process.argv[1];
if (entry && fs.existsSync(entry) && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href) {
  void main(process.argv);
}
