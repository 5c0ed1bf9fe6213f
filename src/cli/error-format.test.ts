import { describe, expect, it } from "vitest";

import { StageError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildConfigError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid pipeline arguments.",
    message: "'--design' option was not specified or the file does not exist.",
    hint: "Run `tractline run --help` to list the required flags.",
    next: "Pass --design <DESIGN.mat>",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without debug details", () => {
    const output = renderCliError(buildConfigError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Invalid pipeline arguments.",
        "'--design' option was not specified or the file does not exist.",
        "Hint: Run `tractline run --help` to list the required flags.",
        "Next: Pass --design <DESIGN.mat>",
      ].join("\n"),
    );
  });

  it("adds code, name, cause and stack in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.stage,
      title: "Pipeline stage failed.",
      message: "Stage preproc failed.",
      cause: new Error("exit 1"),
    });
    error.stack = "UserFacingError: Stage preproc failed.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Pipeline stage failed.",
        "Stage preproc failed.",
        "Code: STAGE_ERROR",
        "Name: UserFacingError",
        "Cause: exit 1",
        "Stack:",
        "  UserFacingError: Stage preproc failed.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("falls back to a generic title for plain errors", () => {
    const output = renderCliError(new StageError("copy failed", "copy"), {
      stream: nonTtyStream,
    });

    expect(output).toBe(["Error: Command failed.", "copy failed"].join("\n"));
  });

  it("wraps labels in ANSI codes when color is forced", () => {
    const output = renderCliError(buildConfigError(), { useColor: true });

    expect(output.split("\n")[0]).toBe(
      "\u001b[1m\u001b[31mError:\u001b[39m\u001b[22m \u001b[1mInvalid pipeline arguments.\u001b[22m",
    );
  });
});
