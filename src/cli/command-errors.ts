import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  SchedulerError,
  StageError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

// =============================================================================
// NORMALIZATION
// =============================================================================

const RESUME_HINT = "Re-run the same command to resume; stages whose outputs exist are skipped.";

/** Maps internal errors onto the user-facing taxonomy at the command boundary. */
export function normalizeCommandError(error: unknown, action: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof StageError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.stage,
      title: `Stage ${error.stage} failed.`,
      message: error.message,
      hint: RESUME_HINT,
      cause: error,
    });
  }

  if (error instanceof SchedulerError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.scheduler,
      title: "Scheduler error.",
      message: error.message,
      hint: "Check that the batch scheduler is reachable and accepts the job's resource request.",
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: `${action} failed.`,
    message: formatErrorMessage(error),
    cause: error,
  });
}
