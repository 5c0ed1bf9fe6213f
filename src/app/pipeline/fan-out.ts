/**
 * Parallel fan-out with an all-or-nothing join.
 * Purpose: run file-disjoint sub-tasks concurrently and surface every failure.
 * Assumptions: tasks share nothing but the filesystem; completion order does not matter.
 * Usage: const result = await fanOut(tasks, { maxParallel, logger });
 *
 * Best-effort policy: one failing task never cancels its siblings. The caller inspects
 * `failures` after the join and must not write the stage marker when any exist.
 */

import { formatErrorMessage } from "../../core/error-format.js";
import { logPipelineEvent, type EventLogger } from "../../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type FanOutTask<T> = {
  /** Identifies the unit of work in logs, e.g. the subject id. */
  id: string;
  /** What the task does, e.g. `copy FA`. */
  label: string;
  run: () => Promise<T>;
};

export type FanOutFailure = {
  id: string;
  label: string;
  error: unknown;
};

export type FanOutResult<T> = {
  /** Results of successful tasks, in input order. */
  results: Array<{ id: string; value: T }>;
  failures: FanOutFailure[];
};

export type FanOutOptions = {
  /** Upper bound on concurrently running tasks; unbounded when omitted. */
  maxParallel?: number;
  logger?: EventLogger;
  stage?: string;
};

// =============================================================================
// DISPATCH
// =============================================================================

export async function fanOut<T>(
  tasks: ReadonlyArray<FanOutTask<T>>,
  opts: FanOutOptions = {},
): Promise<FanOutResult<T>> {
  const limit = resolveLimit(opts.maxParallel, tasks.length);
  const settled: Array<PromiseSettledResult<T> | undefined> = new Array(tasks.length);
  let cursor = 0;

  // Each lane pulls the next task in input order, so launch order follows the input.
  const lane = async (): Promise<void> => {
    while (cursor < tasks.length) {
      const index = cursor;
      cursor += 1;
      const task = tasks[index];
      try {
        settled[index] = { status: "fulfilled", value: await task.run() };
      } catch (error) {
        settled[index] = { status: "rejected", reason: error };
        if (opts.logger) {
          logPipelineEvent(opts.logger, "fanout.task.failed", {
            ...(opts.stage ? { stage: opts.stage } : {}),
            task_id: task.id,
            label: task.label,
            message: formatErrorMessage(error),
          });
        }
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, () => lane()));

  const result: FanOutResult<T> = { results: [], failures: [] };
  tasks.forEach((task, index) => {
    const outcome = settled[index];
    if (outcome?.status === "fulfilled") {
      result.results.push({ id: task.id, value: outcome.value });
    } else {
      result.failures.push({ id: task.id, label: task.label, error: outcome?.reason });
    }
  });

  return result;
}

export function formatFanOutFailures(failures: FanOutFailure[]): string {
  return failures
    .map((failure) => `${failure.id} (${failure.label}): ${formatErrorMessage(failure.error)}`)
    .join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveLimit(maxParallel: number | undefined, taskCount: number): number {
  if (taskCount === 0) return 0;
  if (maxParallel === undefined) return taskCount;
  if (!Number.isInteger(maxParallel) || maxParallel < 1) {
    throw new Error(`maxParallel must be a positive integer (received ${maxParallel})`);
  }
  return Math.min(maxParallel, taskCount);
}
