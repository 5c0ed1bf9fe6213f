/**
 * Structured group of background jobs: every handle launched through the group is joined
 * by `joinAll`, never just the most recent one.
 */

import { formatErrorMessage } from "../core/error-format.js";
import { logPipelineEvent, type EventLogger } from "../core/logger.js";

import type { JobHandle, JobOutcome, JobSpec, JobSubmitter } from "./job-submitter.js";

export class JobGroup {
  private readonly handles: JobHandle[] = [];

  constructor(
    private readonly submitter: JobSubmitter,
    private readonly logger?: EventLogger,
  ) {}

  get size(): number {
    return this.handles.length;
  }

  async launch(spec: JobSpec): Promise<JobHandle> {
    const handle = await this.submitter.submit(spec, "background");
    this.handles.push(handle);
    if (this.logger) {
      logPipelineEvent(this.logger, "job.submit", {
        job_id: handle.jobId,
        name: handle.name,
        mode: "background",
      });
    }
    return handle;
  }

  /**
   * Joins every outstanding handle, including when some of them fail. Returns outcomes in
   * launch order; the first join error (not job failure) is rethrown after all have settled.
   */
  async joinAll(): Promise<JobOutcome[]> {
    const pending = this.handles.splice(0, this.handles.length);
    const settled = await Promise.allSettled(pending.map((handle) => this.submitter.join(handle)));

    const outcomes: JobOutcome[] = [];
    let joinError: unknown;
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        outcomes.push(result.value);
        this.logOutcome(result.value);
        return;
      }
      joinError ??= result.reason;
      if (this.logger) {
        logPipelineEvent(this.logger, "job.join.failed", {
          job_id: pending[index].jobId,
          name: pending[index].name,
          message: formatErrorMessage(result.reason),
        });
      }
    });

    if (joinError !== undefined) {
      throw joinError;
    }
    return outcomes;
  }

  private logOutcome(outcome: JobOutcome): void {
    if (!this.logger) return;
    logPipelineEvent(this.logger, outcome.success ? "job.complete" : "job.failed", {
      job_id: outcome.jobId,
      name: outcome.name,
      ...(outcome.exitCode === undefined ? {} : { exit_code: outcome.exitCode }),
    });
  }
}
