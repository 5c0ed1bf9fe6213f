/**
 * Job submission boundary between the pipeline and a batch scheduler.
 * Purpose: express blocking and background jobs the same way for every backend.
 * Assumptions: backends never retry; a rejected submission is a configuration problem.
 * Usage: const handle = await submitter.submit(spec, "background"); ...; await submitter.join(handle);
 */

import path from "node:path";

import type { JobResourcesConfig } from "../core/config.js";
import { SchedulerError } from "../core/errors.js";
import { ensureDir } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobResources = {
  cpus: number;
  memoryMb: number;
  wallMinutes: number;
  singleHost: boolean;
};

export type JobSpec = {
  name: string;
  command: string;
  args: string[];
  cwd: string;
  resources: JobResources;
  stdoutPath: string;
  stderrPath: string;
};

export type SubmitMode = "blocking" | "background";

export type JobHandle = {
  readonly jobId: string;
  readonly name: string;
  readonly stdoutPath: string;
  readonly stderrPath: string;
};

export type JobOutcome = {
  jobId: string;
  name: string;
  success: boolean;
  exitCode?: number;
  errorMessage?: string;
  stdoutPath: string;
  stderrPath: string;
};

export interface JobSubmitter {
  readonly backend: string;
  submit(spec: JobSpec, mode: "blocking"): Promise<JobOutcome>;
  submit(spec: JobSpec, mode: "background"): Promise<JobHandle>;
  /** Blocks until the job ends. Each handle can be joined exactly once. */
  join(handle: JobHandle): Promise<JobOutcome>;
}

// =============================================================================
// BASE
// =============================================================================

/** Owns handle bookkeeping so backends only implement run, launch and wait. */
export abstract class BaseJobSubmitter implements JobSubmitter {
  abstract readonly backend: string;
  private readonly outstanding = new Map<string, JobHandle>();

  submit(spec: JobSpec, mode: "blocking"): Promise<JobOutcome>;
  submit(spec: JobSpec, mode: "background"): Promise<JobHandle>;
  async submit(spec: JobSpec, mode: SubmitMode): Promise<JobOutcome | JobHandle> {
    await ensureDir(path.dirname(spec.stdoutPath));
    await ensureDir(path.dirname(spec.stderrPath));

    if (mode === "blocking") {
      return this.runBlocking(spec);
    }

    const jobId = await this.launch(spec);
    const handle: JobHandle = {
      jobId,
      name: spec.name,
      stdoutPath: spec.stdoutPath,
      stderrPath: spec.stderrPath,
    };
    this.outstanding.set(jobId, handle);
    return handle;
  }

  async join(handle: JobHandle): Promise<JobOutcome> {
    const owned = this.outstanding.get(handle.jobId);
    if (owned !== handle) {
      throw new SchedulerError(
        `Job ${handle.jobId} (${handle.name}) was already joined or was not submitted by this ${this.backend} submitter.`,
      );
    }
    this.outstanding.delete(handle.jobId);
    return this.wait(handle);
  }

  get outstandingCount(): number {
    return this.outstanding.size;
  }

  protected abstract runBlocking(spec: JobSpec): Promise<JobOutcome>;
  protected abstract launch(spec: JobSpec): Promise<string>;
  protected abstract wait(handle: JobHandle): Promise<JobOutcome>;
}

// =============================================================================
// HELPERS
// =============================================================================

export function toJobResources(config: JobResourcesConfig): JobResources {
  return {
    cpus: config.cpus,
    memoryMb: config.memory_mb,
    wallMinutes: config.wall_minutes,
    singleHost: config.single_host,
  };
}

export function describeJobFailure(outcome: JobOutcome): string {
  const status =
    outcome.errorMessage ??
    (outcome.exitCode === undefined ? "failed" : `exited with code ${outcome.exitCode}`);
  const logs =
    outcome.stdoutPath === outcome.stderrPath
      ? outcome.stdoutPath
      : `${outcome.stdoutPath} ${outcome.stderrPath}`;
  return `Job ${outcome.name} (${outcome.jobId}) ${status}: see log files ${logs} for details`;
}
