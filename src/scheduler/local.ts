/**
 * Local backend: runs job commands as child processes of this orchestrator.
 * Resource requests are accepted and ignored; a background job is an in-process promise.
 */

import { formatErrorMessage } from "../core/error-format.js";
import { execaCommandRunner, type CommandRunner } from "../exec/command.js";

import {
  BaseJobSubmitter,
  type JobHandle,
  type JobOutcome,
  type JobSpec,
} from "./job-submitter.js";

export class LocalJobSubmitter extends BaseJobSubmitter {
  readonly backend = "local";
  private readonly runner: CommandRunner;
  private readonly running = new Map<string, Promise<JobOutcome>>();
  private nextId = 1;

  constructor(opts: { runner?: CommandRunner } = {}) {
    super();
    this.runner = opts.runner ?? execaCommandRunner;
  }

  protected async runBlocking(spec: JobSpec): Promise<JobOutcome> {
    return this.execute(this.allocateId(), spec);
  }

  protected async launch(spec: JobSpec): Promise<string> {
    const jobId = this.allocateId();
    this.running.set(jobId, this.execute(jobId, spec));
    return jobId;
  }

  protected async wait(handle: JobHandle): Promise<JobOutcome> {
    const pending = this.running.get(handle.jobId);
    if (!pending) {
      throw new Error(`No local job ${handle.jobId} is running`);
    }
    this.running.delete(handle.jobId);
    return pending;
  }

  private allocateId(): string {
    const id = `local-${this.nextId}`;
    this.nextId += 1;
    return id;
  }

  // Never rejects, so a background job that nobody has joined yet cannot raise an unhandled rejection.
  private async execute(jobId: string, spec: JobSpec): Promise<JobOutcome> {
    const base = {
      jobId,
      name: spec.name,
      stdoutPath: spec.stdoutPath,
      stderrPath: spec.stderrPath,
    };

    try {
      const res = await this.runner({
        command: spec.command,
        args: spec.args,
        cwd: spec.cwd,
        stdoutPath: spec.stdoutPath,
        stderrPath: spec.stderrPath,
      });
      return { ...base, success: res.exitCode === 0, exitCode: res.exitCode };
    } catch (err) {
      return { ...base, success: false, errorMessage: formatErrorMessage(err) };
    }
  }
}
