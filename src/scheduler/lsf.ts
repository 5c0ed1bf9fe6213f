/**
 * LSF backend: `bsub -K` for blocking jobs, `bsub` + `bwait` + `bjobs` for background jobs.
 */

import { CommandLaunchError, SchedulerError } from "../core/errors.js";
import { execaCommandRunner, formatCommandLine, type CommandResult, type CommandRunner } from "../exec/command.js";

import {
  BaseJobSubmitter,
  type JobHandle,
  type JobOutcome,
  type JobSpec,
} from "./job-submitter.js";

// =============================================================================
// TYPES
// =============================================================================

export type LsfSubmitterOptions = {
  runner?: CommandRunner;
  /** Mail the submitter when the job ends (`-N`). */
  notify?: boolean;
  queue?: string;
};

export type LsfJobState = {
  stat: string;
  exitCode?: number;
};

const JOB_ID_PATTERN = /Job <(\d+)> is submitted/;

// =============================================================================
// SUBMITTER
// =============================================================================

export class LsfJobSubmitter extends BaseJobSubmitter {
  readonly backend = "lsf";
  private readonly runner: CommandRunner;
  private readonly notify: boolean;
  private readonly queue?: string;

  constructor(opts: LsfSubmitterOptions = {}) {
    super();
    this.runner = opts.runner ?? execaCommandRunner;
    this.notify = opts.notify ?? true;
    this.queue = opts.queue;
  }

  buildBsubArgs(spec: JobSpec, opts: { blocking: boolean }): string[] {
    const args = ["-J", spec.name, "-n", String(spec.resources.cpus)];
    if (spec.resources.singleHost) {
      args.push("-R", "span[hosts=1]");
    }
    args.push("-M", String(spec.resources.memoryMb), "-W", String(spec.resources.wallMinutes));
    if (this.notify) {
      args.push("-N");
    }
    if (this.queue) {
      args.push("-q", this.queue);
    }
    if (opts.blocking) {
      args.push("-K");
    }
    args.push("-o", spec.stdoutPath, "-e", spec.stderrPath, spec.command, ...spec.args);
    return args;
  }

  protected async runBlocking(spec: JobSpec): Promise<JobOutcome> {
    const res = await this.invoke("bsub", this.buildBsubArgs(spec, { blocking: true }), spec.cwd);
    const jobId = parseJobId(`${res.stdout}\n${res.stderr}`);
    if (!jobId) {
      throw rejectedSubmission(spec, res);
    }

    // With -K, bsub exits with the job's own exit code.
    return {
      jobId,
      name: spec.name,
      success: res.exitCode === 0,
      exitCode: res.exitCode,
      stdoutPath: spec.stdoutPath,
      stderrPath: spec.stderrPath,
    };
  }

  protected async launch(spec: JobSpec): Promise<string> {
    const res = await this.invoke("bsub", this.buildBsubArgs(spec, { blocking: false }), spec.cwd);
    const jobId = parseJobId(`${res.stdout}\n${res.stderr}`);
    if (res.exitCode !== 0 || !jobId) {
      throw rejectedSubmission(spec, res);
    }
    return jobId;
  }

  protected async wait(handle: JobHandle): Promise<JobOutcome> {
    const waited = await this.invoke("bwait", ["-w", `ended(${handle.jobId})`], process.cwd());
    if (waited.exitCode !== 0) {
      throw new SchedulerError(
        `bwait failed for job ${handle.jobId} (${handle.name}): ${waited.stderr.trim() || `exit ${waited.exitCode}`}`,
      );
    }

    const queried = await this.invoke(
      "bjobs",
      ["-noheader", "-o", "stat exit_code", handle.jobId],
      process.cwd(),
    );
    const state = parseJobState(queried.stdout);
    if (queried.exitCode !== 0 || !state) {
      throw new SchedulerError(
        `bjobs could not report job ${handle.jobId} (${handle.name}): ${queried.stderr.trim() || queried.stdout.trim()}`,
      );
    }

    return {
      jobId: handle.jobId,
      name: handle.name,
      success: state.stat === "DONE",
      exitCode: state.exitCode ?? (state.stat === "DONE" ? 0 : undefined),
      stdoutPath: handle.stdoutPath,
      stderrPath: handle.stderrPath,
    };
  }

  private async invoke(command: string, args: string[], cwd: string): Promise<CommandResult> {
    try {
      return await this.runner({ command, args, cwd });
    } catch (err) {
      if (err instanceof CommandLaunchError) {
        throw new SchedulerError(
          `Batch scheduler command ${command} could not be started; is LSF available on this host?`,
          err,
        );
      }
      throw err;
    }
  }
}

// =============================================================================
// PARSING
// =============================================================================

export function parseJobId(output: string): string | null {
  const match = JOB_ID_PATTERN.exec(output);
  return match ? match[1] : null;
}

/** Parses `bjobs -o "stat exit_code"` output such as `DONE -` or `EXIT 2`. */
export function parseJobState(output: string): LsfJobState | null {
  const line = output
    .split("\n")
    .map((entry) => entry.trim())
    .find((entry) => entry.length > 0);
  if (!line) return null;

  const [stat, exitField] = line.split(/\s+/);
  const exitCode = exitField !== undefined && /^\d+$/.test(exitField) ? Number(exitField) : undefined;
  return exitCode === undefined ? { stat } : { stat, exitCode };
}

function rejectedSubmission(spec: JobSpec, res: CommandResult): SchedulerError {
  const detail = res.stderr.trim() || res.stdout.trim() || `exit ${res.exitCode}`;
  return new SchedulerError(
    `LSF rejected job ${spec.name} (${formatCommandLine({ command: spec.command, args: spec.args })}): ${detail}`,
  );
}
