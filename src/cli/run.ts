import { createRunContext } from "../app/pipeline/run-context.js";
import { runPipeline, type PipelineResult } from "../app/pipeline/sequencer.js";
import type { ProjectConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { createConsoleReporter, type Reporter } from "../core/reporter.js";
import { execaCommandRunner, type CommandRunner } from "../exec/command.js";
import { createJobSubmitter } from "../scheduler/index.js";
import type { JobSubmitter } from "../scheduler/job-submitter.js";

import { normalizeCommandError } from "./command-errors.js";
import { resolveRunOptions, type RawRunOptions } from "./run-options.js";

export type RunCommandDeps = {
  runner?: CommandRunner;
  submitter?: JobSubmitter;
  reporter?: Reporter;
  env?: NodeJS.ProcessEnv;
  runId?: string;
};

export async function runCommand(
  config: ProjectConfig,
  raw: RawRunOptions,
  opts: { useColor?: boolean } = {},
  deps: RunCommandDeps = {},
): Promise<PipelineResult> {
  try {
    const { settings, backend } = await resolveRunOptions(raw, config, deps.env);
    const runner = deps.runner ?? execaCommandRunner;
    const reporter = deps.reporter ?? createConsoleReporter({ useColor: opts.useColor });
    const runId = deps.runId ?? createRunId();

    const ctx = createRunContext(settings, {
      runner,
      reporter,
      submitter: deps.submitter ?? createJobSubmitter({ ...config.scheduler, backend }, runner),
      openLogger: (layout) => new JsonlLogger(layout.eventsLog, { runId }),
    });

    reporter.info(`Run ${runId}: ${ctx.layout.root}`);
    const result = await runPipeline(ctx);
    reporter.info(
      `Executed ${result.executed.length} step(s), skipped ${result.skipped.length}. Events: ${ctx.layout.eventsLog}`,
    );
    return result;
  } catch (error) {
    throw normalizeCommandError(error, "Pipeline run");
  }
}

// e.g. 20261019T142501
export function createRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "");
}
