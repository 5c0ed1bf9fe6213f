import path from "node:path";

import { enumerateDesigns, type DesignSubmission } from "../app/designs/enumerator.js";
import type { ProjectConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger, logPipelineEvent, type EventLogger } from "../core/logger.js";
import { createConsoleReporter, type Reporter } from "../core/reporter.js";
import { isDirectory } from "../core/utils.js";
import type { CommandRunner } from "../exec/command.js";
import { createJobSubmitter } from "../scheduler/index.js";
import {
  describeJobFailure,
  toJobResources,
  type JobOutcome,
  type JobSubmitter,
} from "../scheduler/job-submitter.js";

import { normalizeCommandError } from "./command-errors.js";
import { createRunId } from "./run.js";
import {
  parsePermutations,
  parseThreshold,
  requireFile,
  resolveTemplate,
} from "./run-options.js";

// Layout of a study checkout when neither flags nor config name the directories.
const DEFAULT_DESIGNS_DIR = "../designs/all_designs";
const DEFAULT_DATA_DIR = "../../data";
const DEFAULT_OUT_DIR = "../..";

export type RawDesignsOptions = {
  designsDir?: string;
  dataDir?: string;
  outDir?: string;
  template?: string;
  faThreshold?: string;
  perm?: string;
  wait?: boolean;
};

export type DesignsCommandDeps = {
  runner?: CommandRunner;
  submitter?: JobSubmitter;
  reporter?: Reporter;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

type SubmittedDesign = Extract<DesignSubmission, { status: "submitted" }>;

export type DesignsCommandResult = {
  submissions: DesignSubmission[];
  /** Present when the command waited for the submitted runs. */
  outcomes?: JobOutcome[];
};

export async function designsCommand(
  config: ProjectConfig,
  configPath: string | null,
  raw: RawDesignsOptions,
  opts: { useColor?: boolean } = {},
  deps: DesignsCommandDeps = {},
): Promise<DesignsCommandResult> {
  try {
    const cwd = deps.cwd ?? process.cwd();
    const designs = config.designs;
    const designsDir = path.resolve(cwd, raw.designsDir ?? designs.designs_dir ?? DEFAULT_DESIGNS_DIR);
    if (!(await isDirectory(designsDir))) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Designs directory missing.",
        message: `Designs directory ${designsDir} does not exist.`,
        hint: "Pass --designs-dir or set designs.designs_dir in the config.",
      });
    }

    const templatePath = await requireFile(
      "--template",
      resolveTemplate(raw.template, config, deps.env ?? process.env),
    );
    const outDir = path.resolve(cwd, raw.outDir ?? designs.out_dir ?? DEFAULT_OUT_DIR);
    const reporter = deps.reporter ?? createConsoleReporter({ useColor: opts.useColor });
    const submitter = deps.submitter ?? createJobSubmitter(config.scheduler, deps.runner);
    const logger = new JsonlLogger(path.join(outDir, "logs", "designs.jsonl"), {
      runId: createRunId(),
    });

    try {
      const submissions = await enumerateDesigns(
        {
          designsDir,
          dataDir: path.resolve(cwd, raw.dataDir ?? designs.data_dir ?? DEFAULT_DATA_DIR),
          outDir,
          subjectPathTemplate: designs.subject_path_template,
          includeFile: designs.include_file,
          matrixFile: designs.matrix_file,
          contrastFile: designs.contrast_file,
          pipelineCommand: designs.pipeline_command,
          pipelineArgs: configPath ? ["--config", configPath] : [],
          templatePath,
          faThreshold:
            raw.faThreshold === undefined ? config.pipeline.fa_threshold : parseThreshold(raw.faThreshold),
          permutations:
            raw.perm === undefined ? config.pipeline.permutations : parsePermutations(raw.perm),
          resources: toJobResources(designs.job),
        },
        { submitter, logger, reporter },
      );

      const submitted = submissions.filter(
        (submission): submission is SubmittedDesign => submission.status === "submitted",
      );
      reporter.info(`Submitted ${submitted.length} of ${submissions.length} design(s).`);

      // Local runs are children of this process, so they are always waited for.
      if (!raw.wait && submitter.backend !== "local") {
        return { submissions };
      }

      const { outcomes, problems } = await joinDesignRuns(submitted, submitter, { logger, reporter });
      if (problems.length > 0) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.stage,
          title: "Design runs failed.",
          message: problems.join("\n"),
          hint: "Re-run the command; existing subject lists and completed stages are reused.",
        });
      }
      reporter.success(`All ${outcomes.length} design run(s) completed.`);
      return { submissions, outcomes };
    } finally {
      logger.close();
    }
  } catch (error) {
    throw normalizeCommandError(error, "Design enumeration");
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// Every run is joined even when waiting on another one fails; all problems are reported together.
async function joinDesignRuns(
  submitted: SubmittedDesign[],
  submitter: JobSubmitter,
  deps: { logger: EventLogger; reporter: Reporter },
): Promise<{ outcomes: JobOutcome[]; problems: string[] }> {
  const settled = await Promise.allSettled(
    submitted.map((submission) => submitter.join(submission.handle)),
  );

  const outcomes: JobOutcome[] = [];
  const problems: string[] = [];
  settled.forEach((result, index) => {
    const { entry, handle } = submitted[index];
    const fields = { group: entry.group, design: entry.design, job_id: handle.jobId };

    if (result.status === "rejected") {
      const message = formatErrorMessage(result.reason);
      logPipelineEvent(deps.logger, "design.join.failed", { ...fields, message });
      deps.reporter.warn(`${handle.name}: could not wait for job ${handle.jobId}.`);
      problems.push(`Could not wait for ${handle.name} (${handle.jobId}): ${message}`);
      return;
    }

    const outcome = result.value;
    outcomes.push(outcome);
    logPipelineEvent(deps.logger, outcome.success ? "design.complete" : "design.failed", {
      ...fields,
      ...(outcome.exitCode === undefined ? {} : { exit_code: outcome.exitCode }),
    });
    if (outcome.success) {
      deps.reporter.success(`${handle.name} completed.`);
    } else {
      deps.reporter.warn(`${handle.name} failed.`);
      problems.push(describeJobFailure(outcome));
    }
  });

  return { outcomes, problems };
}
