/**
 * Stage sequencer: drives one TBSS run from subject staging through post-stats fill.
 * Purpose: decide per stage whether to skip or run, and join every background unit it launched.
 * Assumptions: the run directory tree is the only progress record; stages run in a fixed order.
 * Usage: const result = await runPipeline(createRunContext(settings, adapters));
 *
 * Coarse gating treats preproc/register/postreg/prestats as one unit behind `stats/`: a
 * pre-created `stats/` skips all four even if they never ran. Fine gating gives each its
 * own sentinel under `.stages/`.
 */

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { formatErrorMessage } from "../../core/error-format.js";
import {
  OrchestratorError,
  StageError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../../core/errors.js";
import { logPipelineEvent, type JsonObject } from "../../core/logger.js";
import {
  PRIMARY_MEASURE,
  SECONDARY_MEASURES,
  commandLogPaths,
  corrpPattern,
  measureDir,
  measureStagingDir,
  randomiseLogPath,
  stageSentinelPath,
  type Measure,
} from "../../core/run-layout.js";
import {
  assertDesignMatchesSubjects,
  readSubjectList,
  resolveMeasureSource,
  type Subject,
} from "../../core/subjects.js";
import { ensureDir, isoNow, writeTextFileAtomic } from "../../core/utils.js";
import { describeJobFailure, type JobOutcome } from "../../scheduler/job-submitter.js";
import { JobGroup } from "../../scheduler/job-group.js";
import { copyImage, listImages } from "../../toolkit/images.js";
import type { ToolkitStep } from "../../toolkit/fsl.js";

import { fanOut, formatFanOutFailures } from "./fan-out.js";
import type { RunContext, RunLogger } from "./run-context.js";
import { describeMarker, type StageMarker } from "./stage-gate.js";
import {
  PREPROCESSING_STAGES,
  copyMarker,
  fillMarker,
  preprocessingMarker,
  skeletonMarker,
  statsMarker,
  stepId,
  type PreprocessingStage,
  type StepKind,
} from "./stages.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineResult = {
  runDir: string;
  subjectCount: number;
  /** Step ids that invoked work (a copy, a toolkit command or a scheduler job), in order. */
  executed: string[];
  /** Step ids whose marker already existed. */
  skipped: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipeline(ctx: RunContext): Promise<PipelineResult> {
  // Nothing is written under the run directory until the inputs have been checked.
  const subjects = await loadSubjects(ctx);

  await ensureDir(ctx.layout.root);
  const logger = ctx.openLogger(ctx.layout);
  try {
    return await new PipelineRun(ctx, subjects, logger).execute();
  } finally {
    logger.close();
  }
}

/** Reads the subject list and applies the consistency gate; performs no writes. */
export async function loadSubjects(ctx: RunContext): Promise<Subject[]> {
  const { settings } = ctx;
  const subjects = await readSubjectList(settings.subjectListPath);
  if (subjects.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Empty subject list.",
      message: `Subject list ${settings.subjectListPath} contains no subjects.`,
    });
  }

  const seen = new Map<string, string>();
  for (const subject of subjects) {
    const previous = seen.get(subject.id);
    if (previous !== undefined) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Duplicate subject.",
        message: `Subjects ${previous} and ${subject.primaryPath} share the stem ${subject.id}.`,
        hint: "Each subject's staged image is named after its stem, so stems must be unique.",
      });
    }
    seen.set(subject.id, subject.primaryPath);
  }

  if (settings.checkDesign) {
    await assertDesignMatchesSubjects({
      designPath: settings.designPath,
      subjectCount: subjects.length,
      headerLines: settings.designHeaderLines,
    });
  }

  return subjects;
}

// =============================================================================
// RUN
// =============================================================================

class PipelineRun {
  private readonly executed: string[] = [];
  private readonly skipped: string[] = [];
  private readonly primaryJobs: JobGroup;
  private readonly secondaryJobs: JobGroup;

  constructor(
    private readonly ctx: RunContext,
    private readonly subjects: Subject[],
    private readonly logger: RunLogger,
  ) {
    this.primaryJobs = new JobGroup(ctx.submitter, logger);
    this.secondaryJobs = new JobGroup(ctx.submitter, logger);
  }

  async execute(): Promise<PipelineResult> {
    const { settings, layout, reporter } = this.ctx;
    logPipelineEvent(this.logger, "run.start", {
      run_dir: layout.root,
      subjects: this.subjects.length,
      secondary_measures: settings.secondaryMeasures,
      gating: settings.gating,
      scheduler: this.ctx.submitter.backend,
    });
    logPipelineEvent(this.logger, "stage.complete", {
      stage: "init",
      subjects: this.subjects.length,
      check_design: settings.checkDesign,
    });

    try {
      await this.copyMeasure(PRIMARY_MEASURE);
      await this.preprocess();
      await this.stageDesignFiles();
      await this.launchStats(PRIMARY_MEASURE, this.primaryJobs);

      const secondary: Measure[] = settings.secondaryMeasures ? [...SECONDARY_MEASURES] : [];
      for (const measure of secondary) {
        await this.copyMeasure(measure);
        await this.skeletonise(measure);
        await this.launchStats(measure, this.secondaryJobs);
      }

      await this.joinStats([PRIMARY_MEASURE], this.primaryJobs);
      await this.fill(PRIMARY_MEASURE);

      if (secondary.length > 0) {
        await this.joinStats(secondary, this.secondaryJobs);
        for (const measure of secondary) {
          await this.fill(measure);
        }
      }
    } catch (err) {
      logPipelineEvent(this.logger, "run.failed", { message: formatErrorMessage(err) });
      throw err;
    } finally {
      await this.drain();
    }

    logPipelineEvent(this.logger, "run.complete", {
      executed: this.executed,
      skipped: this.skipped,
    });
    reporter.success("TBSS analysis completed.");
    return {
      runDir: layout.root,
      subjectCount: this.subjects.length,
      executed: [...this.executed],
      skipped: [...this.skipped],
    };
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  /** Copies every subject's image for `measure` into a staging dir, renamed into place only when all succeed. */
  private async copyMeasure(measure: Measure): Promise<void> {
    const { layout, settings } = this.ctx;
    await this.gated(stepId("copy", measure), "copy", copyMarker(layout, measure), async () => {
      const stagingDir = measureStagingDir(layout, measure);
      await fse.emptyDir(stagingDir);

      const result = await fanOut(
        this.subjects.map((subject) => ({
          id: subject.id,
          label: `copy ${measure}`,
          run: async () => {
            const source = await resolveMeasureSource(subject, measure);
            if (source === null) {
              throw new Error(`no ${measure} image found for ${subject.id} in ${subject.dataDir}`);
            }
            return copyImage(source, stagingDir, subject.id);
          },
        })),
        { maxParallel: settings.maxParallelCopies, logger: this.logger, stage: "copy" },
      );

      if (result.failures.length > 0) {
        throw new StageError(
          `Copying ${measure} images failed for ${result.failures.length} of ${this.subjects.length} subjects:\n${formatFanOutFailures(result.failures)}`,
          "copy",
        );
      }
      await fse.move(stagingDir, measureDir(layout, measure));
    });
  }

  private async preprocess(): Promise<void> {
    const { layout, settings } = this.ctx;

    if (settings.gating === "coarse") {
      const marker = preprocessingMarker(layout, "preproc", "coarse");
      if (await this.ctx.gate.isComplete(marker)) {
        this.ctx.reporter.warn("TBSS processing steps already completed.");
        for (const stage of PREPROCESSING_STAGES) {
          this.recordSkip(stage, stage, marker);
        }
        return;
      }
      for (const stage of PREPROCESSING_STAGES) {
        await this.runStage(stage, stage, () => this.runPreprocessingStage(stage));
      }
      return;
    }

    for (const stage of PREPROCESSING_STAGES) {
      await this.gated(stage, stage, preprocessingMarker(layout, stage, "fine"), async () => {
        await this.runPreprocessingStage(stage);
        await writeTextFileAtomic(stageSentinelPath(layout, stage), `${isoNow()}\n`);
      });
    }
  }

  private async runPreprocessingStage(stage: PreprocessingStage): Promise<void> {
    const { toolkit, settings, layout } = this.ctx;
    switch (stage) {
      case "preproc": {
        const images = await listImages(measureDir(layout, PRIMARY_MEASURE));
        await this.runToolkitStep(stage, toolkit.preprocess(images));
        return;
      }
      case "register":
        await this.runToolkitStep(stage, toolkit.register(settings.templatePath));
        return;
      case "postreg":
        await this.runToolkitStep(stage, toolkit.postRegister());
        return;
      case "prestats":
        await this.runToolkitStep(stage, toolkit.prestats(settings.faThreshold));
        return;
    }
  }

  // Re-copied on every run so edits to the design files take effect on resume.
  private async stageDesignFiles(): Promise<void> {
    const { layout, settings } = this.ctx;
    await ensureDir(layout.statsDir);
    await fse.copy(settings.designPath, layout.designMat, { overwrite: true });
    await fse.copy(settings.contrastPath, layout.designCon, { overwrite: true });
    logPipelineEvent(this.logger, "design.staged", {
      stage: "stats",
      design: settings.designPath,
      contrast: settings.contrastPath,
    });
  }

  private async skeletonise(measure: Measure): Promise<void> {
    const { layout, toolkit } = this.ctx;
    await this.gated(
      stepId("skeletonise", measure),
      "skeletonise",
      skeletonMarker(layout, measure),
      () => this.runToolkitStep("skeletonise", toolkit.projectMeasure(measure), measure),
    );
  }

  private async launchStats(measure: Measure, group: JobGroup): Promise<void> {
    const { layout, toolkit, settings } = this.ctx;
    await this.gated(stepId("stats", measure), "stats", statsMarker(layout, measure), async () => {
      const step = toolkit.randomise(measure, settings.permutations);
      const logPath = randomiseLogPath(layout, measure);
      const handle = await group.launch({
        name: `${measure}_rdm`,
        command: step.command,
        args: step.args,
        cwd: step.cwd,
        resources: settings.statsResources,
        stdoutPath: logPath,
        stderrPath: logPath,
      });
      this.ctx.reporter.info(`Submitted ${measure} permutation testing as job ${handle.jobId}.`);
    });
  }

  /** Joins every stats job in the group; any failure or missing output halts the run. */
  private async joinStats(measures: Measure[], group: JobGroup): Promise<void> {
    const outcomes = await group.joinAll();
    const failed = outcomes.filter((outcome) => !outcome.success);
    if (failed.length > 0) {
      throw this.statsFailure(failed);
    }

    for (const measure of measures) {
      const marker = statsMarker(this.ctx.layout, measure);
      if (!(await this.ctx.gate.isComplete(marker))) {
        const error = new StageError(
          `Permutation testing for ${measure} finished without producing ${describeMarker(marker)}: see ${randomiseLogPath(this.ctx.layout, measure)} for details`,
          "stats",
        );
        logPipelineEvent(this.logger, "stage.failed", {
          stage: "stats",
          step: stepId("stats", measure),
          message: error.message,
        });
        throw error;
      }
    }
  }

  private async fill(measure: Measure): Promise<void> {
    const { layout, toolkit, settings } = this.ctx;
    await this.gated(
      stepId("poststats_fill", measure),
      "poststats_fill",
      fillMarker(layout, measure),
      async () => {
        const found = await fg(corrpPattern(measure), { cwd: layout.statsDir, onlyFiles: true });
        const images = found.filter((name) => !name.includes("fill")).sort();
        if (images.length === 0) {
          this.ctx.reporter.warn(`No corrected ${measure} statistic images to fill.`);
          return;
        }
        for (const image of images) {
          this.ctx.reporter.info(`Processing: ${image}`);
          await this.runToolkitStep(
            "poststats_fill",
            toolkit.fill(path.join(layout.statsDir, image), settings.fillThreshold),
            measure,
          );
        }
      },
    );
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async gated(
    id: string,
    kind: StepKind,
    marker: StageMarker,
    work: () => Promise<void>,
  ): Promise<void> {
    if (await this.ctx.gate.isComplete(marker)) {
      this.ctx.reporter.warn(`${id}: already complete.`);
      this.recordSkip(id, kind, marker);
      return;
    }
    await this.runStage(id, kind, work);
  }

  private recordSkip(id: string, kind: StepKind, marker: StageMarker): void {
    this.skipped.push(id);
    logPipelineEvent(this.logger, "stage.skip", {
      stage: kind,
      step: id,
      marker: describeMarker(marker),
    });
  }

  private async runStage(id: string, kind: StepKind, work: () => Promise<void>): Promise<void> {
    this.ctx.reporter.info(`${id}: running.`);
    logPipelineEvent(this.logger, "stage.start", { stage: kind, step: id });
    try {
      await work();
    } catch (err) {
      logPipelineEvent(this.logger, "stage.failed", {
        stage: kind,
        step: id,
        message: formatErrorMessage(err),
      });
      throw err instanceof OrchestratorError ? err : new StageError(formatErrorMessage(err), kind, err);
    }
    this.executed.push(id);
    logPipelineEvent(this.logger, "stage.complete", { stage: kind, step: id });
  }

  private async runToolkitStep(kind: StepKind, step: ToolkitStep, measure?: Measure): Promise<void> {
    const logs = commandLogPaths(this.ctx.layout, step.step);
    const fields: JsonObject = { stage: kind, step: step.step, command: step.command };
    if (measure) fields.measure = measure;
    logPipelineEvent(this.logger, "command.start", fields);

    let exitCode: number;
    try {
      const result = await this.ctx.runner({ ...step, ...logs });
      exitCode = result.exitCode;
    } catch (err) {
      throw new StageError(`${step.step} could not be started: ${formatErrorMessage(err)}`, kind, err);
    }

    logPipelineEvent(this.logger, "command.complete", { ...fields, exit_code: exitCode });
    if (exitCode !== 0) {
      throw new StageError(
        `${step.step} exited with code ${exitCode}: see ${logs.stdoutPath} and ${logs.stderrPath} for details`,
        kind,
      );
    }
  }

  private statsFailure(failed: JobOutcome[]): StageError {
    const message = failed.map(describeJobFailure).join("\n");
    for (const outcome of failed) {
      logPipelineEvent(this.logger, "stage.failed", {
        stage: "stats",
        step: outcome.name,
        message: describeJobFailure(outcome),
      });
    }
    return new StageError(message, "stats");
  }

  /** Joins whatever is still outstanding after an early exit so no job handle is left behind. */
  private async drain(): Promise<void> {
    for (const group of [this.primaryJobs, this.secondaryJobs]) {
      if (group.size === 0) continue;
      try {
        await group.joinAll();
      } catch (err) {
        const message = formatErrorMessage(err);
        logPipelineEvent(this.logger, "job.drain.failed", { message });
        this.ctx.reporter.warn(`Failed to join outstanding jobs: ${message}`);
      }
    }
  }
}
