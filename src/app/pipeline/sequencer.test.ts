import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { StageError, UserFacingError } from "../../core/errors.js";

import {
  FakeToolkit,
  cleanupTempDirs,
  createHarness,
  createPipelineFixture,
  defaultSettings,
  readEvents,
} from "./__tests__/fakes.js";
import { runPipeline } from "./sequencer.js";

const PRIMARY_STEPS = [
  "copy-FA",
  "preproc",
  "register",
  "postreg",
  "prestats",
  "stats-FA",
  "poststats_fill-FA",
];

function listDir(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

afterEach(() => {
  cleanupTempDirs();
});

describe("runPipeline", () => {
  it("runs every primary stage in order on a fresh run directory", async () => {
    const fixture = createPipelineFixture();
    const { ctx, toolkit } = createHarness(defaultSettings(fixture));

    const result = await runPipeline(ctx);

    expect(result.executed).toEqual(PRIMARY_STEPS);
    expect(result.skipped).toEqual([]);
    expect(toolkit.invocations()).toEqual([
      "tbss_1_preproc",
      "tbss_2_reg",
      "tbss_3_postreg",
      "tbss_4_prestats",
      "randomise tbss_FA",
      "tbss_fill tbss_FA_tfce_corrp_tstat1.nii.gz",
      "tbss_fill tbss_FA_tfce_corrp_tstat2.nii.gz",
    ]);

    const preproc = toolkit.calls[0];
    expect(preproc.cwd).toBe(ctx.layout.root);
    expect(preproc.args).toEqual(["FA/sub-01.nii.gz", "FA/sub-02.nii.gz", "FA/sub-03.nii.gz"]);
    expect(toolkit.calls[1].args).toEqual(["-t", fixture.templatePath]);
    expect(toolkit.calls[3].cwd).toBe(ctx.layout.statsDir);
    expect(toolkit.calls[3].args).toEqual(["0.2"]);

    expect(fs.readFileSync(ctx.layout.designMat, "utf8")).toBe(
      fs.readFileSync(fixture.designPath, "utf8"),
    );
    expect(fs.existsSync(ctx.layout.designCon)).toBe(true);
    expect(fs.existsSync(path.join(ctx.layout.statsDir, "tbss_FA_tfce_corrp_tstat1_filled.nii.gz"))).toBe(
      true,
    );
  });

  it("invokes nothing when every marker already exists", async () => {
    const fixture = createPipelineFixture();
    await runPipeline(createHarness(defaultSettings(fixture)).ctx);

    const rerun = createHarness(defaultSettings(fixture));
    const result = await runPipeline(rerun.ctx);

    expect(rerun.toolkit.calls).toEqual([]);
    expect(result.executed).toEqual([]);
    expect(result.skipped).toEqual(PRIMARY_STEPS);
  });

  it("resumes after the last completed marker", async () => {
    const fixture = createPipelineFixture();
    const failing = createHarness(defaultSettings(fixture), new FakeToolkit().failOn("tbss_2_reg"));

    await expect(runPipeline(failing.ctx)).rejects.toBeInstanceOf(StageError);
    expect(fs.existsSync(failing.ctx.layout.statsDir)).toBe(false);

    const resumed = createHarness(defaultSettings(fixture));
    const result = await runPipeline(resumed.ctx);

    expect(result.skipped).toEqual(["copy-FA"]);
    expect(result.executed).toEqual(PRIMARY_STEPS.slice(1));
  });

  it("resumes inside the preprocessing block with fine gating", async () => {
    const fixture = createPipelineFixture();
    const settings = defaultSettings(fixture, { gating: "fine" });
    const failing = createHarness(settings, new FakeToolkit().failOn("tbss_2_reg"));

    await expect(runPipeline(failing.ctx)).rejects.toThrow(
      `register exited with code 1: see ${path.join(failing.ctx.layout.logsDir, "register.out.log")} and ${path.join(failing.ctx.layout.logsDir, "register.err.log")} for details`,
    );
    expect(fs.existsSync(path.join(failing.ctx.layout.stagesDir, "preproc.done"))).toBe(true);
    expect(fs.existsSync(path.join(failing.ctx.layout.stagesDir, "register.done"))).toBe(false);

    const resumed = createHarness(settings);
    const result = await runPipeline(resumed.ctx);

    expect(result.skipped).toEqual(["copy-FA", "preproc"]);
    expect(resumed.toolkit.invocations()[0]).toBe("tbss_2_reg");
  });

  it("accepts a design with three header lines plus one row per subject", async () => {
    const fixture = createPipelineFixture({ subjectCount: 4, designRows: 4 });
    const result = await runPipeline(createHarness(defaultSettings(fixture)).ctx);
    expect(result.subjectCount).toBe(4);
  });

  it.each([2, 4])(
    "rejects a design with %i rows for three subjects before creating anything",
    async (designRows) => {
      const fixture = createPipelineFixture({ subjectCount: 3, designRows });
      const { ctx, toolkit } = createHarness(defaultSettings(fixture));

      const error = await runPipeline(ctx).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UserFacingError);
      expect(error).toMatchObject({
        code: "CONSISTENCY_ERROR",
        message: "Design matrix does not contain the correct number of subjects",
      });
      expect(fs.existsSync(fixture.runDir)).toBe(false);
      expect(toolkit.calls).toEqual([]);
    },
  );

  it("skips the consistency gate unless it was requested", async () => {
    const fixture = createPipelineFixture({ subjectCount: 3, designRows: 5 });
    const result = await runPipeline(
      createHarness(defaultSettings(fixture, { checkDesign: false })).ctx,
    );
    expect(result.executed).toEqual(PRIMARY_STEPS);
  });

  it("copies exactly one image per subject whatever the copy concurrency", async () => {
    const fixture = createPipelineFixture({ subjectCount: 5 });
    const { ctx } = createHarness(defaultSettings(fixture, { maxParallelCopies: 2 }));

    await runPipeline(ctx);

    const faDir = path.join(ctx.layout.root, "FA");
    const images = listDir(faDir).filter((name) => name.endsWith(".nii.gz"));
    expect(images).toEqual([
      "sub-01.nii.gz",
      "sub-02.nii.gz",
      "sub-03.nii.gz",
      "sub-04.nii.gz",
      "sub-05.nii.gz",
    ]);
    expect(fs.readFileSync(path.join(faDir, "sub-04.nii.gz"), "utf8")).toBe("sub-04 FA\n");
    expect(fs.existsSync(path.join(ctx.layout.root, ".FA.staging"))).toBe(false);
  });

  it("leaves no copy marker when any subject image is missing", async () => {
    const fixture = createPipelineFixture({ subjectCount: 3 });
    fs.rmSync(fixture.subjectPaths[1]);
    const { ctx, toolkit } = createHarness(defaultSettings(fixture));

    const error = await runPipeline(ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "copy" });
    expect(fs.existsSync(path.join(ctx.layout.root, "FA"))).toBe(false);
    expect(listDir(path.join(ctx.layout.root, ".FA.staging"))).toEqual([
      "sub-01.nii.gz",
      "sub-03.nii.gz",
    ]);
    expect(toolkit.calls).toEqual([]);

    const failures = readEvents(ctx.layout.eventsLog).filter(
      (event) => event.type === "fanout.task.failed",
    );
    expect(failures).toHaveLength(1);
    expect(failures[0].payload).toMatchObject({ task_id: "sub-02", label: "copy FA" });
  });

  it("skips straight to statistics when the stats directory was pre-created", async () => {
    const fixture = createPipelineFixture();
    fs.mkdirSync(path.join(fixture.runDir, "stats"), { recursive: true });
    const { ctx, toolkit } = createHarness(defaultSettings(fixture));

    const result = await runPipeline(ctx);

    expect(result.skipped).toEqual(["preproc", "register", "postreg", "prestats"]);
    expect(result.executed).toEqual(["copy-FA", "stats-FA", "poststats_fill-FA"]);
    expect(toolkit.invocations()[0]).toBe("randomise tbss_FA");
  });

  it("processes secondary measures through their own sub-sequence", async () => {
    const fixture = createPipelineFixture();
    const { ctx, toolkit } = createHarness(defaultSettings(fixture, { secondaryMeasures: true }));

    const result = await runPipeline(ctx);

    expect(result.executed).toEqual([
      "copy-FA",
      "preproc",
      "register",
      "postreg",
      "prestats",
      "stats-FA",
      "copy-AD",
      "skeletonise-AD",
      "stats-AD",
      "copy-MD",
      "skeletonise-MD",
      "stats-MD",
      "copy-RD",
      "skeletonise-RD",
      "stats-RD",
      "poststats_fill-FA",
      "poststats_fill-AD",
      "poststats_fill-MD",
      "poststats_fill-RD",
    ]);
    expect(toolkit.invocations().filter((call) => call.startsWith("randomise"))).toEqual([
      "randomise tbss_FA",
      "randomise tbss_AD",
      "randomise tbss_MD",
      "randomise tbss_RD",
    ]);
    expect(listDir(path.join(ctx.layout.root, "MD")).filter((name) => name.endsWith(".nii.gz"))).toEqual([
      "sub-01.nii.gz",
      "sub-02.nii.gz",
      "sub-03.nii.gz",
    ]);
  });

  it("produces identical primary results with or without secondary measures", async () => {
    const withSecondary = createPipelineFixture();
    const withoutSecondary = createPipelineFixture();
    const full = createHarness(defaultSettings(withSecondary, { secondaryMeasures: true }));
    const primaryOnly = createHarness(defaultSettings(withoutSecondary));

    await runPipeline(full.ctx);
    await runPipeline(primaryOnly.ctx);

    for (const measure of ["AD", "MD", "RD"]) {
      expect(fs.existsSync(path.join(primaryOnly.ctx.layout.root, measure))).toBe(false);
    }

    const primaryOutputs = (statsDir: string): string[] =>
      listDir(statsDir).filter((name) => name.includes("_FA"));
    const expected = primaryOutputs(full.ctx.layout.statsDir);
    expect(primaryOutputs(primaryOnly.ctx.layout.statsDir)).toEqual(expected);
    for (const name of expected) {
      expect(fs.readFileSync(path.join(primaryOnly.ctx.layout.statsDir, name))).toEqual(
        fs.readFileSync(path.join(full.ctx.layout.statsDir, name)),
      );
    }
  });

  it("fails without a stats marker or fill when the primary job fails, joining every job", async () => {
    const fixture = createPipelineFixture();
    const toolkit = new FakeToolkit().failOn("randomise", {
      exitCode: 3,
      when: (args) => args.includes("tbss_FA"),
    });
    const { ctx, submitter } = createHarness(
      defaultSettings(fixture, { secondaryMeasures: true }),
      toolkit,
    );

    await expect(runPipeline(ctx)).rejects.toThrow(
      `Job FA_rdm (local-1) exited with code 3: see log files ${path.join(ctx.layout.root, "FA", "00_tbss_FA_randomise.log")} for details`,
    );

    expect(fs.existsSync(path.join(ctx.layout.statsDir, "tbss_FA_tfce_p_tstat1.nii.gz"))).toBe(false);
    expect(toolkit.invocations().some((call) => call.startsWith("tbss_fill"))).toBe(false);
    expect(submitter.outstandingCount).toBe(0);

    const types = readEvents(ctx.layout.eventsLog).map((event) => event.type);
    expect(types.filter((type) => type === "job.complete")).toHaveLength(3);
    expect(types).toContain("job.failed");
    expect(types).toContain("run.failed");
  });

  it("writes the events log under the run directory", async () => {
    const fixture = createPipelineFixture();
    const { ctx } = createHarness(defaultSettings(fixture));

    await runPipeline(ctx);

    const events = readEvents(ctx.layout.eventsLog);
    expect(events[0]).toMatchObject({ type: "run.start", run_id: "test-run" });
    expect(events[events.length - 1]).toMatchObject({ type: "run.complete", run_id: "test-run" });
    expect(events.filter((event) => event.type === "stage.complete").map((event) => event.stage)).toEqual([
      "init",
      "copy",
      "preproc",
      "register",
      "postreg",
      "prestats",
      "stats",
      "poststats_fill",
    ]);
  });
});
