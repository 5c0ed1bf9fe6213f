import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  FakeToolkit,
  cleanupTempDirs,
  createPipelineFixture,
  readEvents,
  type PipelineFixture,
} from "../app/pipeline/__tests__/fakes.js";
import { defaultProjectConfig } from "../core/config.js";
import { UserFacingError } from "../core/errors.js";
import { createRecordingReporter } from "../core/reporter.js";

import type { RawRunOptions } from "./run-options.js";
import { createRunId, runCommand } from "./run.js";

function rawOptions(fixture: PipelineFixture): RawRunOptions {
  return {
    tbssDir: fixture.runDir,
    subList: fixture.subjectListPath,
    design: fixture.designPath,
    contrast: fixture.contrastPath,
    template: fixture.templatePath,
    checkDesign: true,
    scheduler: "local",
  };
}

afterEach(() => {
  cleanupTempDirs();
});

describe("runCommand", () => {
  it("runs the pipeline on the local backend and logs under the run id", async () => {
    const fixture = createPipelineFixture();
    const toolkit = new FakeToolkit();

    const result = await runCommand(defaultProjectConfig(), rawOptions(fixture), {}, {
      runner: toolkit.run,
      reporter: createRecordingReporter(),
      runId: "run-1",
      env: {},
    });

    expect(result.executed).toContain("stats-FA");
    const events = readEvents(path.join(fixture.runDir, "logs", "pipeline.jsonl"));
    expect(events.every((event) => event.run_id === "run-1")).toBe(true);
    expect(toolkit.invocations()).toContain("randomise tbss_FA");
  });

  it("reports a failed stage with a resume hint", async () => {
    const fixture = createPipelineFixture();
    const toolkit = new FakeToolkit().failOn("tbss_3_postreg", { exitCode: 2 });

    const error = await runCommand(defaultProjectConfig(), rawOptions(fixture), {}, {
      runner: toolkit.run,
      reporter: createRecordingReporter(),
      env: {},
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({
      code: "STAGE_ERROR",
      title: "Stage postreg failed.",
      hint: "Re-run the same command to resume; stages whose outputs exist are skipped.",
    });
  });

  it("creates nothing when an argument is invalid", async () => {
    const fixture = createPipelineFixture();

    const error = await runCommand(
      defaultProjectConfig(),
      { ...rawOptions(fixture), perm: "many" },
      {},
      { runner: new FakeToolkit().run, reporter: createRecordingReporter(), env: {} },
    ).catch((err: unknown) => err);

    expect(error).toMatchObject({
      code: "CONFIG_ERROR",
      message: "'--perm' argument requires integers only [1 - 9999999]",
    });
    expect(fs.existsSync(fixture.runDir)).toBe(false);
  });
});

describe("createRunId", () => {
  it("formats a compact UTC timestamp", () => {
    expect(createRunId(new Date("2026-10-19T14:25:01.123Z"))).toBe("20261019T142501");
  });
});
