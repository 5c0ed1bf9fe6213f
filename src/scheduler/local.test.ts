import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ScriptedRunner } from "./__tests__/fake-runner.js";
import type { JobSpec } from "./job-submitter.js";
import { LocalJobSubmitter } from "./local.js";

const tempDirs: string[] = [];

function buildSpec(name: string): JobSpec {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "local-jobs-"));
  tempDirs.push(dir);
  return {
    name,
    command: "randomise",
    args: ["-n", "10"],
    cwd: dir,
    resources: { cpus: 1, memoryMb: 1000, wallMinutes: 10, singleHost: true },
    stdoutPath: path.join(dir, "logs", `${name}.log`),
    stderrPath: path.join(dir, "logs", `${name}.log`),
  };
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("LocalJobSubmitter", () => {
  it("runs blocking jobs directly and forwards log targets", async () => {
    const runner = new ScriptedRunner().respond("randomise", { exitCode: 0 });
    const submitter = new LocalJobSubmitter({ runner: runner.run });
    const spec = buildSpec("FA_rdm");

    const outcome = await submitter.submit(spec, "blocking");

    expect(outcome.success).toBe(true);
    expect(outcome.jobId).toBe("local-1");
    expect(runner.calls[0]).toEqual({
      command: "randomise",
      args: ["-n", "10"],
      cwd: spec.cwd,
      stdoutPath: spec.stdoutPath,
      stderrPath: spec.stderrPath,
    });
  });

  it("returns a handle for background jobs and resolves it on join", async () => {
    const runner = new ScriptedRunner().respond("randomise", { exitCode: 1 });
    const submitter = new LocalJobSubmitter({ runner: runner.run });

    const handle = await submitter.submit(buildSpec("MD_rdm"), "background");
    expect(submitter.outstandingCount).toBe(1);

    const outcome = await submitter.join(handle);

    expect(outcome).toMatchObject({ jobId: "local-1", name: "MD_rdm", success: false, exitCode: 1 });
    expect(submitter.outstandingCount).toBe(0);
  });

  it("turns a command that cannot start into a failed outcome", async () => {
    const runner = new ScriptedRunner().failToLaunch("randomise", "randomise: not found");
    const submitter = new LocalJobSubmitter({ runner: runner.run });

    const outcome = await submitter.join(await submitter.submit(buildSpec("RD_rdm"), "background"));

    expect(outcome.success).toBe(false);
    expect(outcome.errorMessage).toBe("randomise: not found");
  });
});
