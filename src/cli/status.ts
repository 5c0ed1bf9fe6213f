import path from "node:path";

import { createStageGate, describeMarker, type StageGate } from "../app/pipeline/stage-gate.js";
import { planStageChecks, type StageCheck } from "../app/pipeline/stages.js";
import type { ProjectConfig } from "../core/config.js";
import { createRunLayout } from "../core/run-layout.js";
import { isDirectory } from "../core/utils.js";

import { normalizeCommandError } from "./command-errors.js";

export type StageStatusRow = StageCheck & { done: boolean };

export type RunStatus = {
  runDir: string;
  exists: boolean;
  rows: StageStatusRow[];
};

/** Evaluates every stage marker of a run directory without running anything. */
export async function collectRunStatus(
  runDir: string,
  opts: { secondaryMeasures: boolean; gating: ProjectConfig["pipeline"]["gating"] },
  gate: StageGate = createStageGate(),
): Promise<RunStatus> {
  const layout = createRunLayout(runDir);
  const exists = await isDirectory(layout.root);
  const checks = planStageChecks(layout, opts);
  const rows: StageStatusRow[] = [];
  for (const check of checks) {
    rows.push({ ...check, done: exists && (await gate.isComplete(check.marker)) });
  }
  return { runDir: layout.root, exists, rows };
}

export function formatRunStatus(status: RunStatus): string[] {
  if (!status.exists) {
    return [`No run directory at ${status.runDir}.`];
  }

  const width = Math.max(...status.rows.map((row) => row.id.length));
  const lines = [`Run: ${status.runDir}`, ""];
  for (const row of status.rows) {
    const state = row.done ? "done" : "pending";
    const marker = path.relative(status.runDir, describeMarker(row.marker));
    lines.push(`  ${row.id.padEnd(width)}  ${state.padEnd(7)}  ${marker}`);
  }
  const done = status.rows.filter((row) => row.done).length;
  lines.push("", `${done}/${status.rows.length} stages complete.`);
  return lines;
}

export async function statusCommand(
  config: ProjectConfig,
  opts: { tbssDir: string; nonFaTbss?: boolean },
): Promise<RunStatus> {
  try {
    const status = await collectRunStatus(path.resolve(opts.tbssDir), {
      secondaryMeasures: opts.nonFaTbss ?? false,
      gating: config.pipeline.gating,
    });
    for (const line of formatRunStatus(status)) {
      console.log(line);
    }
    if (!status.exists) {
      process.exitCode = 1;
    }
    return status;
  } catch (error) {
    throw normalizeCommandError(error, "Status");
  }
}
