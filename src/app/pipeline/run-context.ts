/**
 * RunContext: the immutable settings and the adapters one pipeline run works with.
 * Purpose: replace ambient script state with one explicit object passed to every stage.
 * Usage: const ctx = createRunContext(settings, { submitter, runner, reporter, openLogger });
 */

import type { GatingMode } from "../../core/config.js";
import type { EventLogger } from "../../core/logger.js";
import type { Reporter } from "../../core/reporter.js";
import { createRunLayout, type RunLayout } from "../../core/run-layout.js";
import type { CommandRunner } from "../../exec/command.js";
import type { JobResources, JobSubmitter } from "../../scheduler/job-submitter.js";
import { FslToolkit } from "../../toolkit/fsl.js";

import { createStageGate, type StageGate } from "./stage-gate.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineSettings = Readonly<{
  runDir: string;
  subjectListPath: string;
  designPath: string;
  contrastPath: string;
  templatePath: string;
  faThreshold: number;
  permutations: number;
  fillThreshold: number;
  checkDesign: boolean;
  secondaryMeasures: boolean;
  gating: GatingMode;
  designHeaderLines: number;
  maxParallelCopies?: number;
  statsResources: JobResources;
  toolkitBinDir?: string;
}>;

/** Event sink for one run; closed by the sequencer when the run ends. */
export type RunLogger = EventLogger & { close(): void };

export type PipelineAdapters = {
  submitter: JobSubmitter;
  runner: CommandRunner;
  reporter: Reporter;
  /** Called once validation has passed; nothing is written under the run directory before. */
  openLogger: (layout: RunLayout) => RunLogger;
  gate?: StageGate;
};

export type RunContext = Readonly<{
  settings: PipelineSettings;
  layout: RunLayout;
  toolkit: FslToolkit;
  gate: StageGate;
  submitter: JobSubmitter;
  runner: CommandRunner;
  reporter: Reporter;
  openLogger: (layout: RunLayout) => RunLogger;
}>;

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createRunContext(settings: PipelineSettings, adapters: PipelineAdapters): RunContext {
  const layout = createRunLayout(settings.runDir);
  return Object.freeze({
    settings: Object.freeze({ ...settings }),
    layout,
    toolkit: new FslToolkit(layout, settings.toolkitBinDir),
    gate: adapters.gate ?? createStageGate(),
    submitter: adapters.submitter,
    runner: adapters.runner,
    reporter: adapters.reporter,
    openLogger: adapters.openLogger,
  });
}
