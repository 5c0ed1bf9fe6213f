import { Command } from "commander";

import { resolveProjectConfig } from "../core/config-loader.js";

import { designsCommand, type RawDesignsOptions } from "./designs.js";
import type { RawRunOptions } from "./run-options.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
  color: boolean;
};

/** `--no-color` forces plain output; otherwise color follows the TTY and NO_COLOR. */
export function colorPreference(globals: GlobalOptions): boolean | undefined {
  return globals.color ? undefined : false;
}

export function buildCli(): Command {
  const program = new Command();

  const loadConfig = () =>
    resolveProjectConfig({ explicitPath: program.opts<GlobalOptions>().config });

  program
    .name("tractline")
    .description("Resumable TBSS pipeline orchestrator (FSL toolkit + batch scheduler jobs)")
    .version("0.1.0")
    .option("--config <path>", "Project config path (defaults to ./tractline.yaml when present)")
    .option("--debug", "Include error codes, causes and stack traces in error output", false)
    .option("--no-color", "Disable ANSI colors in output")
    .showHelpAfterError();

  program
    .command("run")
    .description("Run or resume the TBSS pipeline for one design")
    .option("--tbss-dir <dir>", "Pipeline run directory (created if missing)")
    .option("--sub-list <file>", "Subject list: one FA image path per line")
    .option("--design <file>", "T-test design matrix")
    .option("--contrast <file>", "T-test contrast")
    .option("--template <file>", "Registration template (default: $FSLDIR/data/standard/FMRIB58_FA_1mm.nii.gz)")
    .option("--fa-threshold <n>", "Mean FA skeleton threshold (default: 0.2; 0.15 for lower-FA cohorts)")
    .option("--perm <n>", "Number of permutations (default: 5000)")
    .option("--check-design", "Check that the design matrix has one row per subject", false)
    .option("--non-fa-tbss", "Also run TBSS on AD, MD and RD", false)
    .option("--max-parallel <n>", "Maximum concurrent subject copies")
    .option("--scheduler <backend>", "Scheduler backend: lsf | local")
    .action(async (opts: RawRunOptions) => {
      const globals = program.opts<GlobalOptions>();
      const { config } = loadConfig();
      await runCommand(config, opts, { useColor: colorPreference(globals) });
    });

  program
    .command("designs")
    .description("Submit one pipeline run per <group>/<design> directory")
    .option("--designs-dir <dir>", "Root of the group/design hierarchy (default: ../designs/all_designs)")
    .option("--data-dir <dir>", "Subject data root (default: ../../data)")
    .option("--out-dir <dir>", "Output root; runs go to <out>/TBSS/<group>/<design> (default: ../..)")
    .option("--template <file>", "Registration template passed to every run")
    .option("--fa-threshold <n>", "Mean FA skeleton threshold passed to every run")
    .option("--perm <n>", "Number of permutations passed to every run")
    .option("--wait", "Wait for every submitted run to finish", false)
    .action(async (opts: RawDesignsOptions) => {
      const globals = program.opts<GlobalOptions>();
      const { config, configPath } = loadConfig();
      await designsCommand(config, configPath, opts, { useColor: colorPreference(globals) });
    });

  program
    .command("status")
    .description("Show which stage markers of a run directory exist")
    .requiredOption("--tbss-dir <dir>", "Pipeline run directory")
    .option("--non-fa-tbss", "Include the AD, MD and RD stages", false)
    .action(async (opts: { tbssDir: string; nonFaTbss?: boolean }) => {
      const { config } = loadConfig();
      await statusCommand(config, opts);
    });

  return program;
}
