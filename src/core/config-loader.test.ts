import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadProjectConfig, resolveProjectConfig } from "./config-loader.js";
import { ConfigError, UserFacingError } from "./errors.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);
  return dir;
}

function writeConfig(contents: string, filename = "tractline.yaml"): string {
  const configPath = path.join(makeTempDir(), filename);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.TRACTLINE_TEST_FSLDIR;
});

describe("loadProjectConfig", () => {
  it("applies defaults for an empty file", () => {
    const config = loadProjectConfig(writeConfig(""));

    expect(config.scheduler).toEqual({ backend: "lsf", notify: true });
    expect(config.pipeline.fa_threshold).toBe(0.2);
    expect(config.pipeline.permutations).toBe(5000);
    expect(config.pipeline.fill_threshold).toBe(0.95);
    expect(config.pipeline.gating).toBe("coarse");
    expect(config.pipeline.design_header_lines).toBe(3);
    expect(config.pipeline.stats_job).toEqual({
      cpus: 1,
      memory_mb: 15000,
      wall_minutes: 30000,
      single_host: true,
    });
    expect(config.designs.job.memory_mb).toBe(35000);
    expect(config.designs.include_file).toBe("grp.design.include.txt");
  });

  it("expands environment variables and resolves paths against the config directory", () => {
    process.env.TRACTLINE_TEST_FSLDIR = "/opt/fsl";
    const configPath = writeConfig(`
pipeline:
  template: \${TRACTLINE_TEST_FSLDIR}/data/standard/FMRIB58_FA_1mm.nii.gz
  gating: fine
designs:
  designs_dir: ../designs/all_designs
`);

    const config = loadProjectConfig(configPath);

    expect(config.pipeline.template).toBe("/opt/fsl/data/standard/FMRIB58_FA_1mm.nii.gz");
    expect(config.pipeline.gating).toBe("fine");
    expect(config.designs.designs_dir).toBe(
      path.resolve(path.dirname(configPath), "../designs/all_designs"),
    );
  });

  it("reports unset environment variables with their key path", () => {
    const configPath = writeConfig(`
toolkit:
  bin_dir: \${TRACTLINE_TEST_MISSING_VAR}/bin
`);

    const err = captureError(() => loadProjectConfig(configPath));

    expect(err).toBeInstanceOf(UserFacingError);
    const cause = err instanceof UserFacingError ? err.cause : undefined;
    expect(cause).toBeInstanceOf(ConfigError);
    expect(cause instanceof ConfigError ? cause.message : "").toBe(
      `Environment variable TRACTLINE_TEST_MISSING_VAR is not set but is referenced in ${configPath} (toolkit.bin_dir).`,
    );
  });

  it("rejects unknown enum values and top-level keys", () => {
    const configPath = writeConfig(`
scheduler:
  backend: slurm
extra: true
`);

    const err = captureError(() => loadProjectConfig(configPath));
    const cause = err instanceof UserFacingError ? err.cause : undefined;
    const message = cause instanceof ConfigError ? cause.message : "";

    expect(message).toContain(
      `scheduler.backend: Expected one of "lsf", "local", received "slurm"`,
    );
    expect(message).toContain("<root>: Unrecognized keys: extra");
  });

  it("fails with a user-facing error when the file is missing", () => {
    const missing = path.join(makeTempDir(), "nope.yaml");

    const err = captureError(() => loadProjectConfig(missing));

    expect(err).toBeInstanceOf(UserFacingError);
    expect(err instanceof UserFacingError ? err.message : "").toBe(`Config not found at ${missing}.`);
  });
});

describe("resolveProjectConfig", () => {
  it("falls back to defaults when no config file is discovered", () => {
    const resolved = resolveProjectConfig({ cwd: makeTempDir() });

    expect(resolved.configPath).toBeNull();
    expect(resolved.config.scheduler.backend).toBe("lsf");
  });

  it("discovers tractline.yaml in the working directory", () => {
    const configPath = writeConfig("scheduler:\n  backend: local\n");

    const resolved = resolveProjectConfig({ cwd: path.dirname(configPath) });

    expect(resolved.configPath).toBe(configPath);
    expect(resolved.config.scheduler.backend).toBe("local");
  });
});
