import { afterEach, beforeEach } from "vitest";

// =============================================================================
// TOOLKIT ENVIRONMENT ISOLATION
// =============================================================================

// Tests must not pick up a template or toolkit from the developer's FSL install.
const ISOLATED_ENV_KEYS = ["FSLDIR", "NO_COLOR"] as const;

let saved: Partial<Record<(typeof ISOLATED_ENV_KEYS)[number], string>> = {};

beforeEach(() => {
  saved = {};
  for (const key of ISOLATED_ENV_KEYS) {
    const value = process.env[key];
    if (value !== undefined) saved[key] = value;
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ISOLATED_ENV_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});
