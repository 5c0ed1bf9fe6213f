import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logPipelineEvent } from "./logger.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  tempDirs.push(dir);
  return dir;
}

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("JsonlLogger", () => {
  it("writes events with run and stage metadata", () => {
    const logPath = path.join(makeTempDir(), "nested", "pipeline.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "design-a", stage: "copy" });

    logger.log({ type: "stage.start", payload: { measure: "FA" } });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event.type).toBe("stage.start");
    expect(event.run_id).toBe("design-a");
    expect(event.stage).toBe("copy");
    expect(event.payload).toEqual({ measure: "FA" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = path.join(makeTempDir(), "pipeline.jsonl");
    const first = new JsonlLogger(logPath, { runId: "run-1" });
    first.log({ type: "run.start" });
    first.close();

    const second = new JsonlLogger(logPath, { runId: "run-1" });
    second.log({ type: "run.complete" });
    second.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["run.start", "run.complete"]);
  });

  it("drops events after close", () => {
    const logPath = path.join(makeTempDir(), "pipeline.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });
    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });

  it("warns instead of throwing when a write fails", () => {
    const logPath = path.join(makeTempDir(), "pipeline.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "stage.start" });

    expect(warnSpy).toHaveBeenCalledWith(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
    vi.restoreAllMocks();
    logger.close();
  });
});

describe("logPipelineEvent", () => {
  it("lifts stage to the top level and keeps the rest as payload", () => {
    const logPath = path.join(makeTempDir(), "pipeline.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logPipelineEvent(logger, "stage.skip", { stage: "register", marker: "/tmp/stats" });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event.stage).toBe("register");
    expect(event.payload).toEqual({ marker: "/tmp/stats" });
  });
});

describe("eventWithTs", () => {
  it("requires a run id", () => {
    expect(() => eventWithTs({ type: "orphan" })).toThrow("run_id is required for log events");
  });

  it("serializes Date timestamps and omits empty payloads", () => {
    const event = eventWithTs(
      { type: "job.submit", ts: new Date("2024-03-01T10:00:00.000Z"), payload: {} },
      { runId: "run-5" },
    );

    expect(event).toEqual({ ts: "2024-03-01T10:00:00.000Z", type: "job.submit", run_id: "run-5" });
  });
});
