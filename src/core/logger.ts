import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  stage?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  stage?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  stage?: string;
};

/** Anything that accepts pipeline events; the JSONL logger and test recorders both qualify. */
export interface EventLogger {
  log(event: LogEventInput): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    const normalized = eventWithTs(event, this.defaults);
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(normalized)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to write log event to ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to close log file ${this.filePath}: ${formatErrorMessage(err)}`);
    } finally {
      this.closed = true;
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = { ts, type: event.type, run_id: runId };

  const stage = event.stage ?? defaults.stage;
  if (stage) {
    result.stage = stage;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logPipelineEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { stage?: string } = {},
): void {
  const { stage, ...payload } = fields;
  const event: LogEventInput = { type, payload };
  if (stage !== undefined) {
    event.stage = stage;
  }
  logger.log(event);
}
