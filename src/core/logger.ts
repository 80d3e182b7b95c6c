import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { sanitizeJson } from "./sanitize.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  level: LogLevel;
  run_id: string;
  repo?: string;
  stage?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  runId?: string;
  repo?: string;
  stage?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export interface EventLog {
  log(event: LogEventInput): void;
}

type EventDefaults = {
  runId?: string;
  repo?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

// Every line goes through sanitizeJson before it reaches the file. Writes are synchronous,
// so concurrent pipelines cannot interleave partial lines.
export class JsonlLogger implements EventLog {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly isDebugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(sanitizeJson(event))}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export function createRepositoryLog(parent: EventLog, repo: string): EventLog {
  return {
    log(event: LogEventInput) {
      parent.log({ ...event, repo: event.repo ?? repo });
    },
  };
}

// Fans one event out to several sinks (file + console reporter).
export function teeEventLog(...sinks: EventLog[]): EventLog {
  return {
    log(event: LogEventInput) {
      for (const sink of sinks) sink.log(event);
    },
  };
}

export const NOOP_EVENT_LOG: EventLog = { log: () => undefined };

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, repo, stage, payload, ts, type, level } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    level: level ?? "info",
    run_id: runId,
  };

  const resolvedRepo = repo ?? defaults.repo;
  if (resolvedRepo) {
    result.repo = resolvedRepo;
  }
  if (stage) {
    result.stage = stage;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
