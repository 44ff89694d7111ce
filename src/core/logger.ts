import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
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
  task_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  runId?: string;
  taskId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventDefaults = {
  runId?: string;
  taskId?: string;
};

/** Anything events can be written to. The orchestrator only needs this much. */
export interface EventSink {
  log(event: LogEventInput): void;
}

type LogFailureAction = "write" | "close";

// =============================================================================
// SINKS
// =============================================================================

/** Fills in run/task defaults and the timestamp, then hands the event to `record`. */
abstract class DefaultingEventSink implements EventSink {
  protected constructor(private readonly defaults: EventDefaults) {}

  /** The run id is only known once the store has loaded or created a run. */
  withRunId(runId: string): void {
    this.defaults.runId = runId;
  }

  log(event: LogEventInput): void {
    this.record(eventWithTs(event, this.defaults));
  }

  protected abstract record(event: LogEvent): void;
}

/** Append-only JSONL event log; every line is fsynced before `log` returns. */
export class JsonlLogger extends DefaultingEventSink {
  private fd: number | null;
  private readonly debug = resolveLoggerDebugEnabled();

  constructor(
    public readonly filePath: string,
    defaults: EventDefaults = {},
  ) {
    super(defaults);
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  close(): void {
    const fd = this.fd;
    if (fd === null) return;
    this.fd = null;
    this.guard("close", () => {
      fs.fsyncSync(fd);
      fs.closeSync(fd);
    });
  }

  protected record(event: LogEvent): void {
    const fd = this.fd;
    if (fd === null) return;
    this.guard("write", () => {
      fs.writeSync(fd, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(fd);
    });
  }

  // A broken log never fails the run; it only warns.
  private guard(action: LogFailureAction, work: () => void): void {
    try {
      work();
    } catch (err) {
      console.warn(formatLogFailureWarning(action, this.filePath, err, this.debug));
    }
  }
}

/** Keeps normalized events in memory. Used by tests. */
export class MemoryEventSink extends DefaultingEventSink {
  readonly events: LogEvent[] = [];

  constructor(defaults: EventDefaults = { runId: "memory" }) {
    super(defaults);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }

  protected record(event: LogEvent): void {
    this.events.push(event);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId, taskId, payload, ts, type, ...fields } = event;

  const resolvedRunId = runId ?? defaults.runId;
  if (!resolvedRunId) {
    throw new Error("run_id is required for log events");
  }

  const normalized: LogEvent = {
    ...fields,
    ts: typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow(),
    type,
    run_id: resolvedRunId,
  };

  const resolvedTaskId = taskId ?? defaults.taskId;
  if (resolvedTaskId) normalized.task_id = resolvedTaskId;
  if (payload && Object.keys(payload).length > 0) normalized.payload = payload;

  return normalized;
}

export function logOrchestratorEvent(
  logger: EventSink,
  type: string,
  fields: JsonObject & { taskId?: string; runId?: string; ts?: string | Date } = {},
): void {
  const { taskId, runId, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (taskId !== undefined) {
    event.taskId = taskId;
  }
  if (runId !== undefined) {
    event.runId = runId;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

export function logRunResume(
  logger: EventSink,
  details: { runId: string; sequence: number; inFlight: number; pending: number },
): void {
  logOrchestratorEvent(logger, "run.resume", {
    runId: details.runId,
    sequence: details.sequence,
    in_flight: details.inFlight,
    pending: details.pending,
  });
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

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
