/*
Purpose: append one JSON object per line to a run's event log.
Assumptions: one logger per run; a log that cannot be written never fails the run.
Usage: logOrchestratorEvent(logger, "stage.complete", { stage: "core", status: "success" });
*/

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
};

export type LogFields = JsonObject & { stage?: string };

export type JsonlLoggerOptions = {
  runId: string;
  now?: () => string;
  warn?: (message: string) => void;
  debug?: boolean;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly runId: string;
  private fd: number | null;
  private dropped = 0;
  private readonly now: () => string;
  private readonly warn: (message: string) => void;
  private readonly debug: boolean;

  constructor(
    public readonly filePath: string,
    opts: JsonlLoggerOptions,
  ) {
    this.runId = opts.runId;
    this.now = opts.now ?? isoNow;
    this.warn = opts.warn ?? ((message) => console.warn(message));
    this.debug = opts.debug ?? process.argv.includes("--debug");
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(type: string, fields: LogFields = {}): void {
    if (this.fd === null) return;

    const { stage, ...rest } = fields;
    const event: LogEvent = { ts: this.now(), type, run_id: this.runId, ...rest };
    if (stage !== undefined) event.stage = stage;

    try {
      fs.writeSync(this.fd, `${JSON.stringify(event)}\n`);
    } catch (err) {
      // Only the first failure is reported as it happens; close() reports the count.
      if (this.dropped === 0) {
        this.warn(this.describeFailure(`could not write to ${this.filePath}`, err));
      }
      this.dropped += 1;
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;

    if (this.dropped > 1) {
      this.warn(`Warning: ${this.dropped} events for run ${this.runId} were not written to ${this.filePath}`);
    }
    try {
      fs.fsyncSync(fd);
      fs.closeSync(fd);
    } catch (err) {
      this.warn(this.describeFailure(`could not close ${this.filePath}`, err));
    }
  }

  private describeFailure(what: string, err: unknown): string {
    const message = `Warning: event log ${what}: ${formatErrorMessage(err)}`;
    if (this.debug && err instanceof Error && err.stack) {
      return `${message}\n${err.stack}`;
    }
    return message;
  }
}

export function logOrchestratorEvent(logger: JsonlLogger, type: string, fields: LogFields = {}): void {
  logger.log(type, fields);
}
