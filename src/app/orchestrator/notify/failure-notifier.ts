/**
 * Failure notifier.
 * Purpose: report failed stages and instance failures to every configured sink, once per point.
 * Assumptions: a sink error never changes the run outcome; it is only logged.
 * Usage: await notifier.notifyStages(outcome, results); await notifier.notifyInstance("teardown", err);
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { NotificationMessage, NotificationPoint, NotificationSink } from "../ports.js";
import type { StageResult, StagesOutcome } from "../stages/stage-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type NotificationRecord = {
  point: NotificationPoint;
  sink: string;
  status: "sent" | "failed";
  error?: string;
};

export type InstancePhase = "provisioning" | "teardown";

export type FailureNotifierOptions = {
  sinks: NotificationSink[];
  pipeline: string;
  runId: string;
  link?: string;
  logger?: JsonlLogger;
};

// =============================================================================
// NOTIFIER
// =============================================================================

export class FailureNotifier {
  private readonly sinks: NotificationSink[];
  private readonly pipeline: string;
  private readonly runId: string;
  private readonly link?: string;
  private readonly logger?: JsonlLogger;
  private readonly notified = new Set<NotificationPoint>();
  readonly records: NotificationRecord[] = [];

  constructor(opts: FailureNotifierOptions) {
    this.sinks = opts.sinks;
    this.pipeline = opts.pipeline;
    this.runId = opts.runId;
    this.link = opts.link;
    this.logger = opts.logger;
  }

  // Only monitored stages count; an unmonitored failure alone does not notify.
  async notifyStages(outcome: StagesOutcome, results: readonly StageResult[]): Promise<void> {
    if (outcome !== "failure") return;
    const failing = results
      .filter((result) => result.status === "failure" && result.monitored)
      .map((result) => result.stage);
    if (failing.length === 0) return;

    await this.emit({
      point: "stages",
      runId: this.runId,
      pipeline: this.pipeline,
      status: "failure",
      message: `${this.pipeline} tests finished with status: failure. Failed stages: ${failing.join(", ")}.`,
      link: this.link,
      failingStages: failing,
    });
  }

  async notifyInstance(phase: InstancePhase, error: unknown): Promise<void> {
    await this.emit({
      point: "instance",
      runId: this.runId,
      pipeline: this.pipeline,
      status: "failure",
      message: `Instance ${phase} (${this.pipeline}) finished with status: failure. ${formatErrorMessage(error)}`,
      link: this.link,
      failingStages: [],
    });
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async emit(message: NotificationMessage): Promise<void> {
    if (this.notified.has(message.point)) return;
    this.notified.add(message.point);

    for (const sink of this.sinks) {
      try {
        await sink.send(message);
        this.records.push({ point: message.point, sink: sink.name, status: "sent" });
        if (this.logger) {
          logOrchestratorEvent(this.logger, "notification.sent", {
            point: message.point,
            sink: sink.name,
          });
        }
      } catch (err) {
        const error = formatErrorMessage(err);
        this.records.push({ point: message.point, sink: sink.name, status: "failed", error });
        if (this.logger) {
          logOrchestratorEvent(this.logger, "notification.failed", {
            point: message.point,
            sink: sink.name,
            message: error,
          });
        }
      }
    }
  }
}
