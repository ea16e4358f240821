/**
 * Stage runner.
 * Purpose: run each gated stage's build target on the claimed instance, in dependency order.
 * Assumptions: stages arrive topologically ordered; a stage never runs before its producers succeed.
 * Usage: const results = await runStages({ stages, gates, instance, targets, signal, clock, logger });
 */

import { StageExecutionError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { StageDefinition } from "../../../core/pipeline.js";
import { gateFor, type GateDecision } from "../gating/gate-resolver.js";
import { formatDuration } from "../helpers/time.js";
import type { BuildTargetRunner, Clock, RunnerHandle, TargetRunResult } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type StageStatus = "success" | "failure" | "skipped" | "cancelled";

export type StagesOutcome = "success" | "failure" | "cancelled" | "skipped";

export type StageResult = {
  stage: string;
  target: string;
  status: StageStatus;
  monitored: boolean;
  reason?: string;
  exitCode?: number;
  errorMessage?: string;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
};

export type RunStagesInput = {
  stages: readonly StageDefinition[];
  gates: GateDecision;
  instance: RunnerHandle;
  targets: BuildTargetRunner;
  signal: AbortSignal;
  clock: Clock;
  logger?: JsonlLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runStages(input: RunStagesInput): Promise<StageResult[]> {
  const { logger } = input;
  const results: StageResult[] = [];
  const statusByStage = new Map<string, StageStatus>();

  for (const stage of input.stages) {
    const skipReason = resolveSkipReason(stage, input, statusByStage);
    const result = skipReason
      ? skippedResult(stage, skipReason)
      : await runStage(stage, input);

    if (result.status === "skipped" && logger) {
      logOrchestratorEvent(logger, "stage.skipped", {
        stage: stage.name,
        reason: result.reason ?? "unknown",
      });
    }

    results.push(result);
    statusByStage.set(stage.name, result.status);
  }

  return results;
}

export function skipAllStages(stages: readonly StageDefinition[], reason: string): StageResult[] {
  return stages.map((stage) => skippedResult(stage, reason));
}

export function summarizeStages(results: readonly StageResult[]): StagesOutcome {
  if (results.some((result) => result.status === "failure")) return "failure";
  if (results.some((result) => result.status === "cancelled")) return "cancelled";
  if (results.some((result) => result.status === "success")) return "success";
  return "skipped";
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveSkipReason(
  stage: StageDefinition,
  input: RunStagesInput,
  statusByStage: Map<string, StageStatus>,
): string | null {
  if (input.signal.aborted) return "cancelled";
  if (!gateFor(input.gates, stage.name).run) return "gate_closed";

  for (const producer of stage.needs) {
    const status = statusByStage.get(producer) ?? "skipped";
    if (status !== "success") return `needs:${producer}:${status}`;
  }

  return null;
}

function skippedResult(stage: StageDefinition, reason: string): StageResult {
  return {
    stage: stage.name,
    target: stage.target,
    status: "skipped",
    monitored: stage.monitored,
    reason,
  };
}

async function runStage(stage: StageDefinition, input: RunStagesInput): Promise<StageResult> {
  const { clock, logger, signal } = input;
  const startedAt = clock.now();

  if (logger) {
    logOrchestratorEvent(logger, "stage.start", {
      stage: stage.name,
      target: stage.target,
      reasons: [...gateFor(input.gates, stage.name).reasons],
    });
  }

  let outcome: TargetRunResult;
  try {
    outcome = await input.targets.runTarget({
      instance: input.instance,
      stage: stage.name,
      target: stage.target,
      env: stage.env,
      timeoutMs: stage.timeoutMs,
      signal,
      logger,
    });
  } catch (err) {
    const failure = new StageExecutionError(
      `Stage ${stage.name} failed to run target ${stage.target}: ${formatErrorMessage(err)}`,
      stage.name,
      err,
    );
    outcome = { success: false, errorMessage: failure.message, cancelled: signal.aborted };
  }

  const finishedAt = clock.now();
  const status = resolveStatus(outcome, signal);
  const result: StageResult = {
    stage: stage.name,
    target: stage.target,
    status,
    monitored: stage.monitored,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };
  if (outcome.exitCode !== undefined) result.exitCode = outcome.exitCode;
  if (outcome.errorMessage) result.errorMessage = outcome.errorMessage;
  if (status === "cancelled") result.reason = "cancelled";

  if (logger) {
    logOrchestratorEvent(logger, "stage.complete", {
      stage: stage.name,
      status,
      exit_code: outcome.exitCode ?? null,
      duration: formatDuration(result.durationMs ?? 0),
      ...(outcome.errorMessage ? { message: outcome.errorMessage } : {}),
    });
  }

  return result;
}

function resolveStatus(outcome: TargetRunResult, signal: AbortSignal): StageStatus {
  if (outcome.success) return "success";
  if (outcome.cancelled || signal.aborted) return "cancelled";
  return "failure";
}
