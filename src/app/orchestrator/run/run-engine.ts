/**
 * RunEngine orchestrates one pipeline run end to end.
 * Purpose: lease -> changes -> gates -> provision -> stages -> teardown -> notify -> report.
 * Assumptions: once an instance is provisioned, teardown runs on every exit path.
 * Usage: const result = await runPipeline(context, { signal });
 */

import { ProvisioningError, RunCancelledError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import { writeRunReport, type RunReport } from "../../../core/run-report.js";
import { evaluateChangeSet, type ChangeSet } from "../gating/change-set.js";
import { resolveGates, type GateDecision } from "../gating/gate-resolver.js";
import { combineAbortSignals, normalizeAbortReason } from "../helpers/abort.js";
import { formatDuration } from "../helpers/time.js";
import { InstanceLifecycleManager, type RunnerInstance } from "../instances/instance-lifecycle.js";
import { FailureNotifier } from "../notify/failure-notifier.js";
import type { ConcurrencyAcquireResult } from "../ports.js";
import type { RunContext } from "../run-context.js";
import {
  runStages,
  skipAllStages,
  summarizeStages,
  type StageResult,
  type StagesOutcome,
} from "../stages/stage-runner.js";

import { combineOutcome, type InstanceOutcome, type RunOutcome } from "./run-outcome.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPipelineOptions = {
  signal?: AbortSignal;
};

export type RunResult = {
  runId: string;
  outcome: RunOutcome;
  report: RunReport;
  reportPath: string;
};

type RunState = {
  startedAt: string;
  startedMs: number;
  concurrency: ConcurrencyAcquireResult | null;
  changeSet: ChangeSet | null;
  gates: GateDecision | null;
  stages: StageResult[];
  stageError: boolean;
  instance: RunnerInstance | null;
  instanceOutcome: InstanceOutcome;
  cancelled: boolean;
  cancelReason?: string;
  errors: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipeline(
  context: RunContext,
  options: RunPipelineOptions = {},
): Promise<RunResult> {
  const { ports, logger, pipeline, runId } = context;
  const external = options.signal ?? new AbortController().signal;
  const notifier = new FailureNotifier({
    sinks: context.notify ? ports.notificationSinks : [],
    pipeline: pipeline.name,
    runId,
    link: context.link,
    logger,
  });

  const state: RunState = {
    startedAt: ports.clock.isoNow(),
    startedMs: ports.clock.now().getTime(),
    concurrency: null,
    changeSet: null,
    gates: null,
    stages: [],
    stageError: false,
    instance: null,
    instanceOutcome: "skipped",
    cancelled: false,
    errors: [],
  };

  logOrchestratorEvent(logger, "run.start", {
    pipeline: pipeline.name,
    trigger: context.trigger,
    ref: context.ref,
    group: context.group.key,
    ...(context.range.kind === "range"
      ? { base: context.range.base, head: context.range.head }
      : { full_history_reason: context.range.reason }),
  });

  const acquired = await ports.concurrency.acquire(
    { runId, group: context.group, logger },
    external,
  );
  state.concurrency = acquired;

  if (acquired.kind !== "acquired") {
    state.cancelled = true;
    state.cancelReason = acquired.kind === "rejected" ? "rejected" : acquired.reason;
    state.stages = skipAllStages(pipeline.stages, state.cancelReason);
  } else {
    const lease = acquired.lease;
    const runSignal = combineAbortSignals(external, lease.signal);
    try {
      await executeLeasedRun(context, state, notifier, runSignal);
    } finally {
      await lease.release();
    }
    if (runSignal.aborted) {
      state.cancelled = true;
      state.cancelReason = normalizeAbortReason(runSignal.reason) ?? "aborted";
    }
  }

  const stagesOutcome: StagesOutcome = state.stageError ? "failure" : summarizeStages(state.stages);
  await notifier.notifyStages(stagesOutcome, state.stages);

  const outcome = combineOutcome({
    cancelled: state.cancelled,
    stages: stagesOutcome,
    instance: state.instanceOutcome,
  });

  const report = buildReport(context, state, {
    stages: stagesOutcome,
    overall: outcome,
    notifications: notifier,
  });
  const reportPath = await writeRunReport(report, context.paths);

  logOrchestratorEvent(logger, "run.complete", {
    outcome,
    stages_outcome: stagesOutcome,
    instance_outcome: state.instanceOutcome,
    duration: formatDuration(ports.clock.now().getTime() - state.startedMs),
    report: reportPath,
    ...(state.cancelReason ? { cancel_reason: state.cancelReason } : {}),
  });

  return { runId, outcome, report, reportPath };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function executeLeasedRun(
  context: RunContext,
  state: RunState,
  notifier: FailureNotifier,
  signal: AbortSignal,
): Promise<void> {
  const { ports, logger, pipeline } = context;

  const changeSet = await evaluateChangeSet({
    detector: ports.changeDetector,
    range: context.range,
    components: pipeline.components,
    logger,
  });
  const gates = resolveGates({
    changeSet,
    trigger: context.trigger,
    stages: pipeline.stages,
    sharedComponent: pipeline.sharedComponent,
  });
  state.changeSet = changeSet;
  state.gates = gates;

  logOrchestratorEvent(logger, "gates.resolved", {
    any_changed: gates.anyChanged,
    open: pipeline.stages.filter((stage) => gates.stages[stage.name]?.run).map((stage) => stage.name),
  });

  if (signal.aborted) {
    state.stages = skipAllStages(pipeline.stages, "cancelled");
    return;
  }
  if (!gates.anyChanged) {
    state.stages = skipAllStages(pipeline.stages, "no_relevant_changes");
    return;
  }
  if (context.approval && !context.approval.granted) {
    logOrchestratorEvent(logger, "approval.pending", { label: context.approval.label });
    state.stages = skipAllStages(pipeline.stages, "awaiting_approval");
    return;
  }

  const lifecycle = new InstanceLifecycleManager({
    platform: ports.platform,
    clock: ports.clock,
    runId: context.runId,
    pipeline: pipeline.name,
    provisionTimeoutMs: context.provisionTimeoutMs,
    orphanStopGraceMs: context.orphanStopGraceMs,
    logger,
  });

  let instance: RunnerInstance;
  try {
    instance = await lifecycle.provision(context.profile, signal);
  } catch (err) {
    state.instance = lifecycle.currentInstance() ?? null;
    await lifecycle.drainOrphans();
    if (err instanceof RunCancelledError) {
      state.stages = skipAllStages(pipeline.stages, "cancelled");
      return;
    }
    state.instanceOutcome = "failure";
    state.errors.push(formatErrorMessage(err));
    state.stages = skipAllStages(pipeline.stages, "provisioning_failed");
    await notifier.notifyInstance("provisioning", err);
    return;
  }
  state.instance = instance;

  try {
    lifecycle.claim(instance);
    state.stages = await runStages({
      stages: pipeline.stages,
      gates,
      instance: requireHandle(instance),
      targets: ports.targetRunner,
      signal,
      clock: ports.clock,
      logger,
    });
  } catch (err) {
    state.stageError = true;
    state.errors.push(formatErrorMessage(err));
    logOrchestratorEvent(logger, "stages.error", { message: formatErrorMessage(err) });
  } finally {
    try {
      await lifecycle.teardown(instance);
      state.instanceOutcome = "success";
    } catch (err) {
      state.instanceOutcome = "failure";
      state.errors.push(formatErrorMessage(err));
      await notifier.notifyInstance("teardown", err);
    }
  }
}

function requireHandle(instance: RunnerInstance): NonNullable<RunnerInstance["handle"]> {
  if (!instance.handle) {
    throw new ProvisioningError(`Instance ${instance.id} is ready without a handle`, instance.profile);
  }
  return instance.handle;
}

function buildReport(
  context: RunContext,
  state: RunState,
  outcomes: { stages: StagesOutcome; overall: RunOutcome; notifications: FailureNotifier },
): RunReport {
  const { range } = context;
  const acquired = state.concurrency;

  return {
    run_id: context.runId,
    pipeline: context.pipeline.name,
    trigger: context.trigger,
    ref: context.ref,
    range:
      range.kind === "range"
        ? { base: range.base, head: range.head }
        : { full_history_reason: range.reason },
    link: context.link,
    started_at: state.startedAt,
    finished_at: context.ports.clock.isoNow(),
    concurrency: {
      group: context.group.key,
      result: acquired?.kind ?? "cancelled",
      ...(acquired?.kind === "rejected"
        ? { blocked_by: acquired.blockedBy, reason: acquired.reason }
        : {}),
      ...(acquired?.kind === "cancelled" ? { reason: acquired.reason } : {}),
    },
    changes: state.changeSet
      ? {
          status: state.changeSet.status,
          reason: state.changeSet.reason,
          changed_files: [...state.changeSet.changedFiles],
          components: { ...state.changeSet.components },
        }
      : null,
    gates: state.gates
      ? {
          any_changed: state.gates.anyChanged,
          stages: Object.fromEntries(
            Object.entries(state.gates.stages).map(([name, gate]) => [
              name,
              { run: gate.run, reasons: [...gate.reasons] },
            ]),
          ),
        }
      : null,
    stages: state.stages.map((result) => ({
      stage: result.stage,
      target: result.target,
      status: result.status,
      monitored: result.monitored,
      reason: result.reason,
      exit_code: result.exitCode,
      error: result.errorMessage,
      started_at: result.startedAt,
      finished_at: result.finishedAt,
      duration_ms: result.durationMs,
    })),
    instance: state.instance
      ? {
          id: state.instance.id,
          profile: state.instance.profile,
          platform: state.instance.platform,
          handle: state.instance.handle?.label,
          state: state.instance.state,
          trace: state.instance.trace.map((entry) => ({ ...entry })),
        }
      : null,
    notifications: outcomes.notifications.records.map((record) => ({ ...record })),
    outcome: {
      stages: outcomes.stages,
      instance: state.instanceOutcome,
      overall: outcomes.overall,
      cancel_reason: state.cancelReason,
    },
    errors: state.errors,
  };
}
