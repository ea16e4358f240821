/**
 * Runner instance lifecycle.
 * Purpose: provision, claim and tear down the one ephemeral instance a run uses.
 * Assumptions: every transition is recorded in the instance trace and the run log.
 * Usage: const instance = await lifecycle.provision(profile, signal); ... await lifecycle.teardown(instance);
 */

import {
  OrchestratorError,
  ProvisioningError,
  RunCancelledError,
  TeardownError,
} from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import { combineAbortSignals, toCancelledError } from "../helpers/abort.js";
import type {
  Clock,
  RunnerHandle,
  RunnerPlatform,
  RunnerProfile,
  RunnerStartRequest,
} from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstanceState = "requested" | "ready" | "in-use" | "tearing-down" | "stopped" | "failed";

export type InstanceTransition = {
  from: InstanceState | null;
  to: InstanceState;
  at: string;
  detail?: string;
};

export type RunnerInstance = {
  id: string;
  profile: string;
  platform: string;
  handle?: RunnerHandle;
  state: InstanceState;
  trace: InstanceTransition[];
};

export type InstanceLifecycleOptions = {
  platform: RunnerPlatform;
  clock: Clock;
  runId: string;
  pipeline: string;
  provisionTimeoutMs: number;
  // How long the run waits for stops of late-starting instances before leaving them behind.
  orphanStopGraceMs?: number;
  logger?: JsonlLogger;
};

const DEFAULT_ORPHAN_STOP_GRACE_MS = 30_000;

const ALLOWED_TRANSITIONS: Record<InstanceState, readonly InstanceState[]> = {
  requested: ["ready", "failed"],
  ready: ["in-use", "tearing-down"],
  "in-use": ["tearing-down"],
  "tearing-down": ["stopped", "failed"],
  stopped: [],
  failed: [],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function canTransition(from: InstanceState, to: InstanceState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export class InstanceLifecycleManager {
  private readonly platform: RunnerPlatform;
  private readonly clock: Clock;
  private readonly runId: string;
  private readonly pipeline: string;
  private readonly provisionTimeoutMs: number;
  private readonly orphanStopGraceMs: number;
  private readonly logger?: JsonlLogger;
  private readonly orphanStops: Array<Promise<void>> = [];
  private latest?: RunnerInstance;

  constructor(opts: InstanceLifecycleOptions) {
    this.platform = opts.platform;
    this.clock = opts.clock;
    this.runId = opts.runId;
    this.pipeline = opts.pipeline;
    this.provisionTimeoutMs = opts.provisionTimeoutMs;
    this.orphanStopGraceMs = opts.orphanStopGraceMs ?? DEFAULT_ORPHAN_STOP_GRACE_MS;
    this.logger = opts.logger;
  }

  // Throws ProvisioningError (start failed or timed out) or RunCancelledError.
  // Either way the instance ends "failed" and needs no teardown.
  async provision(profile: RunnerProfile, signal: AbortSignal): Promise<RunnerInstance> {
    const instance: RunnerInstance = {
      id: `${this.runId}-${profile.name}`,
      profile: profile.name,
      platform: this.platform.kind,
      state: "requested",
      trace: [],
    };
    this.latest = instance;
    this.record(instance, null, "requested");

    const request: RunnerStartRequest = { runId: this.runId, pipeline: this.pipeline, profile };
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(
        new ProvisioningError(
          `Provisioning timed out after ${Math.round(this.provisionTimeoutMs / 1000)}s`,
          profile.name,
        ),
      );
    }, this.provisionTimeoutMs);
    const startSignal = combineAbortSignals(signal, deadline.signal);

    const start = this.platform.start(request, startSignal);
    try {
      const handle = await raceStart(start, startSignal);
      instance.handle = handle;
      this.transition(instance, "ready", handle.label);
      return instance;
    } catch (err) {
      let failure: ProvisioningError | RunCancelledError;
      if (startSignal.aborted) {
        this.stopOrphan(start, instance);
        failure = abortFailure(startSignal.reason);
      } else {
        failure =
          err instanceof ProvisioningError
            ? err
            : new ProvisioningError(
                `Provisioning failed: ${formatErrorMessage(err)}`,
                profile.name,
                err,
              );
      }
      this.transition(instance, "failed", formatErrorMessage(failure));
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  // The most recently requested instance, including one whose provisioning failed.
  currentInstance(): RunnerInstance | undefined {
    return this.latest;
  }

  claim(instance: RunnerInstance): void {
    this.transition(instance, "in-use");
  }

  async teardown(instance: RunnerInstance): Promise<void> {
    if (instance.state === "stopped") return;

    const handle = instance.handle;
    if (!handle) {
      throw new TeardownError(`Instance ${instance.id} has no handle to stop`, instance.id);
    }

    this.transition(instance, "tearing-down");
    try {
      await this.platform.stop(handle);
    } catch (err) {
      this.transition(instance, "failed", formatErrorMessage(err));
      throw new TeardownError(
        `Failed to stop instance ${handle.label}: ${formatErrorMessage(err)}`,
        handle.id,
        err,
      );
    }
    this.transition(instance, "stopped");
  }

  // Waits for background stops of late-starting instances, at most orphanStopGraceMs.
  // A start that never settles leaves its stop pending; the run does not wait for it.
  async drainOrphans(): Promise<"drained" | "pending"> {
    if (this.orphanStops.length === 0) return "drained";

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"pending">((resolve) => {
      timer = setTimeout(() => resolve("pending"), this.orphanStopGraceMs);
    });
    const stops = Promise.all(this.orphanStops).then(() => "drained" as const);

    try {
      const result = await Promise.race([stops, grace]);
      if (result === "pending" && this.logger) {
        logOrchestratorEvent(this.logger, "instance.orphan_stop", {
          instance_id: this.latest?.id ?? null,
          status: "pending",
          grace_ms: this.orphanStopGraceMs,
        });
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private transition(instance: RunnerInstance, to: InstanceState, detail?: string): void {
    const from = instance.state;
    if (!canTransition(from, to)) {
      throw new OrchestratorError(`Invalid instance transition ${from} -> ${to} for ${instance.id}`);
    }
    instance.state = to;
    this.record(instance, from, to, detail);
  }

  private record(
    instance: RunnerInstance,
    from: InstanceState | null,
    to: InstanceState,
    detail?: string,
  ): void {
    const entry: InstanceTransition = { from, to, at: this.clock.isoNow() };
    if (detail !== undefined) entry.detail = detail;
    instance.trace.push(entry);

    if (this.logger) {
      logOrchestratorEvent(this.logger, "instance.transition", {
        instance_id: instance.id,
        from,
        to,
        ...(detail !== undefined ? { detail } : {}),
      });
    }
  }

  private stopOrphan(start: Promise<RunnerHandle>, instance: RunnerInstance): void {
    const logger = this.logger;
    const stop = start.then(
      async (handle) => {
        try {
          await this.platform.stop(handle);
          if (logger) {
            logOrchestratorEvent(logger, "instance.orphan_stop", {
              instance_id: instance.id,
              handle: handle.label,
              status: "stopped",
            });
          }
        } catch (err) {
          if (logger) {
            logOrchestratorEvent(logger, "instance.orphan_stop", {
              instance_id: instance.id,
              handle: handle.label,
              status: "failed",
              message: formatErrorMessage(err),
            });
          }
        }
      },
      // A start that never produced a handle has nothing to stop.
      () => undefined,
    );
    this.orphanStops.push(stop);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function raceStart(start: Promise<RunnerHandle>, signal: AbortSignal): Promise<RunnerHandle> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<RunnerHandle>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    start.then(
      (handle) => {
        signal.removeEventListener("abort", onAbort);
        resolve(handle);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

// The deadline aborts with a ProvisioningError; anything else is the run being cancelled.
function abortFailure(reason: unknown): ProvisioningError | RunCancelledError {
  if (reason instanceof ProvisioningError) return reason;
  return toCancelledError(reason);
}
