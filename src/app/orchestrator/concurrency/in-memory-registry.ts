/**
 * In-process concurrency registry.
 * Purpose: dedupe runs of one concurrency group inside a single process.
 * Assumptions: the newest arrival is always the group's latest run; older waiters drop out.
 * Usage: const result = await registry.acquire({ runId, group, logger }, signal);
 */

import { RunCancelledError } from "../../../core/errors.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import type {
  ConcurrencyAcquireResult,
  ConcurrencyLease,
  ConcurrencyRegistry,
  ConcurrencyRequest,
} from "../ports.js";

import { decideConflict } from "./concurrency-group.js";

// =============================================================================
// TYPES
// =============================================================================

type Holder = {
  runId: string;
  branch: string;
  controller: AbortController;
};

type GroupEntry = {
  holder?: Holder;
  latestRunId?: string;
  listeners: Set<() => void>;
};

type WaitOutcome = "changed" | "aborted" | "timeout";

// =============================================================================
// REGISTRY
// =============================================================================

export class InMemoryConcurrencyRegistry implements ConcurrencyRegistry {
  private readonly groups = new Map<string, GroupEntry>();

  async acquire(request: ConcurrencyRequest, signal: AbortSignal): Promise<ConcurrencyAcquireResult> {
    const { runId, group, logger } = request;
    const entry = this.entryFor(group.key);

    const holder = entry.holder;
    if (holder) {
      const decision = decideConflict(group.policy, holder.branch);
      if (decision === "reject") {
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.rejected", {
            group: group.key,
            blocked_by: holder.runId,
          });
        }
        return { kind: "rejected", blockedBy: holder.runId, reason: "protected_branch" };
      }

      entry.latestRunId = runId;
      if (decision === "cancel") {
        holder.controller.abort(
          new RunCancelledError(`Run ${holder.runId} superseded by run ${runId}`, "superseded"),
        );
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.cancelled_previous", {
            group: group.key,
            previous_run_id: holder.runId,
          });
        }
      } else if (logger) {
        logOrchestratorEvent(logger, "concurrency.waiting", {
          group: group.key,
          blocked_by: holder.runId,
        });
      }
      this.notify(entry);
    } else {
      entry.latestRunId = runId;
    }

    const deadline = Date.now() + group.waitTimeoutMs;
    for (;;) {
      if (entry.latestRunId !== runId) {
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.superseded", {
            group: group.key,
            superseded_by: entry.latestRunId ?? null,
          });
        }
        return { kind: "cancelled", reason: "superseded" };
      }

      const current = entry.holder;
      if (!current) {
        const lease = this.grant(group.key, entry, { runId, branch: group.branch });
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.acquired", { group: group.key });
        }
        return { kind: "acquired", lease };
      }

      const outcome = await this.waitForChange(entry, signal, deadline);
      if (outcome === "aborted") {
        return { kind: "cancelled", reason: "aborted" };
      }
      if (outcome === "timeout") {
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.rejected", {
            group: group.key,
            blocked_by: current.runId,
            reason: "wait_timeout",
          });
        }
        return { kind: "rejected", blockedBy: current.runId, reason: "wait_timeout" };
      }
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private entryFor(key: string): GroupEntry {
    let entry = this.groups.get(key);
    if (!entry) {
      entry = { listeners: new Set() };
      this.groups.set(key, entry);
    }
    return entry;
  }

  private grant(
    key: string,
    entry: GroupEntry,
    run: { runId: string; branch: string },
  ): ConcurrencyLease {
    const { runId } = run;
    const controller = new AbortController();
    const holder: Holder = { ...run, controller };
    entry.holder = holder;

    let released = false;
    return {
      runId,
      groupKey: key,
      signal: controller.signal,
      release: async () => {
        if (released) return;
        released = true;
        if (entry.holder === holder) {
          entry.holder = undefined;
        }
        if (!entry.holder && entry.latestRunId === runId) {
          this.groups.delete(key);
        }
        this.notify(entry);
      },
    };
  }

  private notify(entry: GroupEntry): void {
    for (const listener of [...entry.listeners]) {
      listener();
    }
  }

  private waitForChange(
    entry: GroupEntry,
    signal: AbortSignal,
    deadline: number,
  ): Promise<WaitOutcome> {
    if (signal.aborted) return Promise.resolve("aborted");

    return new Promise<WaitOutcome>((resolve) => {
      const finish = (outcome: WaitOutcome): void => {
        entry.listeners.delete(onChange);
        signal.removeEventListener("abort", onAbort);
        clearTimeout(timer);
        resolve(outcome);
      };
      const onChange = (): void => finish("changed");
      const onAbort = (): void => finish("aborted");
      const timer = setTimeout(() => finish("timeout"), Math.max(0, deadline - Date.now()));

      entry.listeners.add(onChange);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
