/**
 * File-backed concurrency registry.
 * Purpose: dedupe runs of one concurrency group across processes on the same host.
 * Assumptions: one lease file per group, only read-modify-written under its `.lock` file
 * (exclusive create); pids identify holders.
 * Usage: new FileConcurrencyRegistry({ paths }).acquire({ runId, group, logger }, signal).
 */

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { RunCancelledError } from "../../../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import { concurrencyLeasePath, type PathsContext } from "../../../core/paths.js";
import { isoNow, readJsonFile, writeJsonFileAtomic } from "../../../core/utils.js";
import type {
  ConcurrencyAcquireResult,
  ConcurrencyLease,
  ConcurrencyRegistry,
  ConcurrencyRequest,
} from "../ports.js";

import { decideConflict, type ConcurrencyGroup } from "./concurrency-group.js";

// =============================================================================
// TYPES
// =============================================================================

const LeaseOwnerSchema = z.object({
  run_id: z.string(),
  pid: z.number().int(),
});

const LeaseHolderSchema = LeaseOwnerSchema.extend({
  branch: z.string(),
  acquired_at: z.string(),
});

const LeaseFileSchema = z.object({
  group: z.string(),
  holder: LeaseHolderSchema.nullable(),
  latest: LeaseOwnerSchema,
  // Set when the latest run asked the holder to stop rather than waiting for it.
  cancel_holder: z.boolean(),
});

const LockFileSchema = z.object({ pid: z.number().int() });

type LeaseFile = z.infer<typeof LeaseFileSchema>;
type LeaseHolder = z.infer<typeof LeaseHolderSchema>;

type Registration =
  | { kind: "acquired" }
  | { kind: "rejected"; holder: LeaseHolder }
  | { kind: "cancel" | "wait"; holder: LeaseHolder };

type WaitStep =
  | { kind: "acquired" }
  | { kind: "superseded"; by: string }
  | { kind: "blocked"; blockedBy: string };

export type FileConcurrencyRegistryOptions = {
  paths: PathsContext;
  pollIntervalMs?: number;
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  signalProcess?: (pid: number, signal: NodeJS.Signals) => void;
};

const DEFAULT_POLL_INTERVAL_MS = 1000;
const LOCK_RETRY_MS = 10;
const LOCK_STALE_MS = 30_000;

// =============================================================================
// REGISTRY
// =============================================================================

export class FileConcurrencyRegistry implements ConcurrencyRegistry {
  private readonly paths: PathsContext;
  private readonly pollIntervalMs: number;
  private readonly pid: number;
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly signalProcess: (pid: number, signal: NodeJS.Signals) => void;

  constructor(opts: FileConcurrencyRegistryOptions) {
    this.paths = opts.paths;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.pid = opts.pid ?? process.pid;
    this.isProcessAlive = opts.isProcessAlive ?? isProcessAlive;
    this.signalProcess = opts.signalProcess ?? ((pid, signal) => process.kill(pid, signal));
  }

  async acquire(request: ConcurrencyRequest, signal: AbortSignal): Promise<ConcurrencyAcquireResult> {
    const { runId, group, logger } = request;
    const leasePath = concurrencyLeasePath(group.key, this.paths);

    const registration = await this.withLock(leasePath, () => this.register(leasePath, runId, group));
    if (registration.kind === "acquired") {
      return this.granted(leasePath, group, runId, logger);
    }

    const { holder } = registration;
    if (registration.kind === "rejected") {
      if (logger) {
        logOrchestratorEvent(logger, "concurrency.rejected", {
          group: group.key,
          blocked_by: holder.run_id,
        });
      }
      return { kind: "rejected", blockedBy: holder.run_id, reason: "protected_branch" };
    }

    if (registration.kind === "cancel") {
      this.cancelHolder(holder.pid, logger);
      if (logger) {
        logOrchestratorEvent(logger, "concurrency.cancelled_previous", {
          group: group.key,
          previous_run_id: holder.run_id,
        });
      }
    } else if (logger) {
      logOrchestratorEvent(logger, "concurrency.waiting", {
        group: group.key,
        blocked_by: holder.run_id,
      });
    }

    const deadline = Date.now() + group.waitTimeoutMs;
    for (;;) {
      const step = await this.withLock(leasePath, () => this.tryTakeOver(leasePath, runId, group));

      if (step.kind === "acquired") {
        return this.granted(leasePath, group, runId, logger);
      }
      if (step.kind === "superseded") {
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.superseded", {
            group: group.key,
            superseded_by: step.by,
          });
        }
        return { kind: "cancelled", reason: "superseded" };
      }

      if (signal.aborted) {
        return { kind: "cancelled", reason: "aborted" };
      }
      if (Date.now() >= deadline) {
        if (logger) {
          logOrchestratorEvent(logger, "concurrency.rejected", {
            group: group.key,
            blocked_by: step.blockedBy,
            reason: "wait_timeout",
          });
        }
        return { kind: "rejected", blockedBy: step.blockedBy, reason: "wait_timeout" };
      }

      await delay(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())), signal);
    }
  }

  // ===========================================================================
  // LEASE FILE (callers hold the lock)
  // ===========================================================================

  private async register(
    leasePath: string,
    runId: string,
    group: ConcurrencyGroup,
  ): Promise<Registration> {
    const holder = (await readLeaseFile(leasePath))?.holder;
    if (!holder || !this.isProcessAlive(holder.pid)) {
      await this.writeHolder(leasePath, runId, group);
      return { kind: "acquired" };
    }

    const decision = decideConflict(group.policy, holder.branch);
    if (decision === "reject") return { kind: "rejected", holder };

    await writeJsonFileAtomic(leasePath, {
      group: group.key,
      holder,
      latest: { run_id: runId, pid: this.pid },
      cancel_holder: decision === "cancel",
    } satisfies LeaseFile);
    return { kind: decision, holder };
  }

  private async tryTakeOver(
    leasePath: string,
    runId: string,
    group: ConcurrencyGroup,
  ): Promise<WaitStep> {
    const current = await readLeaseFile(leasePath);
    if (current && current.latest.run_id !== runId) {
      return { kind: "superseded", by: current.latest.run_id };
    }

    const blocking = current?.holder;
    if (blocking && this.isProcessAlive(blocking.pid)) {
      return { kind: "blocked", blockedBy: blocking.run_id };
    }

    await this.writeHolder(leasePath, runId, group);
    return { kind: "acquired" };
  }

  private async writeHolder(leasePath: string, runId: string, group: ConcurrencyGroup): Promise<void> {
    const me = { run_id: runId, pid: this.pid };
    await writeJsonFileAtomic(leasePath, {
      group: group.key,
      holder: { ...me, branch: group.branch, acquired_at: isoNow() },
      latest: me,
      cancel_holder: false,
    } satisfies LeaseFile);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private granted(
    leasePath: string,
    group: ConcurrencyGroup,
    runId: string,
    logger?: JsonlLogger,
  ): ConcurrencyAcquireResult {
    if (logger) {
      logOrchestratorEvent(logger, "concurrency.acquired", { group: group.key });
    }
    return { kind: "acquired", lease: this.watchLease(leasePath, group.key, runId) };
  }

  private cancelHolder(pid: number, logger?: JsonlLogger): void {
    // Same-process holders notice the cancel_holder flag through their lease watcher.
    if (pid === this.pid) return;
    try {
      this.signalProcess(pid, "SIGTERM");
    } catch (err) {
      if (logger) {
        logOrchestratorEvent(logger, "concurrency.signal_failed", {
          pid,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private watchLease(leasePath: string, groupKey: string, runId: string): ConcurrencyLease {
    const controller = new AbortController();
    let polling = false;

    const timer = setInterval(() => {
      if (polling || controller.signal.aborted) return;
      polling = true;
      void readLeaseFile(leasePath)
        .then((current) => {
          const supersededBy = current ? supersedingRun(current, runId) : undefined;
          if (supersededBy) {
            controller.abort(
              new RunCancelledError(`Run ${runId} superseded by run ${supersededBy}`, "superseded"),
            );
          }
        })
        .finally(() => {
          polling = false;
        });
    }, this.pollIntervalMs);
    timer.unref();

    let released = false;
    return {
      runId,
      groupKey,
      signal: controller.signal,
      release: async () => {
        if (released) return;
        released = true;
        clearInterval(timer);

        await this.withLock(leasePath, async () => {
          const current = await readLeaseFile(leasePath);
          if (!current || current.holder?.run_id !== runId) return;

          if (current.latest.run_id === runId) {
            await fse.remove(leasePath);
            return;
          }
          await writeJsonFileAtomic(leasePath, {
            ...current,
            holder: null,
            cancel_holder: false,
          } satisfies LeaseFile);
        });
      },
    };
  }

  // ===========================================================================
  // LOCK FILE
  // ===========================================================================

  private async withLock<T>(leasePath: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = `${leasePath}.lock`;
    await fse.ensureDir(path.dirname(lockPath));

    const handle = await this.openLock(lockPath);
    try {
      return await fn();
    } finally {
      await handle.close();
      await fse.remove(lockPath);
    }
  }

  private async openLock(lockPath: string): Promise<fs.promises.FileHandle> {
    for (;;) {
      try {
        const handle = await fs.promises.open(lockPath, "wx");
        await handle.writeFile(JSON.stringify({ pid: this.pid, acquired_at: isoNow() }) + "\n", "utf8");
        return handle;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      }

      if (await this.isStaleLock(lockPath)) {
        await fse.remove(lockPath);
        continue;
      }
      await delay(LOCK_RETRY_MS);
    }
  }

  // A lock outlives its critical section only when its owner died inside it.
  private async isStaleLock(lockPath: string): Promise<boolean> {
    let stat: fs.Stats;
    try {
      stat = await fse.stat(lockPath);
    } catch {
      return false;
    }
    if (Date.now() - stat.mtimeMs > LOCK_STALE_MS) return true;

    let raw: unknown;
    try {
      raw = await readJsonFile(lockPath);
    } catch {
      return false;
    }
    const parsed = LockFileSchema.safeParse(raw);
    return parsed.success && !this.isProcessAlive(parsed.data.pid);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

// Missing or unreadable lease files count as "no lease".
export async function readLeaseFile(leasePath: string): Promise<LeaseFile | null> {
  let raw: unknown;
  try {
    raw = await readJsonFile(leasePath);
  } catch {
    return null;
  }
  const parsed = LeaseFileSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// The holder stops once another run owns the lease or the latest run asked it to cancel.
function supersedingRun(lease: LeaseFile, runId: string): string | undefined {
  if (lease.holder?.run_id !== runId) return lease.holder?.run_id ?? lease.latest.run_id;
  if (lease.cancel_holder && lease.latest.run_id !== runId) return lease.latest.run_id;
  return undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoException(err) && err.code === "EPERM";
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
