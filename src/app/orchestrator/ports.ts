/**
 * Orchestrator ports define the boundary between the run engine and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations in `run-context.ts` and inject into RunContext.
 */

import type { JsonlLogger } from "../../core/logger.js";
import type { ChangeDetector } from "../../git/changes.js";

import type { ConcurrencyGroup } from "./concurrency/concurrency-group.js";

// =============================================================================
// RUNNER PLATFORM
// =============================================================================

export type RunnerProfile = {
  name: string;
  image?: string;
  cpus?: number;
  memoryMb?: number;
  gpus: number;
};

export type RunnerStartRequest = {
  runId: string;
  pipeline: string;
  profile: RunnerProfile;
};

export type RunnerHandle = {
  id: string;
  label: string;
  // Directory targets run in, as seen from inside the instance.
  workdir: string;
};

export interface RunnerPlatform {
  readonly kind: string;
  start(request: RunnerStartRequest, signal: AbortSignal): Promise<RunnerHandle>;
  stop(handle: RunnerHandle): Promise<void>;
}

// =============================================================================
// BUILD TARGETS
// =============================================================================

export type TargetRunInput = {
  instance: RunnerHandle;
  stage: string;
  target: string;
  env: Readonly<Record<string, string>>;
  timeoutMs?: number;
  signal: AbortSignal;
  logger?: JsonlLogger;
};

export type TargetRunResult = {
  success: boolean;
  exitCode?: number;
  errorMessage?: string;
  cancelled?: boolean;
  timedOut?: boolean;
};

export interface BuildTargetRunner {
  runTarget(input: TargetRunInput): Promise<TargetRunResult>;
}

// =============================================================================
// CONCURRENCY
// =============================================================================

export type ConcurrencyRequest = {
  runId: string;
  group: ConcurrencyGroup;
  logger?: JsonlLogger;
};

export type ConcurrencyLease = {
  runId: string;
  groupKey: string;
  // Aborts with a RunCancelledError once a newer run in the group supersedes this one.
  signal: AbortSignal;
  release(): Promise<void>;
};

export type ConcurrencyAcquireResult =
  | { kind: "acquired"; lease: ConcurrencyLease }
  | { kind: "rejected"; blockedBy: string; reason: "protected_branch" | "wait_timeout" }
  | { kind: "cancelled"; reason: "superseded" | "aborted" };

export interface ConcurrencyRegistry {
  acquire(request: ConcurrencyRequest, signal: AbortSignal): Promise<ConcurrencyAcquireResult>;
}

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export type NotificationPoint = "stages" | "instance";

export type NotificationMessage = {
  point: NotificationPoint;
  runId: string;
  pipeline: string;
  status: string;
  message: string;
  link?: string;
  failingStages: string[];
};

export interface NotificationSink {
  readonly name: string;
  send(message: NotificationMessage): Promise<void>;
}

// =============================================================================
// MISC
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type OrchestratorPorts = {
  changeDetector: ChangeDetector;
  platform: RunnerPlatform;
  targetRunner: BuildTargetRunner;
  concurrency: ConcurrencyRegistry;
  notificationSinks: NotificationSink[];
  clock: Clock;
};
