/**
 * Concurrency group resolution.
 * Purpose: derive the dedupe key and branch for a run, and decide what a conflicting run does.
 * Assumptions: two runs conflict only when their group keys are equal.
 * Usage: const group = resolveConcurrencyGroup({ config, workflow, ref });
 */

import type { ConcurrencyConfig } from "../../../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type CancellationPolicy =
  | { mode: "cancel-in-progress" }
  | {
      mode: "protect-branches";
      protectedBranches: readonly string[];
      onProtected: "wait" | "reject";
    };

export type ConcurrencyGroup = {
  key: string;
  branch: string;
  policy: CancellationPolicy;
  waitTimeoutMs: number;
};

export type ConflictDecision = "cancel" | "wait" | "reject";

export type ResolveConcurrencyGroupInput = {
  config: ConcurrencyConfig;
  workflow: string;
  ref: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConcurrencyGroup(input: ResolveConcurrencyGroupInput): ConcurrencyGroup {
  const { config, workflow, ref } = input;
  const key = config.group.replace(/\{(workflow|ref)\}/g, (_match, name: string) =>
    name === "workflow" ? workflow : ref,
  );

  return {
    key,
    branch: branchFromRef(ref),
    policy: toCancellationPolicy(config),
    waitTimeoutMs: config.wait_timeout_seconds * 1000,
  };
}

export function branchFromRef(ref: string): string {
  const heads = /^refs\/heads\/(.+)$/.exec(ref);
  if (heads) return heads[1];

  const pull = /^refs\/pull\/(\d+)\/(merge|head)$/.exec(ref);
  if (pull) return `pull/${pull[1]}`;

  const tags = /^refs\/tags\/(.+)$/.exec(ref);
  if (tags) return tags[1];

  return ref;
}

// Protection follows the in-flight run: a group key need not include the ref.
export function decideConflict(policy: CancellationPolicy, inFlightBranch: string): ConflictDecision {
  if (policy.mode === "cancel-in-progress") return "cancel";
  return policy.protectedBranches.includes(inFlightBranch) ? policy.onProtected : "cancel";
}

// =============================================================================
// INTERNALS
// =============================================================================

function toCancellationPolicy(config: ConcurrencyConfig): CancellationPolicy {
  if (config.policy === "cancel-in-progress") {
    return { mode: "cancel-in-progress" };
  }
  return {
    mode: "protect-branches",
    protectedBranches: [...config.protected_branches],
    onProtected: config.on_protected,
  };
}
