/**
 * Gate resolution.
 * Purpose: turn a change set + trigger kind into per-stage run decisions.
 * Assumptions: unknown or missing component data always opens the gate; stages arrive in execution order.
 * Usage: resolveGates({ changeSet, trigger, stages, sharedComponent }).
 */

import type { StageDefinition } from "../../../core/pipeline.js";

import { isChangedOrUnknown, type ChangeSet } from "./change-set.js";

// =============================================================================
// TYPES
// =============================================================================

export const TRIGGER_KINDS = ["pull-request", "manual", "push", "schedule"] as const;

export type TriggerKind = (typeof TRIGGER_KINDS)[number];

export type StageGate = {
  readonly run: boolean;
  readonly reasons: readonly string[];
};

export type GateDecision = {
  readonly stages: Readonly<Record<string, StageGate>>;
  // False only when nothing relevant changed; the run then skips provisioning entirely.
  readonly anyChanged: boolean;
};

export type ResolveGatesInput = {
  changeSet: ChangeSet;
  trigger: TriggerKind;
  stages: readonly StageDefinition[];
  sharedComponent?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function isChangeGated(trigger: TriggerKind): boolean {
  return trigger === "pull-request";
}

export function resolveGates(input: ResolveGatesInput): GateDecision {
  const { changeSet, trigger, sharedComponent } = input;
  const gated = isChangeGated(trigger);

  const reasonsByStage = new Map<string, string[]>();
  for (const stage of input.stages) {
    reasonsByStage.set(
      stage.name,
      collectGateReasons({ stage, changeSet, trigger, gated, sharedComponent }),
    );
  }
  if (gated) openProducersOfOpenStages(input.stages, reasonsByStage);

  const stages: Record<string, StageGate> = {};
  for (const [name, reasons] of reasonsByStage) {
    stages[name] = Object.freeze({ run: reasons.length > 0, reasons: Object.freeze(reasons) });
  }

  const anyChanged =
    !gated ||
    changeSet.status === "unknown" ||
    Object.values(changeSet.components).some((flag) => flag !== "unchanged");

  return Object.freeze({ stages: Object.freeze(stages), anyChanged });
}

export function gateFor(decision: GateDecision, stageName: string): StageGate {
  return decision.stages[stageName] ?? { run: true, reasons: ["gate_missing"] };
}

// =============================================================================
// INTERNALS
// =============================================================================

// A producer (e.g. a key cache) runs whenever any of its consumers does.
// Walking consumers before producers carries this through chains of needs.
function openProducersOfOpenStages(
  stages: readonly StageDefinition[],
  reasonsByStage: Map<string, string[]>,
): void {
  for (const stage of [...stages].reverse()) {
    if ((reasonsByStage.get(stage.name) ?? []).length === 0) continue;
    for (const producer of stage.needs) {
      reasonsByStage.get(producer)?.push(`consumer:${stage.name}`);
    }
  }
}

function collectGateReasons(input: {
  stage: StageDefinition;
  changeSet: ChangeSet;
  trigger: TriggerKind;
  gated: boolean;
  sharedComponent?: string;
}): string[] {
  const { stage, changeSet } = input;

  if (!input.gated) {
    return [`trigger:${input.trigger}`];
  }

  const reasons: string[] = [];
  if (stage.alwaysRun) {
    reasons.push("always_run");
  }

  for (const component of stage.components) {
    if (!isChangedOrUnknown(changeSet, component)) continue;
    reasons.push(
      changeSet.components[component] === "changed"
        ? `component:${component}`
        : `component_unknown:${component}`,
    );
  }

  const shared = input.sharedComponent;
  if (shared && stage.sharedDependencies && isChangedOrUnknown(changeSet, shared)) {
    reasons.push(`shared:${shared}`);
  }

  return reasons;
}
