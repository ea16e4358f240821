/*
Run outcome rules.
A cancelled run is cancelled regardless of partial results; otherwise the worst part wins.
*/

import type { StagesOutcome } from "../stages/stage-runner.js";

export type RunOutcome = "success" | "failure" | "cancelled" | "skipped";

export type InstanceOutcome = "success" | "failure" | "skipped";

const SEVERITY: Record<StagesOutcome | InstanceOutcome, number> = {
  skipped: 0,
  success: 1,
  // Only reachable without run cancellation when a target reported itself cancelled.
  cancelled: 2,
  failure: 3,
};

export function combineOutcome(input: {
  cancelled: boolean;
  stages: StagesOutcome;
  instance: InstanceOutcome;
}): RunOutcome {
  if (input.cancelled) return "cancelled";

  const worst = SEVERITY[input.stages] >= SEVERITY[input.instance] ? input.stages : input.instance;
  return worst === "cancelled" ? "failure" : worst;
}

export function exitCodeForOutcome(outcome: RunOutcome): number {
  switch (outcome) {
    case "success":
    case "skipped":
      return 0;
    case "cancelled":
      return 130;
    case "failure":
      return 1;
  }
}
