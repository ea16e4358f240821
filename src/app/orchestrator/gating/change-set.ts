/**
 * Change-set evaluation.
 * Purpose: decide, per component, whether a revision range touched any of its paths.
 * Assumptions: an inconclusive diff is never reported as "unchanged" (fail open).
 * Usage: await evaluateChangeSet({ detector, range, components, logger }).
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { ComponentDefinition } from "../../../core/pipeline.js";
import type { ChangeDetector, RevisionRange } from "../../../git/changes.js";

import { selectComponentFiles } from "./path-matcher.js";

// =============================================================================
// TYPES
// =============================================================================

export type ChangeFlag = "changed" | "unchanged" | "unknown";

export type ChangeSet = {
  readonly status: "known" | "unknown";
  readonly reason?: string;
  readonly changedFiles: readonly string[];
  readonly components: Readonly<Record<string, ChangeFlag>>;
};

export type EvaluateChangeSetInput = {
  detector: ChangeDetector;
  range: RevisionRange;
  components: readonly ComponentDefinition[];
  logger?: JsonlLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function computeChangeSet(
  changedFiles: readonly string[],
  components: readonly ComponentDefinition[],
): ChangeSet {
  const flags: Record<string, ChangeFlag> = {};
  for (const component of components) {
    flags[component.name] =
      selectComponentFiles(changedFiles, component).length > 0 ? "changed" : "unchanged";
  }

  const changeSet: ChangeSet = {
    status: "known",
    changedFiles: Object.freeze([...changedFiles]),
    components: Object.freeze(flags),
  };
  return Object.freeze(changeSet);
}

export function unknownChangeSet(
  components: readonly ComponentDefinition[],
  reason: string,
): ChangeSet {
  const flags: Record<string, ChangeFlag> = {};
  for (const component of components) {
    flags[component.name] = "unknown";
  }

  const changeSet: ChangeSet = {
    status: "unknown",
    reason,
    changedFiles: Object.freeze([]),
    components: Object.freeze(flags),
  };
  return Object.freeze(changeSet);
}

export async function evaluateChangeSet(input: EvaluateChangeSetInput): Promise<ChangeSet> {
  const { range, components, logger } = input;

  if (range.kind === "full-history") {
    if (logger) {
      logOrchestratorEvent(logger, "changes.unknown", { reason: range.reason });
    }
    return unknownChangeSet(components, range.reason);
  }

  let changedFiles: string[];
  try {
    changedFiles = await input.detector.listChangedFiles(range);
  } catch (err) {
    const reason = formatErrorMessage(err);
    if (logger) {
      logOrchestratorEvent(logger, "changes.unknown", {
        base: range.base,
        head: range.head,
        reason,
      });
    }
    return unknownChangeSet(components, reason);
  }

  const changeSet = computeChangeSet(changedFiles, components);
  if (logger) {
    logOrchestratorEvent(logger, "changes.detected", {
      base: range.base,
      head: range.head,
      files: changedFiles.length,
      components: { ...changeSet.components },
    });
  }
  return changeSet;
}

export function isChangedOrUnknown(changeSet: ChangeSet, component: string): boolean {
  // A component missing from the change set was never evaluated; treat it like unknown.
  return (changeSet.components[component] ?? "unknown") !== "unchanged";
}
