/*
Purpose: `stagegate gates` resolves which stages a revision range would run, without running them.
Assumptions: the same fail-open change evaluation as `run`; nothing is provisioned.
Usage: stagegate gates --base origin/main --format github
*/

import fse from "fs-extra";

import { evaluateChangeSet, type ChangeSet } from "../app/orchestrator/gating/change-set.js";
import { gateFor, resolveGates, type GateDecision } from "../app/orchestrator/gating/gate-resolver.js";
import { resolveRevisionRange } from "../app/orchestrator/run-context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { PipelineDefinition } from "../core/pipeline.js";
import { GitChangeDetector } from "../git/changes.js";

import { loadPipelineForCli } from "./config.js";
import { resolveRunInputs, type RunInputFlags } from "./run-inputs.js";

// =============================================================================
// TYPES
// =============================================================================

export type GatesFormat = "table" | "github";

export type GatesCommandOptions = RunInputFlags & {
  config?: string;
  format?: string;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function gatesCommand(opts: GatesCommandOptions): Promise<void> {
  const format = parseGatesFormat(opts.format);
  const { loaded } = loadPipelineForCli({ explicitConfigPath: opts.config });
  const { pipeline, config } = loaded;
  const inputs = resolveRunInputs(opts, process.env);

  const changeSet = await evaluateChangeSet({
    detector: new GitChangeDetector(config.repo_path),
    range: resolveRevisionRange({ base: inputs.base, head: inputs.head }),
    components: pipeline.components,
  });
  const decision = resolveGates({
    changeSet,
    trigger: inputs.trigger,
    stages: pipeline.stages,
    sharedComponent: pipeline.sharedComponent,
  });

  if (format === "table") {
    for (const line of formatGatesTable(pipeline, changeSet, decision)) {
      console.log(line);
    }
    return;
  }

  const lines = formatGithubOutputs(pipeline, decision);
  for (const line of lines) {
    console.log(line);
  }
  const outputFile = process.env.GITHUB_OUTPUT;
  if (outputFile) {
    await fse.appendFile(outputFile, `${lines.join("\n")}\n`);
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatGithubOutputs(pipeline: PipelineDefinition, decision: GateDecision): string[] {
  return [
    ...pipeline.stages.map((stage) => `${stage.name}_test=${gateFor(decision, stage.name).run}`),
    `any_file_changed=${decision.anyChanged}`,
  ];
}

export function formatGatesTable(
  pipeline: PipelineDefinition,
  changeSet: ChangeSet,
  decision: GateDecision,
): string[] {
  const header =
    changeSet.status === "known"
      ? `Changes: ${changeSet.changedFiles.length} file(s)`
      : `Changes: unknown (${changeSet.reason ?? "no reason"}); every gated stage runs`;

  const nameWidth = Math.max("Stage".length, ...pipeline.stages.map((stage) => stage.name.length));
  const rows = pipeline.stages.map((stage) => {
    const gate = gateFor(decision, stage.name);
    const reasons = gate.reasons.length > 0 ? gate.reasons.join(", ") : "-";
    return `${stage.name.padEnd(nameWidth)}  ${(gate.run ? "run" : "skip").padEnd(4)}  ${reasons}`;
  });

  return [
    header,
    `Any relevant change: ${decision.anyChanged ? "yes" : "no"}`,
    "",
    `${"Stage".padEnd(nameWidth)}  ${"Gate".padEnd(4)}  Reasons`,
    ...rows,
  ];
}

function parseGatesFormat(value: string | undefined): GatesFormat {
  if (value === undefined || value === "table") return "table";
  if (value === "github") return "github";
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.run,
    title: "Unknown output format.",
    message: `Gates format "${value}" is not one of: table, github.`,
  });
}
