/*
Pipeline definition built from a validated config.
Purpose: give the orchestrator immutable component + stage definitions in execution order.
Assumptions: the config already passed schema validation; reference checks happen here.
*/

import type { PipelineConfig, StageConfig } from "./config.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ComponentDefinition = {
  readonly name: string;
  readonly include: readonly string[];
  readonly exclude: readonly string[];
};

export type StageDefinition = {
  readonly name: string;
  readonly target: string;
  readonly components: readonly string[];
  readonly sharedDependencies: boolean;
  readonly alwaysRun: boolean;
  readonly needs: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly timeoutMs?: number;
  readonly monitored: boolean;
};

export type PipelineDefinition = {
  readonly name: string;
  readonly workflow: string;
  readonly sharedComponent?: string;
  readonly components: readonly ComponentDefinition[];
  // Topological order: every stage appears after the stages it needs.
  readonly stages: readonly StageDefinition[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildPipelineDefinition(config: PipelineConfig): PipelineDefinition {
  const components = Object.entries(config.components).map(([name, globs]) =>
    toComponentDefinition(name, globs),
  );
  const componentNames = new Set(components.map((component) => component.name));

  if (config.shared_component && !componentNames.has(config.shared_component)) {
    throw new ConfigError(
      `shared_component "${config.shared_component}" is not declared under components.`,
    );
  }

  assertUniqueStageNames(config.stages);
  const stages = config.stages.map(toStageDefinition);

  for (const stage of stages) {
    const unknown = stage.components.filter((name) => !componentNames.has(name));
    if (unknown.length > 0) {
      throw new ConfigError(
        `Stage "${stage.name}" references unknown components: ${unknown.join(", ")}`,
      );
    }
  }

  const instanceProfile = config.instance.profile;
  if (config.instance.platform === "docker" && !config.instance.profiles[instanceProfile]) {
    throw new ConfigError(
      `instance.profile "${instanceProfile}" has no entry under instance.profiles.`,
    );
  }

  return deepFreeze({
    name: config.name,
    workflow: config.workflow ?? config.name,
    sharedComponent: config.shared_component,
    components,
    stages: orderStages(stages),
  });
}

// Kahn's algorithm; ties keep declared order so independent stages run as authored.
export function orderStages(stages: readonly StageDefinition[]): StageDefinition[] {
  const byName = new Map(stages.map((stage) => [stage.name, stage]));

  for (const stage of stages) {
    const unknown = stage.needs.filter((name) => !byName.has(name));
    if (unknown.length > 0) {
      throw new ConfigError(`Stage "${stage.name}" needs unknown stages: ${unknown.join(", ")}`);
    }
  }

  const ordered: StageDefinition[] = [];
  const placed = new Set<string>();
  let remaining = [...stages];

  while (remaining.length > 0) {
    const ready = remaining.find((stage) => stage.needs.every((need) => placed.has(need)));
    if (!ready) {
      throw new ConfigError(`Stage dependency cycle: ${describeCycle(remaining)}`);
    }

    ordered.push(ready);
    placed.add(ready.name);
    remaining = remaining.filter((stage) => stage !== ready);
  }

  return ordered;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toComponentDefinition(name: string, globs: string[]): ComponentDefinition {
  const include: string[] = [];
  const exclude: string[] = [];

  for (const glob of globs) {
    if (glob.startsWith("!")) {
      exclude.push(glob.slice(1));
    } else {
      include.push(glob);
    }
  }

  if (include.length === 0) {
    throw new ConfigError(`Component "${name}" has only exclude globs; add an include glob.`);
  }

  return { name, include: dedupe(include), exclude: dedupe(exclude) };
}

function toStageDefinition(stage: StageConfig): StageDefinition {
  return {
    name: stage.name,
    target: stage.target,
    components: dedupe(stage.components),
    sharedDependencies: stage.shared_dependencies,
    alwaysRun: stage.always_run,
    needs: dedupe(stage.needs),
    env: { ...stage.env },
    timeoutMs:
      stage.timeout_minutes !== undefined ? Math.round(stage.timeout_minutes * 60_000) : undefined,
    monitored: stage.monitored,
  };
}

function assertUniqueStageNames(stages: StageConfig[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new ConfigError(`Duplicate stage name: ${stage.name}`);
    }
    seen.add(stage.name);
  }
}

function describeCycle(stages: StageDefinition[]): string {
  const names = new Set(stages.map((stage) => stage.name));
  const start = stages[0];
  const path: string[] = [start.name];
  let current = start;

  // Every stage left over has an unplaced need, so walking unplaced needs must revisit a node.
  for (;;) {
    const nextName = current.needs.find((need) => names.has(need));
    const next = stages.find((stage) => stage.name === nextName);
    if (!next) return path.join(" -> ");

    const seenAt = path.indexOf(next.name);
    path.push(next.name);
    if (seenAt !== -1) return path.slice(seenAt).join(" -> ");
    current = next;
  }
}

function dedupe(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
