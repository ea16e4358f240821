/*
Purpose: resolve run inputs from CLI flags, falling back to the GitHub Actions environment.
Assumptions: flags always win; an unknown event name is a user error, not a silent default.
Usage: const inputs = resolveRunInputs(flags, process.env);
*/

import fs from "node:fs";

import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { TRIGGER_KINDS, type TriggerKind } from "../app/orchestrator/gating/gate-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunInputFlags = {
  trigger?: string;
  base?: string;
  head?: string;
  ref?: string;
  runId?: string;
  runUrl?: string;
  label?: string;
};

export type RunInputs = {
  trigger: TriggerKind;
  base?: string;
  head?: string;
  ref: string;
  runId?: string;
  runUrl?: string;
  // Link to the hosting CI run, used when neither --run-url nor the config names one.
  ciRunUrl?: string;
  // Label added by the triggering event, checked against approval_label.
  label?: string;
};

export type RunInputEnv = Readonly<Record<string, string | undefined>>;

const GITHUB_EVENT_TRIGGERS: Readonly<Record<string, TriggerKind>> = {
  pull_request: "pull-request",
  pull_request_target: "pull-request",
  workflow_dispatch: "manual",
  push: "push",
  schedule: "schedule",
};

const DEFAULT_REF = "local";

// A `labeled` pull_request event names the label it added; other events have none.
const GithubEventSchema = z.object({
  label: z.object({ name: z.string() }).optional(),
});

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveRunInputs(flags: RunInputFlags, env: RunInputEnv): RunInputs {
  const trigger = resolveTrigger(flags.trigger, env.GITHUB_EVENT_NAME);

  return {
    trigger,
    base: nonEmpty(flags.base) ?? resolveBaseFromEnv(trigger, env),
    head: nonEmpty(flags.head) ?? nonEmpty(env.GITHUB_SHA),
    ref: nonEmpty(flags.ref) ?? nonEmpty(env.GITHUB_REF) ?? DEFAULT_REF,
    runId: nonEmpty(flags.runId) ?? nonEmpty(env.GITHUB_RUN_ID),
    runUrl: nonEmpty(flags.runUrl),
    ciRunUrl: resolveGithubRunUrl(env),
    label: nonEmpty(flags.label) ?? readEventLabel(env.GITHUB_EVENT_PATH),
  };
}

export function parseTriggerKind(value: string): TriggerKind | undefined {
  return TRIGGER_KINDS.find((kind) => kind === value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTrigger(flag: string | undefined, eventName: string | undefined): TriggerKind {
  if (flag) {
    const kind = parseTriggerKind(flag);
    if (!kind) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.run,
        title: "Unknown trigger.",
        message: `Trigger "${flag}" is not one of: ${TRIGGER_KINDS.join(", ")}.`,
      });
    }
    return kind;
  }

  if (eventName) {
    const kind = GITHUB_EVENT_TRIGGERS[eventName];
    if (!kind) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.run,
        title: "Unsupported event.",
        message: `GITHUB_EVENT_NAME "${eventName}" has no matching trigger.`,
        hint: "Pass --trigger explicitly.",
      });
    }
    return kind;
  }

  return "manual";
}

// Only pull requests carry a base in the environment: the target branch.
function resolveBaseFromEnv(trigger: TriggerKind, env: RunInputEnv): string | undefined {
  if (trigger !== "pull-request") return undefined;
  const baseRef = nonEmpty(env.GITHUB_BASE_REF);
  return baseRef ? `origin/${baseRef}` : undefined;
}

function resolveGithubRunUrl(env: RunInputEnv): string | undefined {
  const server = nonEmpty(env.GITHUB_SERVER_URL);
  const repository = nonEmpty(env.GITHUB_REPOSITORY);
  const runId = nonEmpty(env.GITHUB_RUN_ID);
  if (!server || !repository || !runId) return undefined;
  return `${server}/${repository}/actions/runs/${runId}`;
}

function readEventLabel(eventPath: string | undefined): string | undefined {
  if (!eventPath) return undefined;

  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(eventPath, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.run,
      title: "Unreadable event payload.",
      message: `Could not read the event payload at ${eventPath}.`,
      hint: "Pass --label explicitly or unset GITHUB_EVENT_PATH.",
      cause: err,
    });
  }

  const parsed = GithubEventSchema.safeParse(payload);
  return parsed.success ? nonEmpty(parsed.data.label?.name) : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}
