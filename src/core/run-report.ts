/*
Run report persistence.
Purpose: store one JSON summary per pipeline run for `stagegate status` and CI artifacts.
Assumptions: reports are written once, at the end of a run, atomically.
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { runReportPath, runReportsDir, type PathsContext } from "./paths.js";
import { readJsonFile, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

const OutcomeSchema = z.enum(["success", "failure", "cancelled", "skipped"]);
const InstanceStateSchema = z.enum([
  "requested",
  "ready",
  "in-use",
  "tearing-down",
  "stopped",
  "failed",
]);

const StageReportSchema = z.object({
  stage: z.string(),
  target: z.string(),
  status: z.enum(["success", "failure", "skipped", "cancelled"]),
  monitored: z.boolean(),
  reason: z.string().optional(),
  exit_code: z.number().int().optional(),
  error: z.string().optional(),
  started_at: z.string().optional(),
  finished_at: z.string().optional(),
  duration_ms: z.number().optional(),
});

const InstanceReportSchema = z.object({
  id: z.string(),
  profile: z.string(),
  platform: z.string(),
  handle: z.string().optional(),
  state: InstanceStateSchema,
  trace: z.array(
    z.object({
      from: InstanceStateSchema.nullable(),
      to: InstanceStateSchema,
      at: z.string(),
      detail: z.string().optional(),
    }),
  ),
});

export const RunReportSchema = z.object({
  run_id: z.string(),
  pipeline: z.string(),
  trigger: z.string(),
  ref: z.string(),
  range: z.object({
    base: z.string().optional(),
    head: z.string().optional(),
    full_history_reason: z.string().optional(),
  }),
  link: z.string().optional(),
  started_at: z.string(),
  finished_at: z.string(),
  concurrency: z.object({
    group: z.string(),
    result: z.enum(["acquired", "rejected", "cancelled"]),
    blocked_by: z.string().optional(),
    reason: z.string().optional(),
  }),
  changes: z
    .object({
      status: z.enum(["known", "unknown"]),
      reason: z.string().optional(),
      changed_files: z.array(z.string()),
      components: z.record(z.enum(["changed", "unchanged", "unknown"])),
    })
    .nullable(),
  gates: z
    .object({
      any_changed: z.boolean(),
      stages: z.record(z.object({ run: z.boolean(), reasons: z.array(z.string()) })),
    })
    .nullable(),
  stages: z.array(StageReportSchema),
  instance: InstanceReportSchema.nullable(),
  notifications: z.array(
    z.object({
      point: z.enum(["stages", "instance"]),
      sink: z.string(),
      status: z.enum(["sent", "failed"]),
      error: z.string().optional(),
    }),
  ),
  outcome: z.object({
    stages: OutcomeSchema,
    instance: z.enum(["success", "failure", "skipped"]),
    overall: OutcomeSchema,
    cancel_reason: z.string().optional(),
  }),
  errors: z.array(z.string()),
});

export type RunReport = z.infer<typeof RunReportSchema>;
export type StageReport = z.infer<typeof StageReportSchema>;
export type InstanceReport = z.infer<typeof InstanceReportSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function writeRunReport(report: RunReport, paths: PathsContext): Promise<string> {
  const reportPath = runReportPath(report.pipeline, report.run_id, paths);
  await writeJsonFileAtomic(reportPath, RunReportSchema.parse(report));
  return reportPath;
}

export async function readRunReport(reportPath: string): Promise<RunReport> {
  let raw: unknown;
  try {
    raw = await readJsonFile(reportPath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.report,
      title: "Run report unreadable.",
      message: `Could not read run report at ${reportPath}.`,
      hint: "Check the run id, or run `stagegate status` without --run-id for the latest run.",
      cause: err,
    });
  }

  const parsed = RunReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.report,
      title: "Run report invalid.",
      message: `Run report at ${reportPath} does not match the expected format.`,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// Latest by finish time; null when the pipeline has no stored runs.
export async function findLatestRunReport(
  pipeline: string,
  paths: PathsContext,
): Promise<RunReport | null> {
  const dir = runReportsDir(pipeline, paths);
  if (!(await fse.pathExists(dir))) return null;

  const files = (await fse.readdir(dir)).filter((file) => file.endsWith(".json"));
  let latest: RunReport | null = null;
  for (const file of files) {
    const report = await readRunReport(path.join(dir, file));
    if (!latest || report.finished_at > latest.finished_at) {
      latest = report;
    }
  }
  return latest;
}
