import { secondsFromMs } from "../app/orchestrator/helpers/time.js";
import { runReportPath } from "../core/paths.js";
import { findLatestRunReport, readRunReport, type RunReport } from "../core/run-report.js";
import { pathExists } from "../core/utils.js";

import { loadPipelineForCli } from "./config.js";

export async function statusCommand(opts: { config?: string; runId?: string }): Promise<void> {
  const { loaded, paths } = loadPipelineForCli({ explicitConfigPath: opts.config });
  const pipelineName = loaded.pipeline.name;

  let report: RunReport | null = null;
  if (opts.runId) {
    const reportPath = runReportPath(pipelineName, opts.runId, paths);
    report = (await pathExists(reportPath)) ? await readRunReport(reportPath) : null;
  } else {
    report = await findLatestRunReport(pipelineName, paths);
  }

  if (!report) {
    printRunNotFound(pipelineName, opts.runId);
    return;
  }

  for (const line of formatRunReport(report)) {
    console.log(line);
  }
}

function printRunNotFound(pipelineName: string, requestedRunId?: string): void {
  const notFound = requestedRunId
    ? `Run ${requestedRunId} not found for pipeline ${pipelineName}.`
    : `No runs found for pipeline ${pipelineName}.`;

  console.log(notFound);
  console.log("Start a run with: stagegate run");
  process.exitCode = 1;
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatRunReport(report: RunReport): string[] {
  const lines = [
    `Run: ${report.run_id} (${report.pipeline})`,
    `Outcome: ${formatOutcome(report)}`,
    `Trigger: ${report.trigger} on ${report.ref}`,
    `Range: ${formatRange(report.range)}`,
    `Started: ${report.started_at}`,
    `Finished: ${report.finished_at}`,
  ];
  if (report.link) lines.push(`Link: ${report.link}`);
  if (report.instance) {
    lines.push(`Instance: ${report.instance.id} [${report.instance.state}]`);
  }

  lines.push("");
  const nameWidth = Math.max("Stage".length, ...report.stages.map((stage) => stage.stage.length));
  lines.push(`${"Stage".padEnd(nameWidth)}  ${"Status".padEnd(9)}  Detail`);
  for (const stage of report.stages) {
    lines.push(`${stage.stage.padEnd(nameWidth)}  ${stage.status.padEnd(9)}  ${formatStageDetail(stage)}`);
  }

  if (report.errors.length > 0) {
    lines.push("", "Errors:");
    for (const error of report.errors) lines.push(`  - ${error}`);
  }

  const failedNotifications = report.notifications.filter((entry) => entry.status === "failed");
  for (const entry of failedNotifications) {
    lines.push(`Notification to ${entry.sink} failed: ${entry.error ?? "unknown error"}`);
  }

  return lines;
}

function formatOutcome(report: RunReport): string {
  const reason = report.outcome.cancel_reason;
  return reason ? `${report.outcome.overall} (${reason})` : report.outcome.overall;
}

function formatRange(range: RunReport["range"]): string {
  if (range.full_history_reason) return `full history (${range.full_history_reason})`;
  return `${range.base ?? "?"}..${range.head ?? "HEAD"}`;
}

function formatStageDetail(stage: RunReport["stages"][number]): string {
  if (stage.status === "skipped") return stage.reason ?? "-";

  const parts: string[] = [];
  if (stage.duration_ms !== undefined) parts.push(`${secondsFromMs(stage.duration_ms)}s`);
  if (stage.exit_code !== undefined) parts.push(`exit ${stage.exit_code}`);
  if (stage.error) parts.push(stage.error);
  return parts.length > 0 ? parts.join(", ") : "-";
}
