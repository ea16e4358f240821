import { describe, expect, it } from "vitest";

import type { RunReport } from "../core/run-report.js";

import { formatRunReport } from "./status.js";

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    run_id: "4242",
    pipeline: "fast-tests",
    trigger: "pull-request",
    ref: "refs/pull/7/merge",
    range: { base: "origin/main", head: "abc123" },
    started_at: "2024-01-01T00:00:00.000Z",
    finished_at: "2024-01-01T00:05:00.000Z",
    concurrency: { group: "fast-tests_refs/pull/7/merge", result: "acquired" },
    changes: null,
    gates: null,
    stages: [
      {
        stage: "core",
        target: "test_core",
        status: "failure",
        monitored: true,
        exit_code: 2,
        error: "Command failed with exit code 2",
        duration_ms: 1500,
      },
      { stage: "docs", target: "test_docs", status: "skipped", monitored: true, reason: "gate_closed" },
    ],
    instance: {
      id: "4242-cpu-big",
      profile: "cpu-big",
      platform: "docker",
      state: "stopped",
      trace: [],
    },
    notifications: [{ point: "stages", sink: "slack", status: "failed", error: "Slack webhook responded 404: no_service" }],
    outcome: { stages: "failure", instance: "success", overall: "failure" },
    errors: [],
    ...overrides,
  };
}

describe("formatRunReport", () => {
  it("summarizes the run, its stages and failed notifications", () => {
    expect(formatRunReport(makeReport({ link: "https://ci.example.test/runs/4242" }))).toEqual([
      "Run: 4242 (fast-tests)",
      "Outcome: failure",
      "Trigger: pull-request on refs/pull/7/merge",
      "Range: origin/main..abc123",
      "Started: 2024-01-01T00:00:00.000Z",
      "Finished: 2024-01-01T00:05:00.000Z",
      "Link: https://ci.example.test/runs/4242",
      "Instance: 4242-cpu-big [stopped]",
      "",
      "Stage  Status     Detail",
      "core   failure    1.5s, exit 2, Command failed with exit code 2",
      "docs   skipped    gate_closed",
      "Notification to slack failed: Slack webhook responded 404: no_service",
    ]);
  });

  it("shows the cancel reason and a full-history range", () => {
    const lines = formatRunReport(
      makeReport({
        range: { full_history_reason: "no base revision" },
        instance: null,
        stages: [],
        notifications: [],
        outcome: { stages: "skipped", instance: "skipped", overall: "cancelled", cancel_reason: "superseded" },
        errors: ["Failed to stop instance fake:default: daemon gone"],
      }),
    );

    expect(lines.slice(0, 4)).toEqual([
      "Run: 4242 (fast-tests)",
      "Outcome: cancelled (superseded)",
      "Trigger: pull-request on refs/pull/7/merge",
      "Range: full history (no base revision)",
    ]);
    expect(lines.slice(-2)).toEqual(["Errors:", "  - Failed to stop instance fake:default: daemon gone"]);
  });
});
