import { describe, expect, it } from "vitest";

import { TeardownError } from "../../../core/errors.js";
import { RecordingSink, createTempDir, createTestLogger, readLogEvents } from "../__tests__/fakes.js";
import type { StageResult } from "../stages/stage-runner.js";

import { FailureNotifier } from "./failure-notifier.js";

function result(stage: string, status: StageResult["status"], monitored = true): StageResult {
  return { stage, target: `test_${stage}`, status, monitored };
}

function makeNotifier(sinks: RecordingSink[]) {
  const logger = createTestLogger(createTempDir("stagegate-notify-"));
  const notifier = new FailureNotifier({
    sinks,
    pipeline: "fast-tests",
    runId: "run-1",
    link: "https://ci.example.test/runs/run-1",
    logger,
  });
  return { notifier, logger };
}

describe("FailureNotifier", () => {
  it("notifies once for failed monitored stages", async () => {
    const sink = new RecordingSink();
    const { notifier } = makeNotifier([sink]);
    const results = [result("core", "failure"), result("integer", "success")];

    await notifier.notifyStages("failure", results);
    await notifier.notifyStages("failure", results);

    expect(sink.messages).toEqual([
      {
        point: "stages",
        runId: "run-1",
        pipeline: "fast-tests",
        status: "failure",
        message: "fast-tests tests finished with status: failure. Failed stages: core.",
        link: "https://ci.example.test/runs/run-1",
        failingStages: ["core"],
      },
    ]);
    expect(notifier.records).toEqual([{ point: "stages", sink: "recording", status: "sent" }]);
  });

  it("ignores failures of unmonitored stages", async () => {
    const sink = new RecordingSink();
    const { notifier } = makeNotifier([sink]);

    await notifier.notifyStages("failure", [result("wasm", "failure", false)]);

    expect(sink.messages).toEqual([]);
  });

  it("does not notify successful or skipped runs", async () => {
    const sink = new RecordingSink();
    const { notifier } = makeNotifier([sink]);

    await notifier.notifyStages("success", [result("core", "success")]);
    await notifier.notifyStages("skipped", []);

    expect(sink.messages).toEqual([]);
  });

  it("notifies instance failures on their own point", async () => {
    const sink = new RecordingSink();
    const { notifier } = makeNotifier([sink]);

    await notifier.notifyStages("failure", [result("core", "failure")]);
    await notifier.notifyInstance("teardown", new TeardownError("stop failed", "i-1"));

    expect(sink.messages.map((message) => message.point)).toEqual(["stages", "instance"]);
    expect(sink.messages[1].message).toBe(
      "Instance teardown (fast-tests) finished with status: failure. stop failed",
    );
  });

  it("logs and swallows sink errors", async () => {
    const broken = new RecordingSink("broken", new Error("webhook down"));
    const healthy = new RecordingSink("healthy");
    const { notifier, logger } = makeNotifier([broken, healthy]);

    await expect(
      notifier.notifyInstance("provisioning", new Error("no capacity")),
    ).resolves.toBeUndefined();
    logger.close();

    expect(healthy.messages).toHaveLength(1);
    expect(notifier.records).toEqual([
      { point: "instance", sink: "broken", status: "failed", error: "webhook down" },
      { point: "instance", sink: "healthy", status: "sent" },
    ]);
    const failed = readLogEvents(logger).find((event) => event.type === "notification.failed");
    expect(failed).toMatchObject({ point: "instance", sink: "broken", message: "webhook down" });
  });
});
