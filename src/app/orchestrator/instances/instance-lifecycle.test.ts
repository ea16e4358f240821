import { describe, expect, it } from "vitest";

import { ProvisioningError, RunCancelledError, TeardownError } from "../../../core/errors.js";
import {
  FakeRunnerPlatform,
  FixedClock,
  createTempDir,
  createTestLogger,
  deferred,
  readLogEvents,
} from "../__tests__/fakes.js";
import type { RunnerHandle, RunnerProfile } from "../ports.js";

import { InstanceLifecycleManager, canTransition } from "./instance-lifecycle.js";

const PROFILE: RunnerProfile = { name: "cpu-big", image: "ubuntu:22.04", cpus: 8, gpus: 0 };

function makeManager(platform: FakeRunnerPlatform, provisionTimeoutMs = 1000, orphanStopGraceMs?: number) {
  const logger = createTestLogger(createTempDir("stagegate-instance-"));
  const manager = new InstanceLifecycleManager({
    platform,
    clock: new FixedClock(),
    runId: "run-1",
    pipeline: "fast-tests",
    provisionTimeoutMs,
    orphanStopGraceMs,
    logger,
  });
  return { manager, logger };
}

describe("canTransition", () => {
  it("follows the instance state machine", () => {
    expect(canTransition("requested", "ready")).toBe(true);
    expect(canTransition("ready", "in-use")).toBe(true);
    expect(canTransition("in-use", "tearing-down")).toBe(true);
    expect(canTransition("tearing-down", "stopped")).toBe(true);
    expect(canTransition("in-use", "ready")).toBe(false);
    expect(canTransition("stopped", "in-use")).toBe(false);
    expect(canTransition("requested", "in-use")).toBe(false);
  });
});

describe("InstanceLifecycleManager", () => {
  it("provisions, claims and tears down an instance", async () => {
    const platform = new FakeRunnerPlatform();
    const { manager, logger } = makeManager(platform);

    const instance = await manager.provision(PROFILE, new AbortController().signal);
    manager.claim(instance);
    await manager.teardown(instance);
    logger.close();

    expect(instance.state).toBe("stopped");
    expect(instance.handle?.id).toBe("fake-run-1");
    expect(instance.trace.map((entry) => entry.to)).toEqual([
      "requested",
      "ready",
      "in-use",
      "tearing-down",
      "stopped",
    ]);
    expect(platform.stopCalls).toHaveLength(1);

    const transitions = readLogEvents(logger).filter((event) => event.type === "instance.transition");
    expect(transitions).toHaveLength(5);
    expect(transitions[1]).toMatchObject({ from: "requested", to: "ready", detail: "fake:cpu-big" });
  });

  it("treats teardown of a stopped instance as a no-op", async () => {
    const platform = new FakeRunnerPlatform();
    const { manager } = makeManager(platform);
    const instance = await manager.provision(PROFILE, new AbortController().signal);

    await manager.teardown(instance);
    await manager.teardown(instance);

    expect(platform.stopCalls).toHaveLength(1);
  });

  it("fails provisioning when the platform rejects", async () => {
    const platform = new FakeRunnerPlatform();
    platform.failStart(new Error("quota exceeded"));
    const { manager } = makeManager(platform);

    const error = await manager.provision(PROFILE, new AbortController().signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({ message: "Provisioning failed: quota exceeded", profile: "cpu-big" });
    expect(platform.stopCalls).toEqual([]);
  });

  it("times out a slow start and stops the instance once it appears", async () => {
    const platform = new FakeRunnerPlatform();
    const late = deferred<RunnerHandle>();
    platform.deferStart(late.promise);
    const { manager, logger } = makeManager(platform, 20);

    const error = await manager.provision(PROFILE, new AbortController().signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({ message: "Provisioning timed out after 0s" });

    late.resolve({ id: "late-1", label: "late", workdir: "/workspace" });
    await manager.drainOrphans();
    logger.close();

    expect(platform.stopCalls).toEqual([{ id: "late-1", label: "late", workdir: "/workspace" }]);
    const orphan = readLogEvents(logger).find((event) => event.type === "instance.orphan_stop");
    expect(orphan).toMatchObject({ handle: "late", status: "stopped" });
  });

  it("stops waiting for a start that never settles after the grace period", async () => {
    const platform = new FakeRunnerPlatform();
    platform.deferStart(new Promise<RunnerHandle>(() => undefined));
    const { manager, logger } = makeManager(platform, 20, 10);

    const error = await manager.provision(PROFILE, new AbortController().signal).catch((err: unknown) => err);
    const drained = await manager.drainOrphans();
    logger.close();

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(drained).toBe("pending");
    expect(platform.stopCalls).toEqual([]);
    const orphan = readLogEvents(logger).find((event) => event.type === "instance.orphan_stop");
    expect(orphan).toMatchObject({ instance_id: "run-1-cpu-big", status: "pending", grace_ms: 10 });
  });

  it("reports cancellation while provisioning", async () => {
    const platform = new FakeRunnerPlatform();
    const late = deferred<RunnerHandle>();
    platform.deferStart(late.promise);
    const { manager } = makeManager(platform);
    const controller = new AbortController();

    const pending = manager.provision(PROFILE, controller.signal);
    controller.abort("SIGINT");
    const error = await pending.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RunCancelledError);
    expect(error).toMatchObject({ message: "Run cancelled: SIGINT", reason: "SIGINT" });

    late.reject(new Error("start aborted"));
    await manager.drainOrphans();
    expect(platform.stopCalls).toEqual([]);
  });

  it("raises a teardown error and marks the instance failed", async () => {
    const platform = new FakeRunnerPlatform();
    platform.failStop(new Error("instance not responding"));
    const { manager } = makeManager(platform);
    const instance = await manager.provision(PROFILE, new AbortController().signal);
    manager.claim(instance);

    const error = await manager.teardown(instance).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TeardownError);
    expect(error).toMatchObject({
      message: "Failed to stop instance fake:cpu-big: instance not responding",
      handle: "fake-run-1",
    });
    expect(instance.state).toBe("failed");
  });

  it("rejects claims that skip a state", async () => {
    const platform = new FakeRunnerPlatform();
    const { manager } = makeManager(platform);
    const instance = await manager.provision(PROFILE, new AbortController().signal);
    manager.claim(instance);

    expect(() => manager.claim(instance)).toThrow(
      "Invalid instance transition in-use -> in-use for run-1-cpu-big",
    );
  });
});
