import { describe, expect, it } from "vitest";

import { RunCancelledError } from "../../../core/errors.js";
import type { ConcurrencyAcquireResult, ConcurrencyLease } from "../ports.js";

import { InMemoryConcurrencyRegistry } from "./in-memory-registry.js";
import { flushAsync, makeGroup } from "./test-helpers.js";

const PROTECT_WAIT = {
  mode: "protect-branches" as const,
  protectedBranches: ["main"],
  onProtected: "wait" as const,
};

function leaseOf(result: ConcurrencyAcquireResult): ConcurrencyLease {
  if (result.kind !== "acquired") {
    throw new Error(`expected lease, got ${result.kind}`);
  }
  return result.lease;
}

describe("InMemoryConcurrencyRegistry", () => {
  it("grants the lease to the first run of a group", async () => {
    const registry = new InMemoryConcurrencyRegistry();

    const result = await registry.acquire(
      { runId: "run-1", group: makeGroup() },
      new AbortController().signal,
    );

    expect(leaseOf(result)).toMatchObject({ runId: "run-1", groupKey: "fast-tests_refs/heads/main" });
  });

  it("cancels the in-flight run and waits for its release", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const first = leaseOf(
      await registry.acquire({ runId: "run-1", group: makeGroup() }, new AbortController().signal),
    );

    let settled = false;
    const second = registry
      .acquire({ runId: "run-2", group: makeGroup() }, new AbortController().signal)
      .then((result) => {
        settled = true;
        return result;
      });
    await flushAsync();

    expect(first.signal.aborted).toBe(true);
    expect(first.signal.reason).toBeInstanceOf(RunCancelledError);
    expect(settled).toBe(false);

    await first.release();
    const result = await second;

    expect(leaseOf(result).runId).toBe("run-2");
  });

  it("rejects a new run on a protected branch when configured", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const group = makeGroup({ ...PROTECT_WAIT, onProtected: "reject" });
    const first = leaseOf(await registry.acquire({ runId: "run-1", group }, new AbortController().signal));

    const result = await registry.acquire({ runId: "run-2", group }, new AbortController().signal);

    expect(result).toEqual({ kind: "rejected", blockedBy: "run-1", reason: "protected_branch" });
    expect(first.signal.aborted).toBe(false);
  });

  it("lets a newer waiter supersede an older one on a protected branch", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const group = makeGroup(PROTECT_WAIT);
    const first = leaseOf(await registry.acquire({ runId: "run-1", group }, new AbortController().signal));

    const second = registry.acquire({ runId: "run-2", group }, new AbortController().signal);
    await flushAsync();
    const third = registry.acquire({ runId: "run-3", group }, new AbortController().signal);

    expect(await second).toEqual({ kind: "cancelled", reason: "superseded" });
    expect(first.signal.aborted).toBe(false);

    await first.release();
    expect((await third).kind).toBe("acquired");
  });

  it("gives up waiting after the group timeout", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const group = makeGroup(PROTECT_WAIT, { waitTimeoutMs: 10 });
    await registry.acquire({ runId: "run-1", group }, new AbortController().signal);

    const result = await registry.acquire({ runId: "run-2", group }, new AbortController().signal);

    expect(result).toEqual({ kind: "rejected", blockedBy: "run-1", reason: "wait_timeout" });
  });

  it("stops waiting when the caller aborts", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const group = makeGroup(PROTECT_WAIT);
    await registry.acquire({ runId: "run-1", group }, new AbortController().signal);

    const controller = new AbortController();
    const pending = registry.acquire({ runId: "run-2", group }, controller.signal);
    await flushAsync();
    controller.abort("SIGINT");

    expect(await pending).toEqual({ kind: "cancelled", reason: "aborted" });
  });

  it("releases idempotently", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const lease = leaseOf(
      await registry.acquire({ runId: "run-1", group: makeGroup() }, new AbortController().signal),
    );

    await lease.release();
    await lease.release();
    const next = leaseOf(
      await registry.acquire({ runId: "run-2", group: makeGroup() }, new AbortController().signal),
    );

    expect(next.runId).toBe("run-2");
    expect(lease.signal.aborted).toBe(false);
  });

  it("protects an in-flight run on a protected branch from a run on another branch", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const policy = { ...PROTECT_WAIT, onProtected: "reject" as const };
    const mainRun = leaseOf(
      await registry.acquire(
        { runId: "main-run", group: makeGroup(policy, { key: "wf", branch: "main" }) },
        new AbortController().signal,
      ),
    );

    const result = await registry.acquire(
      { runId: "pr-run", group: makeGroup(policy, { key: "wf", branch: "pull/5" }) },
      new AbortController().signal,
    );

    expect(result).toEqual({ kind: "rejected", blockedBy: "main-run", reason: "protected_branch" });
    expect(mainRun.signal.aborted).toBe(false);
  });

  it("cancels an in-flight run on an unprotected branch even when the newcomer is protected", async () => {
    const registry = new InMemoryConcurrencyRegistry();
    const policy = { ...PROTECT_WAIT, onProtected: "reject" as const };
    const prRun = leaseOf(
      await registry.acquire(
        { runId: "pr-run", group: makeGroup(policy, { key: "wf", branch: "pull/5" }) },
        new AbortController().signal,
      ),
    );

    const pending = registry.acquire(
      { runId: "main-run", group: makeGroup(policy, { key: "wf", branch: "main" }) },
      new AbortController().signal,
    );
    await flushAsync();

    expect(prRun.signal.aborted).toBe(true);
    await prRun.release();
    expect(leaseOf(await pending).runId).toBe("main-run");
  });
});
