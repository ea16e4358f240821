import type { CancellationPolicy, ConcurrencyGroup } from "./concurrency-group.js";

export function makeGroup(
  policy: CancellationPolicy = { mode: "cancel-in-progress" },
  overrides: Partial<ConcurrencyGroup> = {},
): ConcurrencyGroup {
  return {
    key: "fast-tests_refs/heads/main",
    branch: "main",
    policy,
    waitTimeoutMs: 5000,
    ...overrides,
  };
}

export function waitForAbort(signal: AbortSignal): Promise<unknown> {
  if (signal.aborted) return Promise.resolve(signal.reason);
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(signal.reason), { once: true });
  });
}

export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
