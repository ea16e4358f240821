import { describe, expect, it } from "vitest";

import { RunCancelledError } from "../../../core/errors.js";

import { combineAbortSignals, normalizeAbortReason, toCancelledError } from "./abort.js";

describe("combineAbortSignals", () => {
  it("aborts when any source aborts and keeps its reason", () => {
    const first = new AbortController();
    const second = new AbortController();
    const combined = combineAbortSignals(first.signal, undefined, second.signal);

    expect(combined.aborted).toBe(false);
    second.abort("superseded");

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe("superseded");
  });

  it("starts aborted when a source already is", () => {
    const source = new AbortController();
    source.abort("SIGINT");

    const combined = combineAbortSignals(source.signal);

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe("SIGINT");
  });
});

describe("normalizeAbortReason", () => {
  it("returns undefined for nullish inputs", () => {
    expect(normalizeAbortReason(undefined)).toBeUndefined();
    expect(normalizeAbortReason(null)).toBeUndefined();
  });

  it("prefers known signal or type fields", () => {
    expect(normalizeAbortReason({ signal: "SIGTERM" })).toBe("SIGTERM");
    expect(normalizeAbortReason({ type: "abort" })).toBe("abort");
  });

  it("uses the cancellation reason of run-cancelled errors", () => {
    expect(normalizeAbortReason(new RunCancelledError("Run cancelled", "superseded"))).toBe(
      "superseded",
    );
    expect(normalizeAbortReason(new Error("stopped"))).toBe("stopped");
    expect(normalizeAbortReason(123)).toBe("123");
  });
});

describe("toCancelledError", () => {
  it("keeps an existing RunCancelledError", () => {
    const cancelled = new RunCancelledError("Run run-1 superseded by run run-2", "superseded");

    expect(toCancelledError(cancelled)).toBe(cancelled);
  });

  it("wraps other reasons with the normalized reason", () => {
    const error = toCancelledError("SIGTERM");

    expect(error).toBeInstanceOf(RunCancelledError);
    expect(error.message).toBe("Run cancelled: SIGTERM");
    expect(error.reason).toBe("SIGTERM");
  });
});
