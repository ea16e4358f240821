/*
Abort helpers for run cancellation.
Purpose: link the external stop signal, the concurrency lease and per-step deadlines.
Usage: const signal = combineAbortSignals(stopSignal, lease.signal);
*/

import { RunCancelledError } from "../../../core/errors.js";

export function combineAbortSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const active = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  const controller = new AbortController();

  const alreadyAborted = active.find((signal) => signal.aborted);
  if (alreadyAborted) {
    controller.abort(alreadyAborted.reason);
    return controller.signal;
  }

  const listeners: Array<() => void> = [];
  const detach = (): void => {
    active.forEach((signal, index) => signal.removeEventListener("abort", listeners[index]));
  };

  for (const signal of active) {
    const onAbort = (): void => {
      detach();
      controller.abort(signal.reason);
    };
    listeners.push(onAbort);
    signal.addEventListener("abort", onAbort, { once: true });
  }

  return controller.signal;
}

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof RunCancelledError) return reason.reason ?? reason.message;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object") {
    if ("signal" in reason && typeof reason.signal === "string") return reason.signal;
    if ("type" in reason && typeof reason.type === "string") return reason.type;
  }

  return String(reason);
}

export function toCancelledError(reason: unknown): RunCancelledError {
  if (reason instanceof RunCancelledError) return reason;
  const normalized = normalizeAbortReason(reason) ?? "aborted";
  return new RunCancelledError(`Run cancelled: ${normalized}`, normalized);
}
