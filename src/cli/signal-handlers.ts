/*
Purpose: turn SIGINT/SIGTERM into an abort signal for the active run.
Assumptions: the first signal aborts; the run still tears its instance down before exiting.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ... stop.cleanup();
*/

// =============================================================================
// TYPES
// =============================================================================

export type SignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export type RunStopSignalHandlerOptions = {
  onSignal?: (signal: NodeJS.Signals) => void;
  source?: SignalSource;
  signals?: NodeJS.Signals[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRunStopSignalHandler(
  opts: RunStopSignalHandlerOptions = {},
): RunStopSignalHandler {
  const source = opts.source ?? process;
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();

  const cleanup = (): void => {
    for (const [signal, listener] of listeners) {
      source.off(signal, listener);
    }
    listeners.clear();
  };

  for (const signal of signals) {
    const listener = (): void => {
      cleanup();
      opts.onSignal?.(signal);
      controller.abort(signal);
    };
    listeners.set(signal, listener);
    source.once(signal, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
