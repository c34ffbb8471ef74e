type SignalListener = () => void;

export type SignalSource = {
  once: (event: NodeJS.Signals, listener: SignalListener) => unknown;
  off: (event: NodeJS.Signals, listener: SignalListener) => unknown;
};

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  stoppedBy: () => NodeJS.Signals | null;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Turns the first SIGINT/SIGTERM into an abort of the run signal. The pool stops
 * starting releases; in-flight ones finish and the partial report is still written.
 */
export function createRunStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void; source?: SignalSource } = {},
): RunStopSignalHandler {
  const source = opts.source ?? process;
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, SignalListener>();
  let received: NodeJS.Signals | null = null;
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    for (const [name, listener] of listeners) {
      source.off(name, listener);
    }
    listeners.clear();
  };

  const handleSignal = (name: NodeJS.Signals): void => {
    try {
      opts.onSignal?.(name);
    } finally {
      if (!controller.signal.aborted) {
        received = name;
        controller.abort(name);
      }
      cleanup();
    }
  };

  for (const name of STOP_SIGNALS) {
    const listener = (): void => handleSignal(name);
    listeners.set(name, listener);
    source.once(name, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    stoppedBy: () => received,
  };
}
