export interface ShutdownSignalOptions {
  onSignal: (signal: NodeJS.Signals) => Promise<void>;
  onError?: (error: unknown) => void;
  exitOnSignal?: boolean;
  exitCodeForSignal?: (signal: NodeJS.Signals) => number;
  signals?: NodeJS.Signals[];
}

/**
 * Runs `onSignal` once for the first termination signal, then exits.
 * Returns a function that removes the listeners.
 */
export const registerShutdownSignals = (options: ShutdownSignalOptions): (() => void) => {
  const exitOnSignal = options.exitOnSignal ?? true;
  const exitCodeForSignal =
    options.exitCodeForSignal ?? ((signal: NodeJS.Signals) => (signal === "SIGTERM" ? 143 : 130));
  const signals = options.signals ?? ["SIGINT", "SIGTERM", "SIGHUP"];
  const listeners = new Map<NodeJS.Signals, () => void>();
  let handled = false;

  const handler = (signal: NodeJS.Signals): void => {
    if (handled) return;
    handled = true;
    void options
      .onSignal(signal)
      .catch((error: unknown) => options.onError?.(error))
      .finally(() => {
        if (exitOnSignal) {
          process.exitCode = exitCodeForSignal(signal);
          process.exit();
        }
      });
  };

  for (const signal of signals) {
    const listener = (): void => handler(signal);
    listeners.set(signal, listener);
    process.once(signal, listener);
  }

  return () => {
    for (const [signal, listener] of listeners.entries()) {
      process.off(signal, listener);
    }
    listeners.clear();
  };
};
