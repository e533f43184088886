import type { SignalHandler } from "../ports/signal-handler.js";

/**
 * Create a signal handler for interrupt signals.
 * The first signal runs the callbacks; a second one exits immediately.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<() => void> = [];
  let interrupted = false;

  const handleSignal = () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    for (const handler of handlers) handler();
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}
