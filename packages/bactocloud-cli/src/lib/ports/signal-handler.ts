/**
 * Abstraction for process signal handling.
 * Allows testing cancellation without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for interrupt signals (SIGTERM, SIGINT) */
  onInterrupt(callback: () => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
