import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of `[time] LEVEL message {meta}` */
  json: boolean;
  /** Send every level to stderr, keeping stdout free for command output */
  stderrOnly?: boolean;
  clock?: Clock;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `meta` to every entry; call-site meta wins on conflicts */
  child(meta: LogMeta): Logger;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Structured console logger. debug and info go to stdout unless
 * `stderrOnly` is set; warn and error always go to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];
  const clock = options.clock ?? systemClock;

  const render = (level: LogLevel, message: string, meta: LogMeta): string => {
    const timestamp = clock.newDate().toISOString();
    if (options.json) {
      return JSON.stringify({ timestamp, level, message, ...meta });
    }
    const suffix = Object.keys(meta).length === 0 ? "" : ` ${JSON.stringify(meta)}`;
    return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
  };

  const emit = (level: LogLevel, message: string, meta: LogMeta): void => {
    if (SEVERITY[level] < threshold) return;
    const line = render(level, message, meta);
    const toStderr = options.stderrOnly === true || SEVERITY[level] >= SEVERITY.warn;
    if (toStderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  const withMeta = (bound: LogMeta): Logger => ({
    debug: (message, meta) => emit("debug", message, { ...bound, ...meta }),
    info: (message, meta) => emit("info", message, { ...bound, ...meta }),
    warn: (message, meta) => emit("warn", message, { ...bound, ...meta }),
    error: (message, meta) => emit("error", message, { ...bound, ...meta }),
    child: (meta) => withMeta({ ...bound, ...meta }),
  });

  return withMeta({});
}

/** Logger that drops everything; the default wherever none is injected */
export function createNoopLogger(): Logger {
  const discard = (): void => {};
  const logger: Logger = {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    child: () => logger,
  };
  return logger;
}
