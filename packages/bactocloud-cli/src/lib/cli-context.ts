/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Request timeout in milliseconds, when given on the command line or env */
  timeout?: number;
  /** Retry attempts per measurement, when given on the command line or env */
  retry?: number;
  /** Explicit config file path */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function readFlagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.findIndex((arg) => arg === flag);
  if (idx !== -1 && argv[idx + 1]) return argv[idx + 1];
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

function parsePositiveInt(value: string | undefined, allowZero: boolean): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 0 || (!allowZero && n === 0)) return undefined;
  return n;
}

/**
 * Initialize CLI context from command line arguments and environment.
 * Command line flags win over environment variables.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (isTruthyEnv(env.BACTOCLOUD_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthyEnv(env.BACTOCLOUD_QUIET)) {
    currentContext.quiet = true;
  }

  if (env.CI || isTruthyEnv(env.BACTOCLOUD_NO_INPUT)) {
    currentContext.noInput = true;
  }

  currentContext.timeout = parsePositiveInt(env.BACTOCLOUD_TIMEOUT, false);
  currentContext.retry = parsePositiveInt(env.BACTOCLOUD_RETRY, true);

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--no-input")) {
    currentContext.noInput = true;
  }

  const timeout = parsePositiveInt(readFlagValue(argv, "--timeout"), false);
  if (timeout !== undefined) currentContext.timeout = timeout;

  const retry = parsePositiveInt(readFlagValue(argv, "--retry"), true);
  if (retry !== undefined) currentContext.retry = retry;

  currentContext.configPath = readFlagValue(argv, "--config");

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
