import { getContext, isJsonMode } from "./cli-context.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import {
  ConfCredentialStore,
  createApiClient,
  type ApiClient,
  type CredentialStore,
} from "./api-client.js";
import type { Clock, PromptService, SignalHandler } from "./ports/index.js";
import {
  createProcessSignalHandler,
  interactivePrompts,
  systemClock,
} from "./adapters/index.js";

/** Everything a command needs once flags and config files are read */
export interface Runtime {
  config: ResolvedConfig;
  sources: string[];
  logger: Logger;
  api: ApiClient;
}

/**
 * Dependencies handed to every command. Production values come from
 * `createCommandDeps`; tests pass fakes.
 */
export interface CommandDeps {
  runtime(overrides?: Partial<ResolvedConfig>): Runtime;
  credentials: CredentialStore;
  prompts: PromptService;
  signals: SignalHandler;
  clock: Clock;
  env: NodeJS.ProcessEnv;
}

/**
 * Resolve config from files, env and global flags, then build the logger and
 * API client on top of it.
 */
export function createRuntime(
  overrides: Partial<ResolvedConfig> = {},
  clock: Clock = systemClock
): Runtime {
  const ctx = getContext();
  const { config, sources } = loadConfig(ctx.configPath, {
    timeoutMs: ctx.timeout,
    retryAttempts: ctx.retry,
    ...overrides,
  });

  // stdout carries command results; logs always go to stderr
  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson || isJsonMode(),
    stderrOnly: true,
    clock,
  });

  const api = createApiClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    pageSize: config.pageSize,
    clock,
    logger,
  });

  logger.debug("Configuration resolved", { sources, baseUrl: config.baseUrl });

  return { config, sources, logger, api };
}

export function createCommandDeps(): CommandDeps {
  return {
    runtime: (overrides) => createRuntime(overrides, systemClock),
    credentials: new ConfCredentialStore(),
    prompts: interactivePrompts,
    signals: createProcessSignalHandler(),
    clock: systemClock,
    env: process.env,
  };
}
