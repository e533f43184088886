import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { CLIError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/bactocloud/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "bactocloud",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  baseUrl: "https://api.bactocloud.com",
  timeoutMs: 30000,
  pageSize: 100,
  outputDir: "./downloads",
  retryAttempts: 2,
  retryDelayMs: 1000,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  api: z
    .object({
      baseUrl: z.string().url().optional(),
      timeoutMs: z.number().int().min(1000).max(600000).optional(),
      pageSize: z.number().int().min(1).max(1000).optional(),
    })
    .optional(),
  download: z
    .object({
      outputDir: z.string().min(1).optional(),
      retryAttempts: z.number().int().min(0).max(10).optional(),
      retryDelayMs: z.number().int().min(0).max(300000).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  baseUrl: string;
  timeoutMs: number;
  pageSize: number;
  outputDir: string;
  retryAttempts: number;
  retryDelayMs: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and validate one YAML config file. A missing file yields undefined,
 * an empty one `{}`; anything unreadable or invalid throws
 * VALIDATION_CONFIG_INVALID listing every problem.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) return undefined;

  let document: unknown;
  try {
    document = parseYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw invalidConfig(path, [reason(error)]);
  }
  if (document === null || document === undefined) return {};

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.api?.baseUrl !== undefined) target.baseUrl = source.api.baseUrl;
  if (source.api?.timeoutMs !== undefined) target.timeoutMs = source.api.timeoutMs;
  if (source.api?.pageSize !== undefined) target.pageSize = source.api.pageSize;
  if (source.download?.outputDir !== undefined) {
    target.outputDir = source.download.outputDir;
  }
  if (source.download?.retryAttempts !== undefined) {
    target.retryAttempts = source.download.retryAttempts;
  }
  if (source.download?.retryDelayMs !== undefined) {
    target.retryDelayMs = source.download.retryDelayMs;
  }
  if (source.logging?.level !== undefined) target.logLevel = source.logging.level;
  if (source.logging?.json !== undefined) target.logJson = source.logging.json;
}

/**
 * Overrides read from the environment, below CLI flags and above config files.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigFile {
  const fromEnv: ConfigFile = {};
  if (env.BACTOCLOUD_BASE_URL) {
    fromEnv.api = { baseUrl: env.BACTOCLOUD_BASE_URL };
  }
  if (env.BACTOCLOUD_OUTPUT_DIR) {
    fromEnv.download = { outputDir: env.BACTOCLOUD_OUTPUT_DIR };
  }
  const level = LogLevelSchema.safeParse(env.BACTOCLOUD_LOG_LEVEL);
  if (level.success) {
    fromEnv.logging = { level: level.data };
  }
  return fromEnv;
}

/** CLI overrides in config-file shape, so they layer like any other source */
function fromCliOptions(cli: Partial<ResolvedConfig>): ConfigFile {
  return {
    api: { baseUrl: cli.baseUrl, timeoutMs: cli.timeoutMs, pageSize: cli.pageSize },
    download: {
      outputDir: cli.outputDir,
      retryAttempts: cli.retryAttempts,
      retryDelayMs: cli.retryDelayMs,
    },
    logging: { level: cli.logLevel, json: cli.logJson },
  };
}

/**
 * Merge configuration sources, lowest precedence first:
 * defaults < system file < user file < environment < CLI flags.
 * Unset values never override.
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig?: ConfigFile,
  systemConfig?: ConfigFile,
  envConfig?: ConfigFile
): ResolvedConfig {
  const config: ResolvedConfig = { ...CONFIG_DEFAULTS, logLevel: "warn", logJson: false };
  const layers = [systemConfig, userConfig, envConfig, fromCliOptions(cliOptions)];
  for (const layer of layers) {
    if (layer) applyConfigFile(config, layer);
  }
  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file, used in place
 *   of the system and user files
 * @param cliOptions - Values given as command line flags
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw new CLIError("VALIDATION_CONFIG_INVALID", `Config file not found: ${explicitPath}`);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv());

  return { config, sources };
}
