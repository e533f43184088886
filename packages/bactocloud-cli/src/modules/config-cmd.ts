import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { isCLIError } from "../lib/errors/types.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type ConfigCheckJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# BactoCloud downloader configuration
# Place at ~/.config/bactocloud/config.yaml (user) or /etc/bactocloud/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (BACTOCLOUD_BASE_URL, BACTOCLOUD_OUTPUT_DIR, BACTOCLOUD_LOG_LEVEL)
# 3. User config (~/.config/bactocloud/config.yaml)
# 4. System config (/etc/bactocloud/config.yaml)
# 5. Built-in defaults
#
# The API key is not read from this file. Use \`bactocloud auth login\`
# or the BACTOCLOUD_API_KEY environment variable.

api:
  baseUrl: "https://api.bactocloud.com"

  # Per-request timeout (ms)
  timeoutMs: 30000

  # Measurements requested per page when listing (1-1000)
  pageSize: 100

download:
  # Root of the <serial>/<timestamp>_<name>/ tree
  outputDir: "./downloads"

  # Extra attempts per measurement after a network or server error
  retryAttempts: 2

  # Base delay between attempts (exponential backoff applied)
  retryDelayMs: 1000

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines on stderr
  json: false
`;

function describeError(error: unknown): string {
  if (isCLIError(error) && error.details) return `${error.message}\n${error.details}`;
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Write EXAMPLE_CONFIG to `targetPath`. Returns false, writing nothing, when a
 * file is already there.
 */
export function writeExampleConfig(targetPath: string): boolean {
  if (existsSync(targetPath)) return false;
  mkdirSync(dirname(targetPath), { recursive: true });
  writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
  return true;
}

export function checkConfigFile(path: string): ConfigCheckJson {
  if (!existsSync(path)) return { path, status: "missing" };
  try {
    loadConfigFile(path);
    return { path, status: "valid" };
  } catch (error) {
    return { path, status: "invalid", error: describeError(error) };
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage downloader configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", "Create system-wide config at /etc/bactocloud/config.yaml")
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      try {
        if (!writeExampleConfig(targetPath)) {
          console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${describeError(error)}`));
        if (options.global) console.error(chalk.gray("System config may require sudo."));
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const checks = (options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH])
        .map(checkConfigFile)
        // without -c, absent default files are not an error
        .filter((check) => options.config !== undefined || check.status !== "missing");

      const failed = checks.some((check) => check.status !== "valid");
      if (failed) process.exitCode = 1;

      if (isJsonMode()) {
        outputSuccess({ files: checks });
        return;
      }

      if (checks.length === 0) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'bactocloud config init' to create one."));
        return;
      }

      for (const check of checks) {
        if (check.status === "valid") {
          console.log(chalk.green(`✓ ${check.path}`));
        } else if (check.status === "missing") {
          console.error(chalk.red(`✗ ${check.path}: file not found`));
        } else {
          console.error(chalk.red(`✗ ${check.path}: ${check.error ?? "invalid"}`));
        }
      }
      if (!failed) console.log(chalk.green("All configuration files are valid."));
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (isJsonMode()) {
          const result: ConfigShowJson = { effective: { ...resolved }, sources };
          outputSuccess(result);
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));
        const sections: Array<[string, Array<[string, string | number | boolean]>]> = [
          ["API", [["baseUrl", resolved.baseUrl], ["timeoutMs", resolved.timeoutMs], ["pageSize", resolved.pageSize]]],
          ["Download", [["outputDir", resolved.outputDir], ["retryAttempts", resolved.retryAttempts], ["retryDelayMs", resolved.retryDelayMs]]],
          ["Logging", [["level", resolved.logLevel], ["json", resolved.logJson]]],
        ];
        for (const [title, entries] of sections) {
          console.log();
          console.log(chalk.bold(`${title}:`));
          for (const [key, value] of entries) {
            console.log(`  ${`${key}:`.padEnd(16)}${value}`);
          }
        }
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${describeError(error)}`));
        process.exitCode = 1;
      }
    });
}
