import { Command } from "commander";
import chalk from "chalk";
import type { CredentialStore } from "../lib/api-client.js";
import type { PromptService } from "../lib/ports/prompt.js";
import type { CommandDeps } from "../lib/runtime.js";
import { missingApiKey } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";
import { isJsonMode, isNonInteractive } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { outputSuccess, type AuthStatusJson } from "../lib/json-output.js";

export type ApiKeySource = "flag" | "env" | "store" | "prompt";

export interface ApiKeyOptions {
  /** Value of --api-key */
  apiKey?: string;
  env?: NodeJS.ProcessEnv;
  /** Omitted when a stored key must not be reused, as in `auth login` */
  store?: CredentialStore;
  prompts?: PromptService;
  nonInteractive?: boolean;
}

export const API_KEY_ENV = "BACTOCLOUD_API_KEY";

/**
 * Find the API key: --api-key, then BACTOCLOUD_API_KEY, then the stored key,
 * then an interactive prompt.
 */
export async function resolveApiKey(
  options: ApiKeyOptions
): Promise<{ apiKey: string; source: ApiKeySource }> {
  if (options.apiKey?.trim()) {
    return { apiKey: options.apiKey.trim(), source: "flag" };
  }

  const fromEnv = options.env?.[API_KEY_ENV]?.trim();
  if (fromEnv) return { apiKey: fromEnv, source: "env" };

  const stored = options.store?.getApiKey();
  if (stored) return { apiKey: stored, source: "store" };

  if (options.nonInteractive || !options.prompts) {
    throw missingApiKey();
  }

  const prompted = (await options.prompts.secret("BactoCloud API key"))?.trim();
  if (!prompted) {
    throw missingApiKey();
  }

  return { apiKey: prompted, source: "prompt" };
}

export function registerAuthCommands(program: Command, deps: CommandDeps): void {
  const auth = program.command("auth").description("Manage the stored BactoCloud API key");

  auth
    .command("login")
    .description("Verify an API key and store it for future runs")
    .option("-k, --api-key <key>", "BactoCloud API key (prompted for when omitted)")
    .action(async (options: { apiKey?: string }) => {
      const spinner = createSpinner();
      try {
        const { apiKey } = await resolveApiKey({
          apiKey: options.apiKey,
          prompts: deps.prompts,
          nonInteractive: isNonInteractive(),
        });

        spinner.start("Verifying API key");
        const { api } = deps.runtime();
        await api.authenticate(apiKey);
        deps.credentials.setApiKey(apiKey);
        spinner.succeed("API key verified and saved");

        if (isJsonMode()) outputSuccess({ stored: true, valid: true });
      } catch (error) {
        spinner.fail("Login failed");
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  auth
    .command("logout")
    .description("Remove the stored API key")
    .action(() => {
      deps.credentials.clearApiKey();
      if (isJsonMode()) {
        outputSuccess({ stored: false });
      } else {
        console.log(chalk.green("Stored API key removed."));
      }
    });

  auth
    .command("status")
    .description("Check whether an API key is available and accepted")
    .option("-k, --api-key <key>", "BactoCloud API key")
    .action(async (options: { apiKey?: string }) => {
      let status: AuthStatusJson;
      try {
        status = await checkAuthStatus(deps, options.apiKey);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
        return;
      }

      if (isJsonMode()) {
        outputSuccess(status);
      } else if (!status.stored) {
        console.log(chalk.yellow("No API key configured. Run `bactocloud auth login`."));
      } else if (status.valid) {
        console.log(chalk.green(`API key from ${status.source} is valid.`));
      } else {
        console.log(
          chalk.red(`API key from ${status.source} was rejected: ${status.error?.message ?? "unknown error"}`)
        );
      }

      if (!status.valid) process.exitCode = 1;
    });
}

export async function checkAuthStatus(deps: CommandDeps, apiKey?: string): Promise<AuthStatusJson> {
  let resolved: { apiKey: string; source: ApiKeySource };
  try {
    resolved = await resolveApiKey({
      apiKey,
      env: deps.env,
      store: deps.credentials,
      nonInteractive: true,
    });
  } catch (error) {
    if (isCLIError(error) && error.code === "AUTH_MISSING_KEY") return { stored: false };
    throw error;
  }

  const source = resolved.source === "prompt" ? "flag" : resolved.source;
  try {
    await deps.runtime().api.authenticate(resolved.apiKey);
    return { stored: true, source, valid: true };
  } catch (error) {
    if (!isCLIError(error)) throw error;
    return {
      stored: true,
      source,
      valid: false,
      error: { code: error.code, message: error.message },
    };
  }
}
