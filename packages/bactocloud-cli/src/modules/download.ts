import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import type { CommandDeps } from "../lib/runtime.js";
import { resolveApiKey } from "./auth.js";
import { createDateRange } from "../lib/date-range.js";
import {
  runDownload,
  type DeviceSelection,
  type DownloadEvent,
  type DownloadSummary,
} from "../lib/downloader.js";
import { invalidOption, missingArgument } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode, isNonInteractive } from "../lib/cli-context.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { outputNdjson, toEventJson } from "../lib/json-output.js";
import type { Clock } from "../lib/ports/clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  from?: string;
  to?: string;
  device?: string[];
  all?: boolean;
  outputDir?: string;
  apiKey?: string;
}

/** Exit status for a run stopped by SIGINT/SIGTERM */
export const EXIT_CANCELLED = 130;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: CommandDeps): void {
  program
    .command("download")
    .description("Download measurements (metadata and FCS files) for a date range")
    .option("-f, --from <date>", "First day to include (YYYY-MM-DD)")
    .option("-t, --to <date>", "Last day to include (YYYY-MM-DD)")
    .option("-d, --device <serial...>", "Device serial number(s)")
    .option("-a, --all", "Download from every device the key can see")
    .option("-o, --output-dir <dir>", "Output directory (default: ./downloads)")
    .option("-k, --api-key <key>", "BactoCloud API key")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Output layout:")}
  <output-dir>/<serial>/<YYYY-MM-DD_HH-mm-ss>_<name>/measurement.json
  <output-dir>/<serial>/<YYYY-MM-DD_HH-mm-ss>_<name>/data.fcs

${chalk.bold.cyan("Examples:")}
  bactocloud download -f 2024-01-01 -t 2024-01-31 -d SN001 SN002
  bactocloud download -f 2024-01-15 -t 2024-01-15 --all -o ./january
  bactocloud download -f 2024-01-01 -t 2024-01-31 --all --json   ${chalk.gray("NDJSON progress")}
`
    )
    .action(async (options: DownloadOptions) => {
      try {
        const summary = await downloadMeasurements(deps, options);
        process.exitCode = exitCodeFor(summary);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function parseDeviceSelection(options: DownloadOptions): DeviceSelection {
  const serials = (options.device ?? []).map((serial) => serial.trim()).filter(Boolean);

  if (options.all && serials.length > 0) {
    throw invalidOption("all", "cannot be combined with --device");
  }
  if (options.all) return "all";
  if (serials.length === 0) {
    throw missingArgument(
      "--device or --all",
      "download",
      "bactocloud download -f 2024-01-01 -t 2024-01-31 -d SN001"
    );
  }
  return serials;
}

export function exitCodeFor(summary: DownloadSummary): number {
  if (summary.cancelled) return EXIT_CANCELLED;
  return summary.failed > 0 ? 1 : 0;
}

/**
 * Render downloader events for a terminal: spinner text for progress, one
 * line per finished or failed measurement.
 */
export function createHumanReporter(spinner: Spinner): (event: DownloadEvent) => void {
  return (event) => {
    switch (event.type) {
      case "state":
        if (event.state === "listing") spinner.text = "Listing devices and measurements";
        if (event.state === "filtering") spinner.text = "Filtering by date";
        break;
      case "device":
        spinner.print(chalk.cyan(`${event.device.serialNumber}: ${event.inRange} measurement(s) in range`));
        break;
      case "progress": {
        const counter = chalk.gray(`[${event.index}/${event.total}]`);
        if (event.status === "failed") {
          spinner.print(`${counter} ${chalk.red("✗")} ${event.serial} ${event.name}: ${event.error?.message ?? "failed"}`);
        } else if (event.status === "metadata-only") {
          spinner.print(`${counter} ${chalk.yellow("!")} ${event.serial} ${event.name} (no FCS file)`);
        } else {
          spinner.print(`${counter} ${chalk.green("✓")} ${event.serial} ${event.name}`);
        }
        spinner.text = `Downloading ${event.index}/${event.total}`;
        break;
      }
      case "complete":
        break;
    }
  };
}

export function createJsonReporter(clock: Clock): (event: DownloadEvent) => void {
  return (event) => outputNdjson(toEventJson(event, clock.newDate().toISOString()));
}

export function printSummary(summary: DownloadSummary): void {
  console.log("");
  console.log(chalk.bold("=== Download Complete ==="));
  console.log(`Output:     ${summary.outputDir}`);
  console.log(`Downloaded: ${chalk.green(String(summary.succeeded))} of ${summary.total}`);
  if (summary.failed > 0) {
    console.log(`Failed:     ${chalk.red(String(summary.failed))}`);
    for (const failure of summary.failures) {
      console.log(chalk.red(`  • ${failure.serial} ${failure.name} (${failure.code}): ${failure.message}`));
    }
  }
  if (summary.cancelled) {
    console.log(chalk.yellow(`Cancelled:  ${summary.skipped} measurement(s) not attempted`));
  }
}

// ---------------------------------------------------------------------------
// Core
// ---------------------------------------------------------------------------

export async function downloadMeasurements(
  deps: CommandDeps,
  options: DownloadOptions
): Promise<DownloadSummary> {
  if (!options.from) {
    throw missingArgument("--from", "download");
  }
  const range = createDateRange(options.from, options.to ?? options.from);
  const devices = parseDeviceSelection(options);

  const { config, logger, api } = deps.runtime({ outputDir: options.outputDir });
  const { apiKey } = await resolveApiKey({
    apiKey: options.apiKey,
    env: deps.env,
    store: deps.credentials,
    prompts: deps.prompts,
    nonInteractive: isNonInteractive(),
  });

  const json = isJsonMode();
  const spinner = createSpinner("Authenticating");
  const onEvent = json ? createJsonReporter(deps.clock) : createHumanReporter(spinner);

  const controller = new AbortController();
  deps.signals.onInterrupt(() => {
    controller.abort();
    spinner.warn("Stopping after the current measurement");
    spinner.start();
  });

  spinner.start();
  try {
    const summary = await runDownload(
      {
        apiKey,
        devices,
        range,
        outputDir: resolve(config.outputDir),
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
        signal: controller.signal,
      },
      { api, logger, clock: deps.clock, onEvent }
    );

    if (summary.failed > 0 || summary.cancelled) {
      spinner.warn("Download finished with problems");
    } else {
      spinner.succeed("Download finished");
    }
    if (!json) printSummary(summary);
    return summary;
  } catch (error) {
    spinner.fail("Download failed");
    throw error;
  } finally {
    deps.signals.removeAll();
  }
}
