#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createCommandDeps } from "./lib/runtime.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerDevicesCommand } from "./modules/devices.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return z.object({ version: z.string() }).parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("bactocloud")
    .description("Download BactoCloud measurements by device and date range")
    .version(readVersion())
    .option("--json", "Machine-readable output (NDJSON progress for downloads)")
    .option("-q, --quiet", "Hide spinners and progress")
    .option("--no-input", "Fail instead of prompting")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .option("--retry <n>", "Retry attempts per measurement")
    .option("--config <path>", "Config file to use instead of the system/user files");

  const deps = createCommandDeps();

  registerAuthCommands(program, deps);
  registerDevicesCommand(program, deps);
  registerDownloadCommand(program, deps);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
