import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { Device } from "../lib/models.js";
import type { CommandDeps } from "../lib/runtime.js";
import { resolveApiKey } from "./auth.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode, isNonInteractive } from "../lib/cli-context.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { outputSuccess, type DevicesResultJson } from "../lib/json-output.js";

export function registerDevicesCommand(program: Command, deps: CommandDeps): void {
  program
    .command("devices")
    .description("List the devices the API key can see")
    .option("-k, --api-key <key>", "BactoCloud API key")
    .action(async (options: { apiKey?: string }) => {
      try {
        const devices = await listDevices(deps, options.apiKey);
        if (isJsonMode()) {
          const result: DevicesResultJson = { devices };
          outputSuccess(result);
        } else {
          console.log(formatDeviceTable(devices));
        }
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}

export async function listDevices(deps: CommandDeps, apiKey?: string): Promise<Device[]> {
  const { apiKey: key } = await resolveApiKey({
    apiKey,
    env: deps.env,
    store: deps.credentials,
    prompts: deps.prompts,
    nonInteractive: isNonInteractive(),
  });

  const { api } = deps.runtime();
  const spinner = createSpinner("Loading devices").start();
  try {
    const session = await api.authenticate(key);
    const devices = await api.listDevices(session);
    spinner.succeed(`Loaded ${devices.length} device${devices.length === 1 ? "" : "s"}`);
    return devices;
  } catch (error) {
    spinner.fail("Unable to load devices");
    throw error;
  }
}

export function formatDeviceTable(devices: readonly Device[]): string {
  if (devices.length === 0) {
    return chalk.yellow("No devices found.");
  }

  const table = new CliTable3({
    head: ["Serial", "Name", "Organization"],
    style: { head: ["cyan"] },
  });
  for (const device of devices) {
    table.push([device.serialNumber, device.name, device.organizationId ?? ""]);
  }
  return table.toString();
}
