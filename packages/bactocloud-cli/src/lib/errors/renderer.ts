import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";

const MAX_WIDTH = 80;

/**
 * Greedy word wrap. Words longer than `width` stay on their own line.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(" ")) {
    if (current && current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/**
 * Terminal lines for an error: the message, any server details, then the
 * suggestion and an example command.
 */
export function formatError(error: CLIError, columns: number = process.stdout.columns || MAX_WIDTH): string[] {
  const width = Math.min(columns, MAX_WIDTH) - 4;
  const out: string[] = [""];

  const [headline = "", ...rest] = wrapText(error.message, width);
  out.push(`${chalk.red("✗")} ${chalk.red.bold(headline)}`);
  out.push(...rest.map((line) => `  ${chalk.red(line)}`));

  if (error.details) {
    out.push("");
    for (const paragraph of error.details.split("\n")) {
      out.push(...wrapText(paragraph, width).map((line) => `  ${chalk.dim(line)}`));
    }
  }

  if (error.suggestion) {
    const [first = "", ...more] = wrapText(error.suggestion, width);
    out.push("", `  ${chalk.yellow("→")} ${first}`, ...more.map((line) => `    ${line}`));
  }

  if (error.example) {
    out.push("", `  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  out.push("");
  return out;
}

/** The `--json` shape of an error; undefined fields are left out */
export function toErrorJson(error: CLIError): Record<string, string | boolean> {
  const fields: Record<string, string | boolean | undefined> = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };
  const json: Record<string, string | boolean> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) json[key] = value;
  }
  return json;
}

/**
 * Write an error to stderr, as JSON in `--json` mode.
 */
export function renderError(error: CLIError, json: boolean = isJsonMode()): void {
  if (json) {
    console.error(JSON.stringify(toErrorJson(error), null, 2));
    return;
  }
  formatError(error).forEach((line) => console.error(line));
}

export function renderUnknownError(error: unknown, json?: boolean): void {
  renderError(isCLIError(error) ? error : unknownError(error), json);
}
