/**
 * Progress spinner on stderr. Quiet and JSON mode get a silent stand-in so
 * callers never branch on the output mode themselves.
 */

import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  text: string;
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  /** Print a finished line above the spinner and keep spinning */
  print(line: string): void;
}

function createSilentSpinner(initialText = ""): Spinner {
  const spinner: Spinner = {
    text: initialText,
    start(text) {
      if (text) spinner.text = text;
      return spinner;
    },
    stop: () => spinner,
    succeed: () => spinner,
    fail: () => spinner,
    warn: () => spinner,
    print: () => {},
  };
  return spinner;
}

function createOraSpinner(initialText?: string): Spinner {
  const indicator = ora({ text: initialText, stream: process.stderr });

  const spinner: Spinner = {
    get text() {
      return indicator.text;
    },
    set text(value: string) {
      indicator.text = value;
    },
    start(text) {
      indicator.start(text);
      return spinner;
    },
    stop() {
      indicator.stop();
      return spinner;
    },
    succeed(text) {
      indicator.succeed(text);
      return spinner;
    },
    fail(text) {
      indicator.fail(text);
      return spinner;
    },
    warn(text) {
      indicator.warn(text);
      return spinner;
    },
    print(line) {
      const spinning = indicator.isSpinning;
      if (spinning) indicator.stop();
      console.error(line);
      if (spinning) indicator.start();
    },
  };
  return spinner;
}

export function createSpinner(text?: string): Spinner {
  return isQuietMode() || isJsonMode() ? createSilentSpinner(text) : createOraSpinner(text);
}
