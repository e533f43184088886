export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { PromptService } from "./prompt.js";
export type { SignalHandler } from "./signal-handler.js";
