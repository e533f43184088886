import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

export const interactivePrompts: PromptService = {
  async secret(message) {
    const answers = await prompts({ type: "password", name: "secret", message });
    const value: unknown = answers.secret;
    return typeof value === "string" && value.length > 0 ? value : undefined;
  },
};
