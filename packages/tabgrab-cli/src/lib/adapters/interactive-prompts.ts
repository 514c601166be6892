import prompts from "prompts";
import type { Choice, PromptService } from "../ports/prompt.js";

/**
 * Validate a typed list selection. Returns true or the message to show.
 */
export function validateChoice(input: string, count: number, allowDefault: boolean): true | string {
  const trimmed = input.trim();
  if (trimmed === "" && allowDefault) return true;
  if (!/^\d+$/.test(trimmed)) return "Please enter a number from the list.";
  const value = Number.parseInt(trimmed, 10);
  if (value < 1 || value > count) return "Please enter a valid number from the list.";
  return true;
}

/**
 * Turn a validated answer into a Choice.
 */
export function parseChoice(input: string): Choice {
  const trimmed = input.trim();
  if (trimmed === "") return { kind: "default" };
  return { kind: "index", index: Number.parseInt(trimmed, 10) - 1 };
}

/**
 * Real prompt service using the 'prompts' package.
 */
export const interactivePrompts: PromptService = {
  async text(message: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "text",
      name: "value",
      message,
    });
    return typeof value === "string" ? value : undefined;
  },

  async choose(message: string, count: number, options = {}): Promise<Choice> {
    const allowDefault = options.allowDefault ?? false;
    const { value } = await prompts({
      type: "text",
      name: "value",
      message,
      validate: (input: string) => validateChoice(input, count, allowDefault),
    });
    if (typeof value !== "string") return { kind: "cancelled" };
    return parseChoice(value);
  },
};
