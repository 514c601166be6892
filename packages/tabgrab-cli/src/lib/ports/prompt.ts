/**
 * Result of asking the user to pick from a numbered list.
 * - `index`: zero-based position of the picked entry
 * - `default`: the user pressed Enter where a default is offered
 * - `cancelled`: the prompt was aborted (Ctrl+C / Esc)
 */
export type Choice =
  | { kind: "index"; index: number }
  | { kind: "default" }
  | { kind: "cancelled" };

/**
 * Abstraction for user prompts.
 * Allows testing interactive flows without actual user input.
 */
export interface PromptService {
  /** Ask for free text; undefined when cancelled */
  text(message: string): Promise<string | undefined>;
  /** Ask for a number between 1 and `count` */
  choose(message: string, count: number, options?: { allowDefault?: boolean }): Promise<Choice>;
}
