import chalk from "chalk";
import { CLIError, isCLIError, toCLIError } from "./types.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

const MAX_WIDTH = 80;

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

function examplesOf(error: CLIError): string[] {
  if (error.examples?.length) return error.examples;
  return error.example ? [error.example] : [];
}

/**
 * Lines of the human-readable form: message, target and details, then what to try next.
 */
export function formatError(error: CLIError, width: number = MAX_WIDTH): string[] {
  const textWidth = Math.min(width, MAX_WIDTH) - 4;
  const lines: string[] = [""];

  const [headline = "", ...moreMessage] = wrapText(error.message, textWidth, "  ");
  lines.push(`${chalk.red(SYM.error)} ${chalk.red.bold(headline)}`);
  lines.push(...moreMessage.map((line) => `  ${chalk.red(line)}`));

  const context = [error.target && error.target !== error.details ? error.target : undefined, error.details];
  const contextLines = context.flatMap((text) => (text ? wrapText(text, textWidth, "  ") : []));
  if (contextLines.length > 0) {
    lines.push("", ...contextLines.map((line) => `  ${chalk.dim(line)}`));
  }

  const examples = examplesOf(error);
  if (error.suggestion) {
    const [first = "", ...rest] = wrapText(error.suggestion, textWidth, "  ");
    lines.push("", `  ${chalk.yellow(SYM.arrow)} ${first}`, ...rest.map((line) => `    ${line}`));
  }
  if (examples.length === 1) {
    lines.push("", `  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    lines.push("", `  ${chalk.dim("Examples:")}`);
    lines.push(...examples.slice(0, 3).map((ex) => `    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`));
  }

  lines.push("");
  return lines;
}

/**
 * The `--json` form. Undefined fields are left out.
 */
export function errorDocument(error: CLIError): Record<string, unknown> {
  const doc = {
    error: true,
    kind: error.kind,
    code: error.code,
    message: error.message,
    target: error.target,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    details: error.details,
  };
  return Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== undefined));
}

/**
 * Render a fatal error to stderr, either human-readable or as JSON.
 */
export function renderError(error: CLIError, json = false): void {
  if (json) {
    console.error(JSON.stringify(errorDocument(error), null, 2));
    return;
  }
  for (const line of formatError(error, process.stderr.columns || MAX_WIDTH)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, json = false): void {
  renderError(toCLIError(error), json);
}

export { CLIError, isCLIError };
