import { readFile } from "fs/promises";
import { inputNotReadable } from "./errors/catalog.js";

/** Read targets from standard input instead of a file */
export const STDIN_PATH = "-";

export function isUrl(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://");
}

/**
 * One target per line. Blank lines and `#` comments are skipped.
 */
export function parseTargetLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Positional arguments become one target each when they are all URLs.
 * Anything else is treated as search words and joined into a single phrase.
 */
export function targetsFromArgs(args: string[]): string[] {
  const words = args.map((arg) => arg.trim()).filter((arg) => arg.length > 0);
  if (words.length === 0) return [];
  if (words.every(isUrl)) return words;
  return [words.join(" ")];
}

export function dedupePreserveOrder(items: string[]): string[] {
  return [...new Set(items)];
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Load newline-delimited targets from a file, or from stdin when `path` is "-".
 */
export async function readTargetsFile(
  path: string,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<string[]> {
  try {
    const raw = path === STDIN_PATH ? await readStream(stdin) : await readFile(path, "utf-8");
    return parseTargetLines(raw);
  } catch (error) {
    throw inputNotReadable(path === STDIN_PATH ? "stdin" : path, error);
  }
}

export interface CollectTargetsOptions {
  args: string[];
  file?: string;
  interactive: boolean;
  stdin?: NodeJS.ReadableStream;
  /** Whether stdin is a terminal; piped stdin is read when nothing else was given */
  stdinIsTTY?: boolean;
}

/**
 * Gather targets from argv, the `--file` option and piped stdin, de-duplicated.
 */
export async function collectTargets({
  args,
  file,
  interactive,
  stdin = process.stdin,
  stdinIsTTY = Boolean(process.stdin.isTTY),
}: CollectTargetsOptions): Promise<string[]> {
  const targets = targetsFromArgs(args);

  if (file) {
    targets.push(...(await readTargetsFile(file, stdin)));
  } else if (targets.length === 0 && !stdinIsTTY && !interactive) {
    targets.push(...(await readTargetsFile(STDIN_PATH, stdin)));
  }

  return dedupePreserveOrder(targets);
}
