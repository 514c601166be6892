import { Command, Option } from "commander";
import chalk from "chalk";
import type { Asset } from "../lib/asset.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";
import { createFetchDownloadService } from "../lib/adapters/fetch-download.js";
import { isJsonRun, resolveRunConfig, type CliFlags, type RunConfig } from "../lib/config.js";
import { downloadAsset } from "../lib/downloader.js";
import { emptySearch, missingTargets } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { toCLIError, type CLIError } from "../lib/errors/types.js";
import { createHttpClient, DEFAULT_DOWNLOAD_TIMEOUT_MS } from "../lib/http-client.js";
import { errorToJson, outputResult, type DownloadResultJson, type ItemResultJson } from "../lib/json-output.js";
import { resolveTarget } from "../lib/locator.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { DownloadService } from "../lib/ports/download.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { createSongsterrApi, type SongsterrApi } from "../lib/songsterr-api.js";
import { createProgress, type Progress } from "../lib/progress.js";
import { collectTargets } from "../lib/targets.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchTabsDeps {
  api: SongsterrApi;
  downloader: DownloadService;
  prompts: PromptService;
  logger: Logger;
}

/** Overrides for the real collaborators; tests inject fakes here. */
export interface FetchTabsOptions extends Partial<FetchTabsDeps> {
  env?: NodeJS.ProcessEnv;
  stdin?: NodeJS.ReadableStream;
  stdinIsTTY?: boolean;
}

export type ItemResult =
  | { target: string; status: "ok"; asset: Asset; filePath: string }
  | { target: string; status: "failed"; error: CLIError };

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFetchCommand(program: Command, options: FetchTabsOptions = {}): void {
  program
    .argument("[targets...]", "Songsterr tab URLs, or search words")
    .option("-i, --interactive", "Choose among search results and revisions")
    .option("-f, --file <path>", "Read one URL or search phrase per line ('-' for stdin)")
    .option("-o, --output <dir>", "Output directory (default: ./output)")
    .addOption(new Option("--out <dir>").hideHelp())
    .option("--max-results <n>", "Maximum search results to consider (default: 20)")
    .option("--timeout <ms>", "Per-request timeout in milliseconds (default: 15000)")
    .option("--json", "Print a JSON summary instead of status lines")
    .option("-q, --quiet", "Hide progress spinners")
    .option("-v, --verbose", "Log requests and selections")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  tabgrab https://www.songsterr.com/a/wsa/band-song-tab-s12345
  tabgrab -o ./tabs URL1 URL2
  tabgrab -i band song          ${chalk.gray("Search and pick interactively")}
  tabgrab band song             ${chalk.gray("Take the top search result")}
  tabgrab -f urls.txt
  cat urls.txt | tabgrab -f -
`
    )
    .action(async (targets: string[], flags: CliFlags) => {
      try {
        process.exitCode = await fetchTabs(targets, flags, options);
      } catch (error) {
        renderUnknownError(error, isJsonRun(flags, options.env));
        process.exitCode = 1;
      }
    });
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Resolve and download one target. Errors are captured in the result so the
 * batch can carry on with the next target.
 */
export async function processTarget(
  target: string,
  config: RunConfig,
  deps: FetchTabsDeps,
  progress: Progress,
  index = 0
): Promise<ItemResult[]> {
  const logger = deps.logger.child({ target });

  try {
    progress.update(index, `Resolving ${target}`);
    const assets = await resolveTarget(target, {
      api: deps.api,
      prompts: deps.prompts,
      interactive: config.interactive,
      maxResults: config.maxResults,
      logger,
    });

    const results: ItemResult[] = [];
    for (const asset of assets) {
      progress.update(index, `Downloading ${asset.fileName}`);
      const filePath = await downloadAsset(asset, config.outputDir, deps.downloader, logger);
      results.push({ target, status: "ok", asset, filePath });
    }
    return results;
  } catch (error) {
    const cliError = toCLIError(error);
    logger.debug("Target failed", { code: cliError.code, kind: cliError.kind });
    return [{ target, status: "failed", error: cliError }];
  } finally {
    progress.stop();
  }
}

function printItem(result: ItemResult): void {
  if (result.status === "ok") {
    console.log(`${chalk.green("OK:")} ${result.asset.fileName}`);
  } else {
    console.error(`${chalk.red("FAILED:")} ${result.target}: ${result.error.message}`);
  }
}

/**
 * Process targets one after another, printing a status line per item.
 */
export async function runBatch(
  targets: string[],
  config: RunConfig,
  deps: FetchTabsDeps
): Promise<ItemResult[]> {
  const progress = createProgress(targets.length, config.quiet || config.interactive);
  const results: ItemResult[] = [];
  for (const [index, target] of targets.entries()) {
    const itemResults = await processTarget(target, config, deps, progress, index);
    if (!config.json) itemResults.forEach(printItem);
    results.push(...itemResults);
  }
  return results;
}

function toJson(results: ItemResult[]): DownloadResultJson {
  const items = results.map((result): ItemResultJson =>
    result.status === "ok"
      ? {
          target: result.target,
          status: "ok",
          file: {
            path: result.filePath,
            name: result.asset.fileName,
            songId: result.asset.songId,
            revisionId: result.asset.revisionId,
            url: result.asset.url,
          },
        }
      : { target: result.target, status: "failed", error: errorToJson(result.error) }
  );
  const downloaded = items.filter((item) => item.status === "ok").length;
  return {
    items,
    summary: { total: items.length, downloaded, failed: items.length - downloaded },
  };
}

function printSummary(results: ItemResult[]): void {
  const downloaded = results.filter((result) => result.status === "ok").length;
  const failed = results.length - downloaded;
  const line = `Downloaded ${downloaded}/${results.length} tab(s)`;
  console.log(failed > 0 ? chalk.yellow(`\n${line}, ${failed} failed`) : chalk.green(`\n${line}`));
}

/**
 * Entry point for a run: validate options, gather targets, process them and
 * report. Returns the process exit code. Usage errors are thrown before any
 * target is processed.
 */
export async function fetchTabs(
  args: string[],
  flags: CliFlags,
  options: FetchTabsOptions = {}
): Promise<number> {
  const startedAt = Date.now();
  const config = resolveRunConfig(flags, options.env);

  const logger =
    options.logger ??
    createLogger({ level: config.logLevel, json: config.json, sink: config.json ? "stderr" : "split" });
  const http = createHttpClient({ timeoutMs: config.timeoutMs, logger });
  const deps: FetchTabsDeps = {
    api: options.api ?? createSongsterrApi(http, config.baseUrl),
    downloader:
      options.downloader ??
      createFetchDownloadService(http, Math.max(config.timeoutMs, DEFAULT_DOWNLOAD_TIMEOUT_MS)),
    prompts: options.prompts ?? interactivePrompts,
    logger,
  };

  const targets = await collectTargets({
    args,
    file: config.file,
    interactive: config.interactive,
    stdin: options.stdin,
    stdinIsTTY: options.stdinIsTTY,
  });

  if (targets.length === 0) {
    if (!config.interactive) throw missingTargets();
    const searchText = (await deps.prompts.text("Search text"))?.trim();
    if (!searchText) throw emptySearch();
    targets.push(searchText);
  }

  logger.debug("Starting run", { targets: targets.length, outputDir: config.outputDir });
  const results = await runBatch(targets, config, deps);
  const allSucceeded = results.every((result) => result.status === "ok");

  if (config.json) {
    outputResult(toJson(results), allSucceeded, { durationMs: Date.now() - startedAt });
  } else {
    printSummary(results);
  }

  return allSucceeded ? 0 : 1;
}
