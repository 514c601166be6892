import chalk from "chalk";
import CliTable3 from "cli-table3";
import { createAsset, type Asset } from "./asset.js";
import { invalidTabUrl, noRevisions, selectionCancelled } from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { PromptService } from "./ports/prompt.js";
import { chooseSong, searchSongs } from "./search.js";
import type { Revision, SongsterrApi } from "./songsterr-api.js";
import { isUrl } from "./targets.js";

export interface ResolveContext {
  api: SongsterrApi;
  prompts: PromptService;
  interactive: boolean;
  maxResults: number;
  logger?: Logger;
}

/** `...-tab-s505453`, optionally with a track suffix (`t2`) or a trailing slash */
const SONG_ID_PATTERN = /-s(\d+)(?:t\d+)?\/?$/;

function isSongsterrHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return host === "songsterr.com" || host.endsWith(".songsterr.com");
}

/**
 * Extract the numeric song id from a Songsterr tab URL.
 */
export function extractSongId(target: string): number {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    throw invalidTabUrl(target, "unparseable URL");
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalidTabUrl(target, `unsupported scheme "${url.protocol}"`);
  }
  if (!isSongsterrHost(url.hostname)) {
    throw invalidTabUrl(target, `unexpected host "${url.hostname}"`);
  }

  const match = SONG_ID_PATTERN.exec(url.pathname);
  if (!match?.[1]) {
    throw invalidTabUrl(target, "no song id in path");
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Highest revisionId wins.
 */
export function latestRevision(revisions: Revision[]): Revision | undefined {
  return revisions.reduce<Revision | undefined>(
    (latest, rev) => (latest === undefined || rev.revisionId > latest.revisionId ? rev : latest),
    undefined
  );
}

export function formatRevisionTable(revisions: Revision[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Revision"), chalk.cyan("Created"), chalk.cyan("Author")],
  });
  revisions.forEach((rev, idx) => {
    table.push([String(idx + 1), String(rev.revisionId), rev.createdAt ?? "?", rev.author ?? "?"]);
  });
  return table.toString();
}

/**
 * Pick a revision: the latest unless running interactively with several to choose from.
 */
export async function chooseRevision(
  songId: number,
  revisions: Revision[],
  prompts: PromptService,
  interactive: boolean
): Promise<Revision> {
  const latest = latestRevision(revisions);
  if (!latest) throw noRevisions(songId);
  if (!interactive || revisions.length === 1) return latest;

  console.log(chalk.bold("Available revisions:"));
  console.log(formatRevisionTable(revisions));

  const choice = await prompts.choose("Choose a revision number (Enter for latest)", revisions.length, {
    allowDefault: true,
  });
  switch (choice.kind) {
    case "default":
      return latest;
    case "index": {
      const picked = revisions[choice.index];
      if (picked) return picked;
      throw selectionCancelled();
    }
    case "cancelled":
      throw selectionCancelled();
  }
}

/**
 * Turn a target into a song id, searching when it isn't a URL.
 */
export async function resolveSongId(target: string, ctx: ResolveContext): Promise<number> {
  if (isUrl(target)) return extractSongId(target);

  const results = await searchSongs(ctx.api, target, ctx.maxResults);
  const song = await chooseSong(target, results, ctx.prompts, ctx.interactive);
  (ctx.logger ?? createNoopLogger()).debug("Selected song", {
    songId: song.songId,
    artist: song.artist,
    title: song.title,
  });
  return song.songId;
}

/**
 * Resolve a target (tab URL or search phrase) to the asset(s) to download.
 */
export async function resolveTarget(target: string, ctx: ResolveContext): Promise<Asset[]> {
  const logger = (ctx.logger ?? createNoopLogger()).child({ target });

  const songId = await resolveSongId(target, ctx);
  const revisions = await ctx.api.getRevisions(songId);
  const revision = await chooseRevision(songId, revisions, ctx.prompts, ctx.interactive);
  logger.debug("Selected revision", {
    songId,
    revisionId: revision.revisionId,
    revisions: revisions.length,
  });

  const detail = await ctx.api.getRevision(revision.revisionId);
  return [createAsset(songId, detail)];
}
