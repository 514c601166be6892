import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { SearchResult, SongsterrApi } from "./songsterr-api.js";
import type { PromptService } from "./ports/prompt.js";
import { emptySearch, noSearchResults, selectionCancelled } from "./errors/catalog.js";

/**
 * Query Songsterr and return at most `maxResults` songs, in Songsterr's order.
 */
export async function searchSongs(
  api: SongsterrApi,
  query: string,
  maxResults: number
): Promise<SearchResult[]> {
  const pattern = query.trim();
  if (!pattern) throw emptySearch();

  const songs = await api.searchSongs(pattern, maxResults);
  if (songs.length === 0) throw noSearchResults(pattern);

  return songs.slice(0, maxResults);
}

export function formatSearchTable(results: SearchResult[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Song ID"), chalk.cyan("Artist"), chalk.cyan("Title")],
  });
  results.forEach((song, idx) => {
    table.push([String(idx + 1), String(song.songId), song.artist ?? "?", song.title ?? "?"]);
  });
  return table.toString();
}

/**
 * Pick one song. Non-interactive runs and single hits take the top result;
 * otherwise the list is shown and the user picks by number.
 */
export async function chooseSong(
  query: string,
  results: SearchResult[],
  prompts: PromptService,
  interactive: boolean
): Promise<SearchResult> {
  const [top] = results;
  if (!top) throw noSearchResults(query);
  if (!interactive || results.length === 1) return top;

  console.log(chalk.bold("Search results:"));
  console.log(formatSearchTable(results));

  const choice = await prompts.choose("Choose a song number", results.length);
  const picked = choice.kind === "index" ? results[choice.index] : undefined;
  if (!picked) throw selectionCancelled();
  return picked;
}
