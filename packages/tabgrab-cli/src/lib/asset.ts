import { extname } from "path";
import { missingSource, unexpectedResponse } from "./errors/catalog.js";
import type { RevisionDetail } from "./songsterr-api.js";

/**
 * A resolved, directly downloadable tab: the export URL plus the file name it
 * will be saved under.
 */
export interface Asset {
  url: string;
  fileName: string;
  songId: number;
  revisionId: number;
  artist: string;
  title: string;
}

export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_TITLE = "Unknown Title";
export const DEFAULT_EXTENSION = ".gp";

// Characters Windows, macOS or Linux refuse in a file name, plus ASCII control characters.
// eslint-disable-next-line no-control-regex
const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

export function sanitizeFileName(value: string): string {
  return value.replace(ILLEGAL_FILENAME_CHARS, "_").trim();
}

const EXTENSION_PATTERN = /^\.[A-Za-z0-9]+$/;

/**
 * Extension of the export URL's path (".gp5", ".gpx", ...), ".gp" when it has
 * none or it isn't plain alphanumerics.
 */
export function extensionFromUrl(url: string): string {
  const ext = extname(new URL(url).pathname);
  return EXTENSION_PATTERN.test(ext) ? ext : DEFAULT_EXTENSION;
}

/**
 * `<artist> - <title><ext>`, sanitized.
 */
export function buildFileName(artist: string | undefined, title: string | undefined, sourceUrl: string): string {
  const safeArtist = sanitizeFileName(artist ?? "") || UNKNOWN_ARTIST;
  const safeTitle = sanitizeFileName(title ?? "") || UNKNOWN_TITLE;
  return `${safeArtist} - ${safeTitle}${extensionFromUrl(sourceUrl)}`;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build an Asset from a revision's details. The export URL must be present
 * and absolute.
 */
export function createAsset(songId: number, detail: RevisionDetail): Asset {
  const source = detail.source?.trim();
  if (!source) throw missingSource(detail.revisionId);

  if (!isAbsoluteUrl(source)) {
    throw unexpectedResponse(source, [`revision ${detail.revisionId} has an invalid source URL`]);
  }

  return {
    url: source,
    fileName: buildFileName(detail.artist, detail.title, source),
    songId: detail.songId ?? songId,
    revisionId: detail.revisionId,
    artist: detail.artist ?? UNKNOWN_ARTIST,
    title: detail.title ?? UNKNOWN_TITLE,
  };
}
