/**
 * Songsterr endpoints and response schemas.
 * Everything that depends on the shape of Songsterr's JSON lives here.
 */

import { z } from "zod";
import type { HttpClient } from "./http-client.js";

export const SONGSTERR_BASE_URL = "https://www.songsterr.com";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SongSchema = z.object({
  songId: z.number().int(),
  artist: z.string().optional(),
  title: z.string().optional(),
});

export const SearchResponseSchema = z.array(SongSchema);

const RevisionSchema = z.object({
  revisionId: z.number().int(),
  createdAt: z.string().optional(),
  author: z
    .object({ profileName: z.string().optional() })
    .nullish(),
});

export const RevisionsResponseSchema = z.array(RevisionSchema);

export const RevisionDetailSchema = z.object({
  revisionId: z.number().int(),
  songId: z.number().int().optional(),
  artist: z.string().nullish(),
  title: z.string().nullish(),
  source: z.string().nullish(),
});

// ---------------------------------------------------------------------------
// Domain types
// ---------------------------------------------------------------------------

export interface SearchResult {
  songId: number;
  artist?: string;
  title?: string;
}

export interface Revision {
  revisionId: number;
  createdAt?: string;
  author?: string;
}

export interface RevisionDetail {
  revisionId: number;
  songId?: number;
  artist?: string;
  title?: string;
  /** Guitar Pro export URL; absent when Songsterr has no export for the revision */
  source?: string;
}

export interface SongsterrApi {
  readonly baseUrl: string;
  searchSongs(pattern: string, size: number): Promise<SearchResult[]>;
  getRevisions(songId: number): Promise<Revision[]>;
  getRevision(revisionId: number): Promise<RevisionDetail>;
}

export function createSongsterrApi(http: HttpClient, baseUrl: string = SONGSTERR_BASE_URL): SongsterrApi {
  const endpoint = (path: string) => new URL(path, baseUrl).toString();

  return {
    baseUrl,

    async searchSongs(pattern, size) {
      const songs = await http.getJson(endpoint("/api/songs"), SearchResponseSchema, { size, pattern });
      return songs.map((song) => ({ songId: song.songId, artist: song.artist, title: song.title }));
    },

    async getRevisions(songId) {
      const revisions = await http.getJson(endpoint(`/api/meta/${songId}/revisions`), RevisionsResponseSchema);
      return revisions.map((rev) => ({
        revisionId: rev.revisionId,
        createdAt: rev.createdAt,
        author: rev.author?.profileName,
      }));
    },

    async getRevision(revisionId) {
      const detail = await http.getJson(endpoint(`/api/revision/${revisionId}`), RevisionDetailSchema);
      return {
        revisionId: detail.revisionId,
        songId: detail.songId,
        artist: detail.artist ?? undefined,
        title: detail.title ?? undefined,
        source: detail.source ?? undefined,
      };
    },
  };
}
