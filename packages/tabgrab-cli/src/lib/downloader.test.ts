import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { Response } from "node-fetch";
import { createFetchDownloadService } from "./adapters/fetch-download.js";
import type { Asset } from "./asset.js";
import { downloadAsset, ensureOutputDir } from "./downloader.js";
import { isDownloadError } from "./errors/types.js";
import { createHttpClient, type FetchFn } from "./http-client.js";

const ASSET: Asset = {
  url: "https://dl.example.com/100.gp5",
  fileName: "Band - Song.gp5",
  songId: 42,
  revisionId: 100,
  artist: "Band",
  title: "Song",
};

/** A body that sends a few bytes and then loses the connection */
function droppedConnectionBody(): Readable {
  return new Readable({
    read() {
      this.push("partial");
      this.destroy(Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" }));
    },
  });
}

function serving(...bodies: string[]) {
  const fetchImpl = vi.fn<FetchFn>(async () => new Response("unexpected request", { status: 500 }));
  for (const body of bodies) fetchImpl.mockResolvedValueOnce(new Response(body));
  return fetchImpl;
}

describe("downloader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tabgrab-download-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("ensureOutputDir", () => {
    it("creates missing parent directories", async () => {
      const target = join(dir, "a", "b");

      await expect(ensureOutputDir(target)).resolves.toBe(target);
      await expect(readdir(join(dir, "a"))).resolves.toEqual(["b"]);
    });

    it("fails with a download error when the path is a file", async () => {
      const target = join(dir, "taken");
      await writeFile(target, "not a directory");

      let caught: unknown;
      try {
        await ensureOutputDir(target);
      } catch (error) {
        caught = error;
      }

      expect(isDownloadError(caught)).toBe(true);
      expect(caught).toMatchObject({ code: "DOWNLOAD_WRITE_FAILED", target });
    });
  });

  describe("downloadAsset", () => {
    it("writes the tab under its file name", async () => {
      const fetchImpl = serving("gp-bytes");
      const service = createFetchDownloadService(createHttpClient({ fetchImpl }));
      const outputDir = join(dir, "tabs");

      const path = await downloadAsset(ASSET, outputDir, service);

      expect(path).toBe(join(outputDir, "Band - Song.gp5"));
      await expect(readFile(path, "utf-8")).resolves.toBe("gp-bytes");
      expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://dl.example.com/100.gp5");
    });

    it("replaces the file when the same tab is downloaded again", async () => {
      const service = createFetchDownloadService(createHttpClient({ fetchImpl: serving("first", "second") }));

      await downloadAsset(ASSET, dir, service);
      await downloadAsset(ASSET, dir, service);

      await expect(readdir(dir)).resolves.toEqual(["Band - Song.gp5"]);
      await expect(readFile(join(dir, "Band - Song.gp5"), "utf-8")).resolves.toBe("second");
    });

    it("leaves no file behind when the request fails", async () => {
      const fetchImpl = vi.fn<FetchFn>(async () => new Response("gone", { status: 404, statusText: "Not Found" }));
      const service = createFetchDownloadService(createHttpClient({ fetchImpl }));

      await expect(downloadAsset(ASSET, dir, service)).rejects.toMatchObject({
        kind: "fetch",
        code: "FETCH_NOT_FOUND",
      });
      await expect(readdir(dir)).resolves.toEqual([]);
    });
  });

  describe("createFetchDownloadService", () => {
    it("reports a connection dropped mid-download as a fetch error and keeps the old file", async () => {
      await writeFile(join(dir, ASSET.fileName), "old");
      const fetchImpl = vi.fn<FetchFn>(async () => new Response(droppedConnectionBody()));
      const service = createFetchDownloadService(createHttpClient({ fetchImpl }));

      await expect(downloadAsset(ASSET, dir, service)).rejects.toMatchObject({
        kind: "fetch",
        code: "FETCH_NETWORK",
        details: "read ECONNRESET",
      });
      await expect(readdir(dir)).resolves.toEqual(["Band - Song.gp5"]);
      await expect(readFile(join(dir, ASSET.fileName), "utf-8")).resolves.toBe("old");
    });

    it("reports a stalled download as a timeout", async () => {
      const fetchImpl = vi.fn<FetchFn>(async (_url, init) => {
        const body = new Readable({ read() {} });
        init?.signal?.addEventListener("abort", () => body.destroy(new Error("The operation was aborted.")));
        return new Response(body);
      });
      const service = createFetchDownloadService(createHttpClient({ fetchImpl }), 20);

      await expect(service.download(ASSET.url, join(dir, ASSET.fileName))).rejects.toMatchObject({
        kind: "fetch",
        code: "FETCH_TIMEOUT",
        message: "No response after 20ms",
      });
      await expect(readdir(dir)).resolves.toEqual([]);
    });

    it("reports a write failure when the target directory is missing", async () => {
      const service = createFetchDownloadService(createHttpClient({ fetchImpl: serving("gp-bytes") }));
      const outputPath = join(dir, "missing", "tab.gp5");

      await expect(service.download(ASSET.url, outputPath)).rejects.toMatchObject({
        kind: "download",
        code: "DOWNLOAD_WRITE_FAILED",
        message: `Couldn't write "${outputPath}"`,
      });
    });
  });
});
