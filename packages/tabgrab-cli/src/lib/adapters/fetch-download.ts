import { createWriteStream } from "fs";
import { rename, rm } from "fs/promises";
import { pipeline } from "stream/promises";
import type { DownloadService } from "../ports/download.js";
import { DEFAULT_DOWNLOAD_TIMEOUT_MS, type HttpClient } from "../http-client.js";
import { networkFailure, requestTimeout, writeFailed } from "../errors/catalog.js";

/**
 * Create a download service that streams through the shared HTTP client.
 * Bytes go to `<path>.part` first and are renamed over `<path>` on success,
 * so an interrupted download never leaves a truncated tab behind.
 */
export function createFetchDownloadService(
  http: HttpClient,
  timeoutMs: number = DEFAULT_DOWNLOAD_TIMEOUT_MS
): DownloadService {
  return {
    async download(url: string, outputPath: string): Promise<void> {
      const response = await http.stream(url, timeoutMs);
      const partPath = `${outputPath}.part`;
      const file = createWriteStream(partPath);

      // pipeline destroys the other side with the same error, so the side
      // that fails first is the cause
      let failedSide: "body" | "file" | undefined;
      response.body.once("error", () => {
        failedSide ??= "body";
      });
      file.once("error", () => {
        failedSide ??= "file";
      });

      try {
        await pipeline(response.body, file);
        await rename(partPath, outputPath);
      } catch (error) {
        await rm(partPath, { force: true });
        if (response.timedOut()) throw requestTimeout(url, timeoutMs);
        if (failedSide === "body") throw networkFailure(url, error);
        throw writeFailed(outputPath, error);
      } finally {
        response.close();
      }
    },
  };
}
