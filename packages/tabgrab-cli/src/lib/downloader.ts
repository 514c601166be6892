import { mkdir } from "fs/promises";
import { join, resolve } from "path";
import type { Asset } from "./asset.js";
import type { DownloadService } from "./ports/download.js";
import { writeFailed } from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";

/**
 * Create the output directory if needed.
 */
export async function ensureOutputDir(outputDir: string): Promise<string> {
  const dir = resolve(outputDir);
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw writeFailed(dir, error);
  }
  return dir;
}

/**
 * Download an asset into `outputDir` and return the written path.
 * An existing file with the same name is replaced.
 */
export async function downloadAsset(
  asset: Asset,
  outputDir: string,
  service: DownloadService,
  logger: Logger = createNoopLogger()
): Promise<string> {
  const dir = await ensureOutputDir(outputDir);
  const outputPath = join(dir, asset.fileName);

  logger.debug("Downloading tab", { url: asset.url, outputPath, revisionId: asset.revisionId });
  await service.download(asset.url, outputPath);
  logger.debug("Saved tab", { outputPath });

  return outputPath;
}
