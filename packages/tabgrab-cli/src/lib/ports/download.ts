/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** Stream the resource at `url` into `outputPath`, replacing any existing file */
  download(url: string, outputPath: string): Promise<void>;
}
