export type DownloadOutcome = { ok: true; filename: string | null } | { ok: false; reason: string };

export type DownloaderOptions = {
  /** Callback for progress updates (percentage, ETA) - printed on the same line */
  onProgress?: (progress: string) => void;
  /** Callback for other output lines */
  onLog?: (message: string) => void;
};

/**
 * Media retrieval backend: fetches a manifest URL into `<outputStem>.<ext>`,
 * the extension being the backend's choice.
 */
export type MediaDownloader = {
  /**
   * Get downloader name
   */
  getName(): string;

  /**
   * Download one stream
   * @param manifestUrl Adaptive streaming manifest
   * @param headers Extra request headers (e.g. Referer)
   * @param outputStem Target path without extension
   */
  download(
    manifestUrl: string,
    headers: Record<string, string>,
    outputStem: string,
    options?: DownloaderOptions,
  ): Promise<DownloadOutcome>;
};
