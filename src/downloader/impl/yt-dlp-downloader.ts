import { errorMessage } from '../../errors/custom-errors.js';
import { YtdlpWrapper } from '../lib/ytdlp-wrapper.js';
import type { DownloaderOptions, DownloadOutcome, MediaDownloader } from '../types.js';

export type YtDlpSettings = {
  fragmentRetries: number;
  retries: number;
  /** Delegate transfers to this program (e.g. aria2c); null uses the native downloader */
  externalDownloader: string | null;
};

/**
 * MediaDownloader backed by the yt-dlp CLI
 */
export class YtDlpDownloader implements MediaDownloader {
  constructor(
    private readonly settings: YtDlpSettings,
    private readonly wrapper: YtdlpWrapper = new YtdlpWrapper(),
  ) {}

  getName(): string {
    return this.settings.externalDownloader ? `yt-dlp (${this.settings.externalDownloader})` : 'yt-dlp';
  }

  /**
   * yt-dlp arguments derived from the settings
   */
  getArgs(): string[] {
    const args = ['--fragment-retries', String(this.settings.fragmentRetries), '--retries', String(this.settings.retries)];
    if (this.settings.externalDownloader) {
      args.push('--downloader', this.settings.externalDownloader);
    }
    return args;
  }

  async download(
    manifestUrl: string,
    headers: Record<string, string>,
    outputStem: string,
    options?: DownloaderOptions,
  ): Promise<DownloadOutcome> {
    try {
      const result = await this.wrapper.download(manifestUrl, outputStem, {
        args: this.getArgs(),
        headers,
        onProgress: options?.onProgress,
        onLog: options?.onLog,
      });
      return { ok: true, filename: result.filename };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }
}
