import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { VideoResolver } from '../api/video-resolver.js';
import type { AppContext } from '../app-context.js';
import { errorMessage, isTransportError } from '../errors/custom-errors.js';
import type { Course, DownloadSummary } from '../types/course.types.js';
import { chapterDirName, videoFileStem } from '../utils/filename-sanitizer.js';
import type { MediaDownloader } from './types.js';

type VideoJob = {
  chapterTitle: string;
  videoTitle: string;
  videoId: string;
  /** Target path without extension */
  outputStem: string;
  /** Progress prefix shown while this video is processed */
  label: string;
};

/**
 * Walks a course in order, lays out the directory tree and downloads every
 * video. A failing video is logged and skipped; the walk always completes.
 */
export class DownloadOrchestrator {
  constructor(
    private readonly ctx: Pick<AppContext, 'config' | 'logger' | 'notifier'>,
    private readonly resolver: Pick<VideoResolver, 'resolve'>,
    private readonly downloader: MediaDownloader,
  ) {}

  async run(course: Course, destination: string, bearerToken: string): Promise<DownloadSummary> {
    const root = resolve(destination);
    await mkdir(root, { recursive: true });

    const summary: DownloadSummary = { chapters: course.size, attempted: 0, succeeded: 0, failed: [] };

    let chapterNumber = 0;
    for (const [chapterTitle, videos] of course) {
      chapterNumber++;
      const chapterPath = join(root, chapterDirName(chapterNumber, chapterTitle));
      await mkdir(chapterPath, { recursive: true });

      let videoNumber = 0;
      for (const [videoTitle, videoId] of videos) {
        videoNumber++;
        const stem = videoFileStem(videoNumber, videoTitle);
        const job: VideoJob = {
          chapterTitle,
          videoTitle,
          videoId,
          outputStem: join(chapterPath, stem),
          label: `Chapters ${chapterNumber}/${course.size} | Videos ${videoNumber}/${videos.size} | ${stem}`,
        };

        this.ctx.notifier.progress(job.label);
        summary.attempted++;

        const failure = await this.processVideo(job, bearerToken);
        if (failure === null) {
          summary.succeeded++;
        } else {
          summary.failed.push({ chapter: chapterTitle, video: videoTitle, reason: failure });
        }
      }
    }

    this.ctx.notifier.endProgress();
    return summary;
  }

  /**
   * Resolve and download one video
   *
   * @returns null on success, otherwise the failure reason (already logged)
   */
  private async processVideo(job: VideoJob, bearerToken: string): Promise<string | null> {
    const { logger } = this.ctx;
    const name = `${job.chapterTitle}/${job.videoTitle}`;

    try {
      const manifest = await this.resolver.resolve(bearerToken, job.videoId);
      if (!manifest.ok) {
        const kind = isTransportError(manifest.error) ? 'Network error while downloading' : 'Failed to download';
        logger.error(`${kind} ${name}: ${manifest.error.message}`, { fileOnly: true });
        return manifest.error.message;
      }

      const outcome = await this.downloader.download(
        manifest.value,
        { Referer: this.ctx.config.api.siteOrigin },
        job.outputStem,
        {
          onProgress: (progress) => this.ctx.notifier.progress(`${job.label} | ${progress}`),
          onLog: (line) => logger.debug(line, { fileOnly: true }),
        },
      );

      if (!outcome.ok) {
        logger.error(`Failed to download ${name}: ${outcome.reason}`, { fileOnly: true });
        return outcome.reason;
      }

      logger.info(`Successfully downloaded: ${outcome.filename ?? job.outputStem}`, { fileOnly: true });
      return null;
    } catch (error) {
      const reason = errorMessage(error);
      logger.error(`Failed to download ${name}: ${reason}`, { fileOnly: true });
      return reason;
    }
  }
}
