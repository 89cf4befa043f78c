import { command, option, optional, positional, restPositionals, string } from 'cmd-ts';
import { Authenticator } from './api/authenticator.js';
import { VideoResolver } from './api/video-resolver.js';
import type { AppContext } from './app-context.js';
import { DEFAULT_CONFIG_PATH } from './config/config-defaults.js';
import { loadConfig } from './config/config-loader.js';
import type { Config } from './config/config-schema.js';
import { DownloadOrchestrator } from './downloader/download-orchestrator.js';
import { YtDlpDownloader, type YtDlpSettings } from './downloader/impl/yt-dlp-downloader.js';
import { isCommandAvailable, YtdlpWrapper } from './downloader/lib/ytdlp-wrapper.js';
import type { MediaDownloader } from './downloader/types.js';
import { ConfigError, errorMessage } from './errors/custom-errors.js';
import { createHttpClient, type HttpClient } from './http/http-client.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import { NotificationLevel, type Notifier } from './notifications/notifier.js';
import { countVideos, parseCourse } from './scraper/course-parser.js';
import { fetchPageJson } from './scraper/page-json.js';
import { Logger } from './utils/logger.js';
import { promptCredentials } from './utils/prompt.js';

export const USAGE = 'Usage: submeta-dl <course-url> [destination] [--config <path>]';

export const MESSAGES = {
  retrieveFailed: 'Failed to retrieve JSON data. Check the URL or logs for more information.',
  parseFailed: 'Failed to parse course data. Check logs for more information.',
  loginFailed: 'Failed to login. Check credentials or logs for more information.',
  complete: 'Download complete!',
} as const;

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createLogger: (config: Config) => Logger;
  createNotifier: (logger: Logger) => Notifier;
  createHttpClient: (config: Config, logger: Logger) => HttpClient;
  checkYtDlpInstalled: () => Promise<boolean>;
  isCommandAvailable: (command: string) => Promise<boolean>;
  createDownloader: (settings: YtDlpSettings) => MediaDownloader;
  promptCredentials: typeof promptCredentials;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  createLogger: (config) => new Logger({ filePath: config.logFile }),
  createNotifier: (logger) => new ConsoleNotifier(logger),
  createHttpClient: (config, logger) =>
    createHttpClient({
      ...config.http,
      onRetry: ({ method, url, retryNumber, delayMs, reason }) =>
        logger.warning(`Retry ${retryNumber} for ${method} ${url} in ${delayMs}ms: ${reason}`, { fileOnly: true }),
    }),
  checkYtDlpInstalled: () => new YtdlpWrapper().checkInstalled(),
  isCommandAvailable,
  createDownloader: (settings) => new YtDlpDownloader(settings),
  promptCredentials,
};

export type RunOptions = {
  /** Explicit configuration file; a missing one is an error */
  configPath?: string;
};

/**
 * Download every video of a course page
 *
 * @returns process exit code
 */
export async function runApp(
  url: string,
  destination: string | undefined,
  options: RunOptions = {},
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const config = await deps.loadConfig(options.configPath ?? DEFAULT_CONFIG_PATH, options.configPath !== undefined);
  const logger = deps.createLogger(config);
  const ctx: AppContext = {
    config,
    logger,
    http: deps.createHttpClient(config, logger),
    notifier: deps.createNotifier(logger),
  };

  logger.debug('Checking yt-dlp installation...');
  if (!(await deps.checkYtDlpInstalled())) {
    logger.error(
      'yt-dlp is not installed. Please install it first:\n' +
        '  - macOS: brew install yt-dlp\n' +
        '  - Linux: pip install yt-dlp\n' +
        '  - Windows: winget install yt-dlp',
    );
    return 1;
  }

  const settings: YtDlpSettings = { ...config.download };
  if (settings.externalDownloader && !(await deps.isCommandAvailable(settings.externalDownloader))) {
    logger.warning(`${settings.externalDownloader} not found, falling back to the yt-dlp native downloader`);
    settings.externalDownloader = null;
  }
  const downloader = deps.createDownloader(settings);

  const page = await fetchPageJson(url, ctx);
  if (!page.ok) {
    logger.error(MESSAGES.retrieveFailed);
    return 1;
  }

  const course = parseCourse(page.value);
  if (!course.ok) {
    logger.error(`Failed to parse course data: ${course.error.message}`, { fileOnly: true });
    logger.error(MESSAGES.parseFailed);
    return 1;
  }
  logger.info(`Found ${course.value.size} chapters with ${countVideos(course.value)} videos`);

  const credentials = await deps.promptCredentials(config.credentials);
  const token = await new Authenticator(ctx).login(credentials);
  if (!token.ok) {
    logger.error(MESSAGES.loginFailed);
    return 1;
  }

  const root = destination ?? config.downloadDir;
  logger.info(`Downloading with ${downloader.getName()} into ${root}`);

  const orchestrator = new DownloadOrchestrator(ctx, new VideoResolver(ctx), downloader);
  const summary = await orchestrator.run(course.value, root, token.value);

  const chapterWord = summary.chapters === 1 ? 'chapter' : 'chapters';
  ctx.notifier.notify(
    NotificationLevel.HIGHLIGHT,
    `Downloaded ${summary.succeeded} of ${summary.attempted} videos across ${summary.chapters} ${chapterWord}`,
  );

  if (summary.failed.length > 0) {
    logger.warning(
      `${summary.failed.length} of ${summary.attempted} videos failed to download. See ${config.logFile} for details.`,
    );
  }
  logger.success(MESSAGES.complete);
  return 0;
}

export const cli = command({
  name: 'submeta-dl',
  description: 'Download every video of a submeta.io course',
  version: '0.1.0',
  args: {
    url: positional({ type: string, displayName: 'course-url', description: 'Course page URL' }),
    rest: restPositionals({
      type: string,
      displayName: 'destination',
      description: 'Download directory (default: submeta-downloads)',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: `Path to configuration file (default: ${DEFAULT_CONFIG_PATH})`,
    }),
  },
  handler: async ({ url, rest, config }) => {
    const logger = new Logger();

    if (rest.length > 1) {
      logger.error(USAGE);
      process.exitCode = 2;
      return;
    }

    try {
      process.exitCode = await runApp(url, rest[0], { configPath: config });
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else {
        logger.error(`Fatal error: ${errorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  },
});
