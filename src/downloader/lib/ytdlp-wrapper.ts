import * as fsPromises from 'node:fs/promises';
import { dirname } from 'node:path';
import { execa } from 'execa';
import { DownloadError } from '../../errors/custom-errors.js';

export type YtdlpWrapperOptions = {
  /** Additional yt-dlp CLI arguments, placed before the URL */
  args?: string[];
  /** Extra HTTP headers, sent with --add-header */
  headers?: Record<string, string>;
  /** Callback for progress updates */
  onProgress?: (progress: string) => void;
  /** Callback for log messages */
  onLog?: (message: string) => void;
};

export type YtdlpDownloadResult = {
  /** Main file path, when yt-dlp reported it */
  filename: string | null;
};

/**
 * Low-level wrapper for the yt-dlp CLI
 */
export class YtdlpWrapper {
  constructor(private readonly binary: string = 'yt-dlp') {}

  /**
   * Build the argument list for one download
   */
  buildArgs(url: string, outputStem: string, options: YtdlpWrapperOptions = {}): string[] {
    const { args = [], headers = {} } = options;

    const cmdArgs = ['--no-warnings', '--newline', '-o', `${outputStem}.%(ext)s`];

    for (const [name, value] of Object.entries(headers)) {
      cmdArgs.push('--add-header', `${name}:${value}`);
    }

    cmdArgs.push(...args);

    if (!args.includes(url)) {
      cmdArgs.push(url);
    }

    return cmdArgs;
  }

  /**
   * Download using yt-dlp
   *
   * @param url - Media or manifest URL
   * @param outputStem - Output path without extension (for the -o template)
   * @throws DownloadError with the captured output when yt-dlp fails
   */
  async download(url: string, outputStem: string, options: YtdlpWrapperOptions = {}): Promise<YtdlpDownloadResult> {
    const { onProgress, onLog } = options;

    await fsPromises.mkdir(dirname(outputStem), { recursive: true });

    let filename: string | null = null;
    const outputBuffer: string[] = [];

    // The last reported path wins: a merge line names the final file
    const remember = (file: string | undefined): void => {
      if (file) {
        filename = file;
      }
    };

    try {
      const subprocess = execa(this.binary, this.buildArgs(url, outputStem, options), { all: true });

      for await (const line of subprocess.iterable({ from: 'all' })) {
        const text = line.trim();
        if (!text) continue;

        outputBuffer.push(text);

        remember(text.match(/\[download\] Destination:\s*(.+)/)?.[1]);
        remember(text.match(/\[download\]\s+(.+) has already been downloaded/)?.[1]);
        remember(text.match(/\[(?:merge|Merger)\] Merging formats into "(.*)"/)?.[1]);

        if (text.startsWith('[download]')) {
          // [download]  23.8% of ~ 145.41MiB at  563.37KiB/s ETA 03:34 (frag 48/203)
          const progressMatch = text.match(
            /\[download\]\s+(\d+\.?\d*)%\s+of\s+~?\s*([\d.]+\w+)\s+at\s+~?\s*([\d.]+\w+\/s)\s+ETA\s+(\S+)/,
          );

          if (progressMatch) {
            const [, percentage, totalSize, speed, eta] = progressMatch;
            onProgress?.(`${percentage}% of ${totalSize} at ${speed} ETA ${eta}`);
            continue;
          }
        }

        onLog?.(text);
      }

      await subprocess;

      return { filename };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      const fullLog = outputBuffer.join('\n');
      throw new DownloadError(`yt-dlp failed: ${errorMsg}\n\nLog output:\n${fullLog}`, url);
    }
  }

  /**
   * Check if yt-dlp is installed
   */
  async checkInstalled(): Promise<boolean> {
    return isCommandAvailable(this.binary);
  }
}

/**
 * Check whether a command runs with --version
 */
export async function isCommandAvailable(command: string): Promise<boolean> {
  try {
    await execa(command, ['--version']);
    return true;
  } catch {
    return false;
  }
}
