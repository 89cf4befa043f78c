/**
 * Default configuration values
 */
export const DEFAULT_CONFIG_PATH = './submeta-dl.yaml';

export const DEFAULT_DOWNLOAD_DIR = 'submeta-downloads';

export const DEFAULT_LOG_FILE = 'downloader.log';

export const BROWSER_USER_AGENT = 'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:88.0) Gecko/20100101 Firefox/88.0';

export type DefaultConfig = {
  downloadDir: string;
  logFile: string;

  http: {
    maxRetries: number;
    backoffFactor: number;
    timeoutMs: number;
    retryStatusCodes: number[];
  };

  api: {
    endpoint: string;
    siteOrigin: string;
    streamHost: string;
  };

  download: {
    fragmentRetries: number;
    retries: number;
    /** null disables the external downloader */
    externalDownloader: string | null;
  };
};

export const defaults: DefaultConfig = {
  downloadDir: DEFAULT_DOWNLOAD_DIR,
  logFile: DEFAULT_LOG_FILE,
  http: {
    maxRetries: 3,
    backoffFactor: 0.3,
    timeoutMs: 10_000,
    retryStatusCodes: [429, 500, 502, 503, 504],
  },
  api: {
    endpoint: 'https://b.submeta.io/api',
    siteOrigin: 'https://submeta.io',
    streamHost: 'https://customer-3j2pofw9vdbl9sfy.cloudflarestream.com',
  },
  download: {
    fragmentRetries: 10,
    retries: 10,
    externalDownloader: 'aria2c',
  },
};
