import { describe, expect, it } from 'vitest';
import { ConfigSchema } from './config-schema.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_DOWNLOAD_DIR, DEFAULT_LOG_FILE, defaults } from './config-defaults.js';

describe('Config Defaults', () => {
  it('should have correct default paths', () => {
    expect(DEFAULT_CONFIG_PATH).toBe('./submeta-dl.yaml');
    expect(DEFAULT_DOWNLOAD_DIR).toBe('submeta-downloads');
    expect(DEFAULT_LOG_FILE).toBe('downloader.log');
  });

  it('should have correct default HTTP settings', () => {
    expect(defaults.http).toEqual({
      maxRetries: 3,
      backoffFactor: 0.3,
      timeoutMs: 10_000,
      retryStatusCodes: [429, 500, 502, 503, 504],
    });
  });

  it('should have correct default download settings', () => {
    expect(defaults.download).toEqual({
      fragmentRetries: 10,
      retries: 10,
      externalDownloader: 'aria2c',
    });
  });

  it('should satisfy the configuration schema', () => {
    expect(ConfigSchema.safeParse(defaults).success).toBe(true);
  });
});
