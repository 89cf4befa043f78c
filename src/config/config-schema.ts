/**
 * Zod schemas for configuration validation
 *
 * Types are inferred from the schemas, so they cannot drift apart.
 */

import { z } from 'zod';
import { type DefaultConfig, defaults } from './config-defaults.js';

/**
 * Request layer settings
 */
export const HttpSettingsSchema = z.object({
  maxRetries: z.number().int().nonnegative().optional().describe('Maximum retries per request'),
  backoffFactor: z.number().nonnegative().optional().describe('Backoff factor in seconds'),
  timeoutMs: z.number().int().positive().optional().describe('Per-request timeout in milliseconds'),
  retryStatusCodes: z
    .array(z.number().int().min(100).max(599))
    .optional()
    .describe('HTTP status codes that trigger a retry'),
});

/**
 * Platform endpoints
 */
export const ApiSettingsSchema = z.object({
  endpoint: z.url().optional().describe('GraphQL API endpoint'),
  siteOrigin: z.url().optional().describe('Site origin sent as Origin/Referer'),
  streamHost: z.url().optional().describe('Streaming host used to build manifest URLs'),
});

/**
 * yt-dlp settings
 */
export const DownloadSettingsSchema = z.object({
  fragmentRetries: z.number().int().nonnegative().optional().describe('Retries per media fragment'),
  retries: z.number().int().nonnegative().optional().describe('Retries per download'),
  externalDownloader: z.string().min(1).nullable().optional().describe('External downloader (null to disable)'),
});

/**
 * Optional credentials; missing fields are prompted for
 */
export const CredentialsSchema = z.object({
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
});

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  downloadDir: z.string().min(1).optional().describe('Directory to save courses into'),
  logFile: z.string().min(1).optional().describe('Path of the append-only log file'),
  http: HttpSettingsSchema.optional(),
  api: ApiSettingsSchema.optional(),
  download: DownloadSettingsSchema.optional(),
  credentials: CredentialsSchema.optional(),
});

export type FileConfig = z.infer<typeof ConfigSchema>;

export type Config = DefaultConfig & {
  credentials: z.infer<typeof CredentialsSchema>;
};

/**
 * Validate configuration using Zod
 *
 * @throws z.ZodError if validation fails
 */
export function validateConfig(rawConfig: unknown): FileConfig {
  return ConfigSchema.parse(rawConfig);
}

/**
 * Validate with custom error formatting
 */
export function validateConfigSafe(
  rawConfig: unknown,
): { success: true; data: FileConfig } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.map(String).join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}

/**
 * Fill in defaults for everything the file leaves out
 */
export function resolveConfig(fileConfig: FileConfig = {}): Config {
  return {
    downloadDir: fileConfig.downloadDir ?? defaults.downloadDir,
    logFile: fileConfig.logFile ?? defaults.logFile,
    http: { ...defaults.http, ...fileConfig.http },
    api: { ...defaults.api, ...fileConfig.api },
    download: { ...defaults.download, ...fileConfig.download },
    credentials: { ...fileConfig.credentials },
  };
}
