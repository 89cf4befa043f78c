/**
 * Ordered mapping of sanitized video title to platform video id
 */
export type Chapter = ReadonlyMap<string, string>;

/**
 * Ordered mapping of sanitized chapter title to its videos
 */
export type Course = ReadonlyMap<string, Chapter>;

/**
 * Username/password pair, held only until a token is obtained
 */
export type Credentials = {
  username: string;
  password: string;
};

/**
 * Failed video entry in a run summary
 */
export type FailedVideo = {
  chapter: string;
  video: string;
  reason: string;
};

/**
 * Result of a full download run
 */
export type DownloadSummary = {
  chapters: number;
  attempted: number;
  succeeded: number;
  failed: FailedVideo[];
};
