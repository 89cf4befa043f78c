import type { NotificationLevel } from './notification-level.js';

export { NotificationLevel } from './notification-level.js';

/**
 * User-facing output channel, separate from the log file
 */
export type Notifier = {
  /**
   * Send a notification
   */
  notify(level: NotificationLevel, message: string): void;

  /**
   * Update progress on the same line (overwrites previous output)
   */
  progress(message: string): void;

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): void;
};
