import type { Logger } from '../utils/logger.js';
import { LEVEL_PRIORITIES, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Console notifier for terminal output with configurable minimum level
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;

  constructor(
    private readonly logger: Logger,
    private readonly minLevel: NotificationLevel = NotificationLevel.INFO,
    private readonly stream: NodeJS.WriteStream = process.stdout,
  ) {}

  private shouldNotify(level: NotificationLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.minLevel];
  }

  notify(level: NotificationLevel, message: string): void {
    if (!this.shouldNotify(level)) {
      return;
    }

    // Clear an active progress line so the message appears cleanly
    this.clearProgress();

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(message);
        break;
      case NotificationLevel.INFO:
        this.logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }

  progress(message: string): void {
    this.clearProgress();
    this.stream.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
