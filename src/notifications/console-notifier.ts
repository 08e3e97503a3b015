import { type Logger, logger as defaultLogger } from '../utils/logger';
import { isAtLeast, NotificationLevel } from './notification-level';
import type { Notifier } from './notifier';

/**
 * Console notifier for terminal output with configurable minimum level
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;
  private minLevel: NotificationLevel;
  private logger: Logger;

  constructor(minLevel: NotificationLevel = NotificationLevel.INFO, logger: Logger = defaultLogger) {
    this.minLevel = minLevel;
    this.logger = logger;
  }

  notify(level: NotificationLevel, message: string): void {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    // Wipe an active progress line so the log line starts clean
    this.clearProgressLine();

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
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
    }
  }

  progress(message: string): void {
    this.clearProgressLine();
    process.stdout.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      process.stdout.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgressLine(): void {
    if (this.lastProgressLength > 0) {
      process.stdout.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
