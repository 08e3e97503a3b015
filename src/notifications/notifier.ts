import type { NotificationLevel } from './notification-level';

export { NotificationLevel } from './notification-level';

/**
 * Reporting capability handed to every component. The core only ever talks to
 * this interface; where messages end up (console, desktop, syslog) is the
 * implementation's business.
 */
export type Notifier = {
  /**
   * Send a notification
   * @param level - Notification level
   * @param message - Message to send
   */
  notify(level: NotificationLevel, message: string): Promise<void> | void;

  /**
   * Update progress on the same line (overwrites previous output)
   */
  progress(message: string): Promise<void> | void;

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): Promise<void> | void;
};
