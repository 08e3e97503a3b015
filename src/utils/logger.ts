/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

/**
 * Emoji and color per level
 */
const LEVEL_STYLES: Record<LogLevel, { emoji: string; color: string }> = {
  [LogLevel.DEBUG]: { emoji: '🔍', color: colors.dim },
  [LogLevel.INFO]: { emoji: 'ℹ️', color: colors.blue },
  [LogLevel.SUCCESS]: { emoji: '✅', color: colors.green },
  [LogLevel.WARNING]: { emoji: '⚠️', color: colors.yellow },
  [LogLevel.ERROR]: { emoji: '❌', color: colors.red },
  [LogLevel.HIGHLIGHT]: { emoji: '🌟', color: colors.bright + colors.magenta },
};

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

/**
 * Colors are on by default unless NO_COLOR is set or stdout is not a terminal
 */
function colorsByDefault(): boolean {
  return process.env.NO_COLOR === undefined && process.stdout.isTTY === true;
}

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? colorsByDefault(),
    };
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  }

  private format(level: LogLevel, message: string): string {
    const style = LEVEL_STYLES[level];
    const text = this.config.useColors ? `${style.color}${message}${colors.reset}` : message;
    return `${this.formatDate(new Date())} ${style.emoji} ${text}`;
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const line = this.format(level, message);
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  highlight(message: string): void {
    this.write(LogLevel.HIGHLIGHT, message);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
