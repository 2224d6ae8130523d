import logger from '../../../utils/logger';

/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger bound to a single tag
 */
export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

/**
 * Utilities for logging in the crawler service.
 * Levels are filtered by the winston logger; tags can be muted with `muteTags`.
 */
export class LoggingUtils {
  private static mutedTags: Set<string> = new Set();

  /**
   * Replace the set of muted tags
   * @param tags Tags whose messages are dropped, e.g. ['frontier', 'politeness']
   */
  static muteTags(tags: string[]): void {
    this.mutedTags = new Set(tags.map(tag => tag.trim().toLowerCase()).filter(tag => tag !== ''));
  }

  /**
   * Check if a tag is enabled for logging
   * @param tag The tag to check
   * @returns True unless the tag has been muted
   */
  static isTagEnabled(tag: string): boolean {
    return !this.mutedTags.has(tag.toLowerCase());
  }

  /**
   * Log a debug message
   * @param message The message to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  static debug(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.DEBUG, message, tag, context);
  }

  /**
   * Log an info message
   * @param message The message to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  static info(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.INFO, message, tag, context);
  }

  /**
   * Log a warning message
   * @param message The message to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  static warn(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.WARN, message, tag, context);
  }

  /**
   * Log an error message; an Error contributes its name and stack to the context
   * @param message The message or error to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  static error(message: string | Error, tag?: string, context?: object): void {
    if (message instanceof Error) {
      this.log(LogLevel.ERROR, message.message, tag, {
        ...context,
        stack: message.stack,
        name: message.name
      });
    } else {
      this.log(LogLevel.ERROR, message, tag, context);
    }
  }

  /**
   * Render an unknown thrown value as a message string
   */
  static describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Prefix the message with its tag and forward it to winston
   * @param level The log level
   * @param message The message to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  private static log(level: LogLevel, message: string, tag?: string, context?: object): void {
    if (tag && !this.isTagEnabled(tag)) {
      return;
    }

    const formattedMessage = tag ? `[${tag}] ${message}` : message;

    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(formattedMessage, context);
        break;
      case LogLevel.INFO:
        logger.info(formattedMessage, context);
        break;
      case LogLevel.WARN:
        logger.warn(formattedMessage, context);
        break;
      case LogLevel.ERROR:
        logger.error(formattedMessage, context);
        break;
    }
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message, context) => this.debug(message, tag, context),
      info: (message, context) => this.info(message, tag, context),
      warn: (message, context) => this.warn(message, tag, context),
      error: (message, context) => this.error(message, tag, context)
    };
  }
}
