/**
 * Logger abstraction - works in both CLI and GitHub Actions contexts
 */

import * as core from "@actions/core";

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  group<T>(title: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * GitHub Actions logger - wraps @actions/core
 */
export class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warning(message: string): void {
    core.warning(message);
  }

  error(message: string): void {
    core.error(message);
  }

  debug(message: string): void {
    core.debug(message);
  }

  group<T>(title: string, fn: () => Promise<T>): Promise<T> {
    return core.group(title, fn);
  }
}

/**
 * Console logger for CLI usage.
 * Writes to stderr; stdout is reserved for the report.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  info(message: string): void {
    console.error(message);
  }

  warning(message: string): void {
    console.error(`⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`❌ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(`🔍 ${message}`);
    }
  }

  async group<T>(title: string, fn: () => Promise<T>): Promise<T> {
    console.error(`\n▶ ${title}`);
    return fn();
  }
}

/**
 * Quiet logger - only outputs errors
 */
export class QuietLogger implements Logger {
  info(_message: string): void {}
  warning(_message: string): void {}
  error(message: string): void {
    console.error(message);
  }
  debug(_message: string): void {}
  group<T>(_title: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}

// Global logger instance - the Action entry point is the default host
let currentLogger: Logger = new ActionsLogger();

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}

export const log = {
  info: (message: string) => currentLogger.info(message),
  warning: (message: string) => currentLogger.warning(message),
  error: (message: string) => currentLogger.error(message),
  debug: (message: string) => currentLogger.debug(message),
  group: <T>(title: string, fn: () => Promise<T>) => currentLogger.group(title, fn),
};
