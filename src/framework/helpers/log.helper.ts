// ============================================================
// Bookstore API Tests — Console Logger
// [Scope]-prefixed chalk output shared by clients, config and lifecycle
// ============================================================

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Request/response detail, dimmed */
  detail(message: string): void;
  /** Printed only when debug output is enabled */
  debug(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const tag = `[${scope}]`;
  return {
    info: message => console.log(chalk.cyan(`${tag} ${message}`)),
    success: message => console.log(chalk.green(`${tag} ${message}`)),
    warn: message => console.warn(chalk.yellow(`${tag} ${message}`)),
    error: message => console.error(chalk.red(`${tag} ${message}`)),
    detail: message => console.log(chalk.gray(`${tag} ${message}`)),
    debug: message => {
      if (options.debug) console.log(chalk.gray(`${tag} ${message}`));
    },
  };
}
