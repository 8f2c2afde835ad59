// ============================================================
// Bookstore API Tests — CLI Commands
// `config` prints the effective configuration, `ping` probes the service
// ============================================================

import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createApiClients } from '../framework/clients/index.js';
import { errorMessage } from '../framework/errors.js';
import type { RequestFactory } from '../framework/clients/api.client.js';
import type { BookstoreConfig } from '../types/index.js';

/** commander collector for repeatable `--set key=value` */
export function collectOverride(pair: string, previous: Record<string, string>): Record<string, string> {
  const eq = pair.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${pair}'.`);
  }
  return { ...previous, [pair.slice(0, eq).trim()]: pair.slice(eq + 1).trim() };
}

export function describeConfig(config: BookstoreConfig): Record<string, string | number | boolean> {
  return {
    environment: config.environment,
    baseUrl: config.baseUrl,
    apiVersion: config.apiVersion,
    apiBaseUrl: config.apiBaseUrl,
    booksEndpoint: config.booksEndpoint,
    authorsEndpoint: config.authorsEndpoint,
    requestTimeout: config.requestTimeout,
    connectionTimeout: config.connectionTimeout,
    loggingEnabled: config.loggingEnabled,
    reportPath: config.reportPath,
    debugMode: config.debugMode,
  };
}

export interface PingResult {
  books: boolean;
  authors: boolean;
}

export async function ping(config: BookstoreConfig, factory: RequestFactory): Promise<PingResult> {
  const clients = await createApiClients(config, factory);
  try {
    return {
      books: await clients.books.isReachable(),
      authors: await clients.authors.isReachable(),
    };
  } finally {
    await clients.dispose();
  }
}

export function formatPing(config: BookstoreConfig, result: PingResult): string {
  const mark = (ok: boolean): string => (ok ? chalk.green('OK') : chalk.red('FAILED'));
  return [
    chalk.bold(`${config.apiBaseUrl} (${config.environment})`),
    `  Books API:   ${mark(result.books)}`,
    `  Authors API: ${mark(result.authors)}`,
  ].join('\n');
}

/** Exit codes: 0 both APIs answer, 1 one of them does not, 2 the configuration is invalid. */
export const EXIT_UNREACHABLE = 1;
export const EXIT_BAD_CONFIG = 2;

export interface CommandOutput {
  log(message: string): void;
  error(message: string): void;
}

/** `ping` command body: resolves, probes and prints; returns the process exit code. */
export async function runPing(
  resolveConfig: () => BookstoreConfig,
  factory: RequestFactory,
  out: CommandOutput = console,
): Promise<number> {
  let config: BookstoreConfig;
  try {
    config = resolveConfig();
  } catch (err) {
    out.error(chalk.red(`\n${errorMessage(err)}`));
    return EXIT_BAD_CONFIG;
  }
  const result = await ping(config, factory);
  out.log(formatPing(config, result));
  return result.books && result.authors ? 0 : EXIT_UNREACHABLE;
}
