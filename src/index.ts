#!/usr/bin/env node
// ============================================================
// Bookstore API Tests — CLI Entry Point
// ============================================================

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { request } from '@playwright/test';
import { ConfigResolver } from './config/bookstore.config.js';
import { EXIT_BAD_CONFIG, collectOverride, describeConfig, runPing } from './cli/commands.js';
import { errorMessage } from './framework/errors.js';

dotenv.config();

const program = new Command();

program
  .name('bookstore-api')
  .description('Bookstore API contract tests: configuration and connectivity diagnostics')
  .version('1.0.0');

program
  .command('config')
  .description('Print the effective configuration after every layer is applied')
  .option('--env <name>', 'Overlay to apply (config-<name>.properties)')
  .option('--set <key=value>', 'Override a setting; repeatable', collectOverride, {})
  .action((options: { env?: string; set: Record<string, string> }) => {
    try {
      const config = new ConfigResolver({ env: options.env, overrides: options.set }).resolve();
      console.log(JSON.stringify(describeConfig(config), null, 2));
    } catch (err) {
      console.error(chalk.red(`\n${errorMessage(err)}`));
      process.exitCode = EXIT_BAD_CONFIG;
    }
  });

program
  .command('ping')
  .description('Check that the Books and Authors endpoints answer 200')
  .option('--env <name>', 'Overlay to apply (config-<name>.properties)')
  .action(async (options: { env?: string }) => {
    process.exitCode = await runPing(
      () => new ConfigResolver({ env: options.env }).resolve(),
      contextOptions => request.newContext(contextOptions),
    );
  });

await program.parseAsync(process.argv);
