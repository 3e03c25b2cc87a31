/**
 * Config Command
 *
 * Inspects ~/.cqa/config.toml:
 *   cqa config list           - Show every setting (defaults merged)
 *   cqa config get <key>      - Get a specific value
 *   cqa config path           - Show the config file location
 *   cqa config init [--force] - Write a commented default config file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  loadConfig,
  getConfigValue,
  listConfig,
  writeDefaultConfig,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect configuration settings');

  // cqa config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., cqa config get chunking.chunk_size)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(loadConfig(), key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('cqa config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // cqa config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadConfig());

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  // cqa config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // cqa config init
  configCmd
    .command('init')
    .description('Write a commented default config file')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      const configPath = getConfigPath();
      const written = writeDefaultConfig(configPath, options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath, written }));
        return;
      }

      if (written) {
        ctx.log(`${chalk.green('✓')} Wrote ${configPath}`);
      } else {
        ctx.log(chalk.yellow(`Config file already exists: ${configPath}`));
        ctx.log(`Run with ${chalk.cyan('--force')} to overwrite it.`);
      }
    });

  return configCmd;
}
