/**
 * The `cqa` program: global options, command context and subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createCoursesCommand } from './commands/courses.js';
import { createIngestCommand } from './commands/ingest.js';
import { CLIError } from '../errors/index.js';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json (two levels up from both src/cli and dist/cli)
 */
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Build the root program with every subcommand registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('cqa')
    .description('Course Q&A assistant: answer questions from course transcripts')
    .version(readVersion(), '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)

    .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('cqa ingest ./docs')}                       Load course documents
  ${chalk.cyan('cqa courses')}                             List indexed courses
  ${chalk.cyan('cqa ask "What is a vector index?"')}       Ask one question
  ${chalk.cyan('cqa chat')}                                Multi-turn chat
  ${chalk.cyan('cqa config list')}                         Show all configuration
`);

  /**
   * Commander stores options on the Command object after parsing
   */
  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
    };
  };
  const getContext = (): CommandContext => createContext(getGlobalOptions());

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createAskCommand(getContext));
  program.addCommand(createChatCommand(getContext));
  program.addCommand(createCoursesCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: cqa --help  to see available commands');
  });

  return program;
}
