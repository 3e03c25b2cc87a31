/**
 * Chat Command
 *
 * Interactive multi-turn Q&A over the indexed courses:
 *
 *   cqa chat
 *   cqa chat --model gpt-4o
 *
 * Each question is answered with the previous exchanges of the session as
 * context. A failed question prints its error and the REPL keeps going.
 *
 * REPL commands: /new, /courses, /help, exit (or quit, /exit, Ctrl+C).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createCourseAssistant, type AssistantHandle } from '../../agent/factory.js';
import type { QueryResult } from '../../agent/types.js';
import { CLIError } from '../../errors/index.js';
import { displayAnswer, queryFailure, toAskOutputJSON } from './ask.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  model?: string;
}

export interface ChatState {
  handle: AssistantHandle;
  /** Unset until the first answer arrives */
  sessionId?: string;
}

/**
 * Streams the REPL reads from and prompts to
 */
export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  /** Returns false to end the session */
  handler: (state: ChatState, ctx: CommandContext) => boolean;
}

// ============================================================================
// REPL Commands
// ============================================================================

const EXIT_COMMAND: REPLCommand = {
  name: 'exit',
  aliases: ['quit', 'q'],
  description: 'Leave the chat',
  handler: () => false,
};

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'new',
    aliases: ['reset'],
    description: 'Start a new conversation',
    handler: (state, ctx) => {
      state.sessionId = undefined;
      ctx.log(chalk.dim('Started a new conversation.'));
      return true;
    },
  },
  {
    name: 'courses',
    aliases: ['ls'],
    description: 'List indexed courses',
    handler: (state, ctx) => {
      const stats = state.handle.assistant.getCourseStats();
      if (stats.totalCourses === 0) {
        ctx.log(chalk.yellow('No courses indexed.'));
        return true;
      }
      for (const title of stats.courseTitles) {
        ctx.log(`  ${title}`);
      }
      return true;
    },
  },
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show commands',
    handler: (_state, ctx) => {
      for (const cmd of REPL_COMMANDS) {
        ctx.log(`  ${chalk.cyan(`/${cmd.name}`.padEnd(10))} ${cmd.description}`);
      }
      return true;
    },
  },
  EXIT_COMMAND,
];

/**
 * Match `/name args` (or a bare exit/quit) against the REPL commands.
 * Anything else is a question.
 *
 * @internal Exported for testing purposes
 */
export function parseREPLCommand(input: string): REPLCommand | null {
  const trimmed = input.trim();

  if (/^(exit|quit)$/i.test(trimmed)) {
    return EXIT_COMMAND;
  }
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const name = trimmed.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';
  return REPL_COMMANDS.find((c) => c.name === name || c.aliases.includes(name)) ?? null;
}

// ============================================================================
// Question Handling
// ============================================================================

async function handleQuestion(question: string, state: ChatState, ctx: CommandContext): Promise<void> {
  let result: QueryResult;
  try {
    result = await state.handle.assistant.query(question, state.sessionId);
  } catch (error) {
    throw queryFailure(error);
  }
  state.sessionId = result.sessionId;

  if (ctx.options.json) {
    console.log(JSON.stringify(toAskOutputJSON(result)));
    return;
  }
  displayAnswer(ctx, result);
  ctx.log('');
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  const stats = state.handle.assistant.getCourseStats();

  ctx.log('');
  ctx.log(chalk.bold('Course Q&A Chat'));
  ctx.log(chalk.dim(`Model: ${state.handle.provider}/${state.handle.model}`));
  if (stats.totalCourses === 0) {
    ctx.log(chalk.yellow('No courses indexed.'));
    ctx.log(chalk.dim('Run: cqa ingest <folder>  to load course documents.'));
  } else {
    ctx.log(chalk.dim(`${stats.totalCourses} course${stats.totalCourses === 1 ? '' : 's'} indexed`));
  }
  ctx.log('');
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

// ============================================================================
// REPL Loop
// ============================================================================

/**
 * Lines are handled one at a time, in order: a line typed while an answer is
 * pending waits for it.
 */
export async function runChatREPL(state: ChatState, ctx: CommandContext, io: ChatIO): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: io.input,
      output: io.output,
      prompt: chalk.cyan('you> '),
    });

    // exited: the user asked to leave, so queued lines are dropped.
    // closed: input is gone, so queued lines still run but nothing re-prompts.
    let exited = false;
    let closed = false;
    let pending: Promise<void> = Promise.resolve();

    const prompt = (): void => {
      if (!exited && !closed) {
        rl.prompt();
      }
    };

    const handleLine = async (line: string): Promise<void> => {
      const input = line.trim();
      if (exited) {
        return;
      }
      if (!input) {
        prompt();
        return;
      }

      const command = parseREPLCommand(input);
      if (command) {
        if (!command.handler(state, ctx)) {
          exited = true;
          rl.close();
          return;
        }
        prompt();
        return;
      }

      try {
        await handleQuestion(input, state, ctx);
      } catch (error) {
        if (error instanceof CLIError) {
          ctx.error(error.message);
          if (error.hint) {
            ctx.log(chalk.dim(error.hint));
          }
        } else {
          ctx.error(`Failed to answer query: ${String(error)}`);
        }
      }
      prompt();
    };

    rl.on('line', (line) => {
      pending = pending.then(() => handleLine(line));
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      exited = true;
      rl.close();
    });

    // EOF, exit command or Ctrl+C: finish what is queued, then stop
    rl.on('close', () => {
      closed = true;
      pending = pending.then(() => resolve());
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param io - Defaults to the process's stdin and stdout
 */
export function createChatCommand(
  getContext: () => CommandContext,
  io: ChatIO = { input: process.stdin, output: process.stdout }
): Command {
  return new Command('chat')
    .description('Interactive multi-turn Q&A over the indexed courses')
    .option('-m, --model <name>', 'Answering model (overrides default_model)')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();
      ctx.debug('Starting chat session...');

      const config = loadConfig();
      const handle = await createCourseAssistant(config, {
        logger: ctx,
        model: cmdOptions.model,
        loadDocuments: true,
        fallback: {
          onFallback: (from, to, reason) => ctx.warn(`${from} unavailable (${reason}), using ${to}`),
        },
      });

      if (handle.loaded && handle.loaded.coursesAdded > 0) {
        ctx.log(chalk.dim(`Loaded ${handle.loaded.coursesAdded} new course(s) from ${config.documents.path}`));
      }

      try {
        await runChatREPL({ handle }, ctx, io);
      } finally {
        handle.close();
      }
    });
}
