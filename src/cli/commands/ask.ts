/**
 * Ask Command
 *
 * One question answered from the indexed courses:
 *
 *   cqa ask "What is a vector index?"
 *   cqa ask "How is it built?" --session <id>
 *   cqa ask "Outline of the retrieval course" --json
 *
 * The assistant decides whether to search course content, fetch an outline,
 * or answer directly. Sources come back with the answer.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createCourseAssistant } from '../../agent/factory.js';
import type { QueryResult } from '../../agent/types.js';
import { formatSourceLabel } from '../../search/formatter.js';
import type { AnswerSource } from '../../search/types.js';
import { CLIError, toError } from '../../errors/index.js';

interface AskCommandOptions {
  /** Session id echoed back in the result. History only lives as long as the process. */
  session?: string;
  /** Override default_model */
  model?: string;
}

interface SourceJSON {
  course_title: string;
  lesson_number?: number;
  link?: string;
}

interface AskOutputJSON {
  answer: string;
  sources: SourceJSON[];
  session_id: string;
}

export function toSourceJSON(source: AnswerSource): SourceJSON {
  return {
    course_title: source.courseTitle,
    lesson_number: source.lessonNumber,
    link: source.link,
  };
}

export function toAskOutputJSON(result: QueryResult): AskOutputJSON {
  return {
    answer: result.answer,
    sources: result.sources.map(toSourceJSON),
    session_id: result.sessionId,
  };
}

/**
 * Print an answer with its numbered sources
 */
export function displayAnswer(ctx: CommandContext, result: QueryResult): void {
  ctx.log(result.answer);

  if (result.sources.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim('Sources:'));
    result.sources.forEach((source, i) => {
      ctx.log(chalk.dim(`  [${i + 1}] ${formatSourceLabel(source)}`));
    });
  }
}

/**
 * Wrap a failed query; CLIErrors keep their hint and exit code.
 */
export function queryFailure(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return new CLIError(`Failed to answer query: ${error.message}`, error.hint, error.code);
  }
  return new CLIError(`Failed to answer query: ${toError(error).message}`);
}

/**
 * Create the ask command.
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the indexed courses')
    .description('Ask a question about the indexed courses')
    .option('-s, --session <id>', 'Answer under this session id (use cqa chat for follow-ups)')
    .option('-m, --model <name>', 'Answering model (overrides default_model)')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const text = question.trim();
      if (!text) {
        throw new CLIError('Question cannot be empty', 'Provide a question, e.g.: cqa ask "What is a vector index?"');
      }
      ctx.debug(`Question: "${text}"`);

      const config = loadConfig();
      const handle = await createCourseAssistant(config, {
        logger: ctx,
        model: cmdOptions.model,
        loadDocuments: true,
        fallback: {
          onFallback: (from, to, reason) => ctx.warn(`${from} unavailable (${reason}), using ${to}`),
        },
      });
      ctx.debug(`Model: ${handle.provider}/${handle.model}`);

      try {
        let result: QueryResult;
        try {
          result = await handle.assistant.query(text, cmdOptions.session);
        } catch (error) {
          throw queryFailure(error);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(toAskOutputJSON(result), null, 2));
          return;
        }

        displayAnswer(ctx, result);
        ctx.log('');
        ctx.log(chalk.dim(`Session: ${result.sessionId}`));
      } finally {
        handle.close();
      }
    });
}
