/**
 * Error output and exit codes for the cqa CLI.
 *
 * Anything thrown out of a command is first turned into a CLIError, so text
 * and `--json` output share one shape and one exit code rule.
 */

import chalk from 'chalk';
import { CLIError, toError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include the stack trace */
  verbose?: boolean;
  json?: boolean;
}

/**
 * Printed to stderr under `--json`
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * The CLIError to report for a thrown value. Anything that is not already a
 * CLIError exits with 1 and points at `--verbose`.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }
  const cause = toError(error);
  const wrapped = new CLIError(cause.message, VERBOSE_HINT);
  wrapped.stack = error instanceof Error ? cause.stack : undefined;
  return wrapped;
}

export function getExitCode(error: unknown): number {
  return toCLIError(error).code;
}

/**
 * Format an error for stderr without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const cliError = toCLIError(error);
  const stack = options.verbose ? cliError.stack : undefined;

  if (options.json) {
    const output: ErrorOutput = { error: cliError.message, code: cliError.code, hint: cliError.hint, stack };
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + cliError.message];
  if (cliError.hint && !(stack && cliError.hint === VERBOSE_HINT)) {
    lines.push(chalk.dim('Hint: ') + cliError.hint);
  }
  if (stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(stack));
  }
  return lines.join('\n');
}

/**
 * Print the formatted error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
