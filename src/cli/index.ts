#!/usr/bin/env node
/**
 * Course Q&A CLI Entry Point
 *
 * The `cqa` binary: parses arguments and routes every failure through
 * handleError so it exits with the error's code.
 */

import { createProgram } from './program.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

async function main(): Promise<void> {
  const program = createProgram();

  const getErrorOptions = () => {
    const opts = program.opts<{ verbose?: boolean; json?: boolean }>();
    return { verbose: opts.verbose ?? false, json: opts.json ?? false };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

await main();
