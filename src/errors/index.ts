/**
 * Error types and the CLI error handler.
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  MalformedDocumentError,
  NoCourseMatchError,
  InvalidFilterError,
  IndexUnavailableError,
  ModelUnavailableError,
  IngestCancelledError,
  toError,
} from './types.js';

export {
  toCLIError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
