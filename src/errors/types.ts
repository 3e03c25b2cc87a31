/**
 * Error types for the course Q&A assistant.
 *
 * Every error the library or the CLI raises on purpose extends CLIError,
 * which carries a recovery hint and a process exit code.
 */

/**
 * Base class for all assistant errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors: invalid TOML, unknown keys,
 * out-of-range values.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: cqa config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a provider API key is missing or invalid.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to a .env file)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures outside the query path (opening, migrating).
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the database file is writable, or delete it and re-run: cqa ingest', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when user input fails validation.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A course document whose header or lesson structure cannot be parsed.
 * Ingestion logs it and moves on to the next document.
 *
 * Exit code 7
 */
export class MalformedDocumentError extends CLIError {
  /** File the document came from, when known */
  public readonly source?: string;

  constructor(reason: string, source?: string) {
    super(
      source ? `Malformed course document ${source}: ${reason}` : `Malformed course document: ${reason}`,
      'The first non-blank line must read "Course Title: <title>" and lessons must start with "Lesson <n>: <title>"',
      7
    );
    this.name = 'MalformedDocumentError';
    this.source = source;
  }
}

/**
 * No indexed course can be matched to a user-supplied name.
 *
 * Exit code 8
 */
export class NoCourseMatchError extends CLIError {
  public readonly courseName: string;

  constructor(courseName: string) {
    super(
      `No course found matching '${courseName}'`,
      'Run: cqa courses  to list indexed courses, or cqa ingest to load some',
      8
    );
    this.name = 'NoCourseMatchError';
    this.courseName = courseName;
  }
}

/**
 * A search filter named a course that could not be resolved.
 *
 * Exit code 8
 */
export class InvalidFilterError extends CLIError {
  public readonly courseName: string;

  constructor(courseName: string) {
    super(
      `Invalid course filter: no course matches '${courseName}'`,
      'Run: cqa courses  to list indexed courses',
      8
    );
    this.name = 'InvalidFilterError';
    this.courseName = courseName;
  }
}

/**
 * The embedding backend or the index storage failed.
 *
 * Exit code 9
 */
export class IndexUnavailableError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      `Course index unavailable: ${message}`,
      'Check the embedding provider (cqa config get embedding.provider) and the database path',
      9
    );
    this.name = 'IndexUnavailableError';
    this.cause = cause;
  }
}

/**
 * The language-model service failed to answer.
 *
 * Exit code 10
 */
export class ModelUnavailableError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      `Language model unavailable: ${message}`,
      'Check your API key and network connection, then retry',
      10
    );
    this.name = 'ModelUnavailableError';
    this.cause = cause;
  }
}

/**
 * Ingestion stopped by Ctrl+C. Courses stored before the interrupt stay.
 *
 * Exit code 130
 */
export class IngestCancelledError extends CLIError {
  constructor() {
    super('Ingestion cancelled', 'Courses loaded before the interrupt stay indexed', 130);
    this.name = 'IngestCancelledError';
  }
}

/**
 * Wrap an unknown thrown value in an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
