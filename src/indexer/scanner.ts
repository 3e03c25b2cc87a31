/**
 * Course Document Scanner
 *
 * Finds course documents under a directory with fast-glob.
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError, ValidationError } from '../errors/index.js';

/** Plain-text document extensions loaded by default */
export const DEFAULT_DOCUMENT_EXTENSIONS = ['txt', 'md'];

export interface ScanOptions {
  /** Extensions without the dot */
  extensions?: string[];
  /** Maximum directory depth (default: unlimited) */
  maxDepth?: number;
}

/**
 * Absolute paths of the course documents under `rootPath`, sorted.
 * Dotfiles and dot-directories are skipped.
 *
 * @throws FileNotFoundError if `rootPath` does not exist
 * @throws ValidationError if `rootPath` is not a directory
 */
export async function scanCourseDocuments(rootPath: string, options: ScanOptions = {}): Promise<string[]> {
  const absoluteRoot = resolve(rootPath);

  let isDirectory: boolean;
  try {
    isDirectory = statSync(absoluteRoot).isDirectory();
  } catch {
    throw new FileNotFoundError(absoluteRoot);
  }
  if (!isDirectory) {
    throw new ValidationError(`Not a directory: ${absoluteRoot}`);
  }

  const extensions = options.extensions ?? DEFAULT_DOCUMENT_EXTENSIONS;
  if (extensions.length === 0) {
    return [];
  }
  const pattern = extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;

  const entries = await fg(pattern, {
    cwd: absoluteRoot,
    absolute: true,
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
    deep: options.maxDepth ?? Infinity,
    suppressErrors: true,
  });

  return entries.sort();
}
