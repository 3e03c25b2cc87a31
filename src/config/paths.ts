/**
 * Path definitions for the assistant's home directory.
 *
 * ~/.cqa/            (or $CQA_HOME)
 * ├── courses.db     SQLite index
 * └── config.toml    user configuration
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export function getCqaDir(): string {
  const override = process.env.CQA_HOME?.trim();
  return override ? override : join(homedir(), '.cqa');
}

export function getDbPath(): string {
  return join(getCqaDir(), 'courses.db');
}

export function getConfigPath(): string {
  return join(getCqaDir(), 'config.toml');
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
