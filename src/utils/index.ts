/**
 * Shared utilities.
 */

export { formatTable, type Column, type Alignment, type Row } from './table.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
