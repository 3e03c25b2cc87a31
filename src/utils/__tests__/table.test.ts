/**
 * Tests for table formatting
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { formatTable, type Column } from '../table.js';

describe('formatTable', () => {
  let savedLevel: typeof chalk.level;

  beforeAll(() => {
    savedLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = savedLevel;
  });

  const columns: Column[] = [
    { header: 'Course', key: 'title' },
    { header: 'Lessons', key: 'lessons', align: 'right' },
  ];

  it('renders headers, rows and borders', () => {
    const result = formatTable(columns, [
      { title: 'Intro', lessons: 4 },
      { title: 'Advanced Retrieval', lessons: 12 },
    ]);

    expect(result.split('\n')).toEqual([
      '┌────────────────────┬─────────┐',
      '│ Course             │ Lessons │',
      '├────────────────────┼─────────┤',
      '│ Intro              │       4 │',
      '│ Advanced Retrieval │      12 │',
      '└────────────────────┴─────────┘',
    ]);
  });

  it('renders only the header when there are no rows', () => {
    expect(formatTable(columns, []).split('\n')).toHaveLength(4);
  });

  it('renders null and undefined cells as empty', () => {
    const lines = formatTable(columns, [{ title: 'Intro', lessons: null }]).split('\n');

    expect(lines[3]).toBe('│ Course │         │'.replace('Course', 'Intro '));
  });

  it('ignores ANSI codes when measuring width', () => {
    chalk.level = 1;
    const lines = formatTable([{ header: 'Name', key: 'name' }], [{ name: chalk.green('ab') }]).split(
      '\n'
    );
    chalk.level = 0;

    expect(lines[0]).toBe('┌──────┐');
  });

  it('returns an empty string without columns', () => {
    expect(formatTable([], [{ a: 1 }])).toBe('');
  });
});
