/**
 * Courses Command
 *
 * Lists indexed courses:
 *   cqa courses          - Table of titles with lesson and chunk counts
 *   cqa courses --json   - { total_courses, course_titles }
 *
 * Reads the database only; no model is loaded.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig, resolveDbPath } from '../../config/loader.js';
import { openDatabase } from '../../database/index.js';
import { listCourseSummaries } from '../../search/store.js';
import type { CourseSummary } from '../../search/types.js';
import { formatTable, type Column } from '../../utils/table.js';

function readCourses(dbPath: string): CourseSummary[] {
  const db = openDatabase(dbPath);
  try {
    return listCourseSummaries(db);
  } finally {
    db.close();
  }
}

/**
 * Create the courses command
 */
export function createCoursesCommand(getContext: () => CommandContext): Command {
  return new Command('courses')
    .alias('ls')
    .description('List indexed courses')
    .action(() => {
      const ctx = getContext();
      const dbPath = resolveDbPath(loadConfig());
      ctx.debug(`Database: ${dbPath}`);

      const courses = readCourses(dbPath);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            { total_courses: courses.length, course_titles: courses.map((c) => c.title) },
            null,
            2
          )
        );
        return;
      }

      if (courses.length === 0) {
        ctx.log(chalk.yellow('No courses indexed yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('cqa ingest ./docs')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'Course', key: 'title' },
        { header: 'Instructor', key: 'instructor' },
        { header: 'Lessons', key: 'lessons', align: 'right' },
        { header: 'Chunks', key: 'chunks', align: 'right' },
      ];

      const rows = courses.map((c) => ({
        title: c.title,
        instructor: c.instructor ?? '-',
        lessons: c.lessonCount,
        chunks: c.chunkCount,
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${courses.length} course${courses.length === 1 ? '' : 's'} indexed`));
    });
}
