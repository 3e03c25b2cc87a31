/**
 * Search Result Formatter
 *
 * Renders search results as the text observation handed to the language
 * model, and extracts the sources shown with an answer.
 *
 * @example
 * ```typescript
 * formatResults(results);
 * // [Intro - Lesson 0]
 * // Course Intro Lesson 0 content: Vectors store meaning.
 * //
 * // [Intro - Lesson 2]
 * // Course Intro Lesson 2 content: ...
 * ```
 */

import type { AnswerSource, CourseSearchResult } from './types.js';

/**
 * `[Title - Lesson n]`, or `[Title]` for course-level chunks
 */
export function formatResultHeader(result: Pick<CourseSearchResult, 'courseTitle' | 'lessonNumber'>): string {
  return result.lessonNumber === undefined
    ? `[${result.courseTitle}]`
    : `[${result.courseTitle} - Lesson ${result.lessonNumber}]`;
}

export function formatResults(results: CourseSearchResult[]): string {
  return results.map((result) => `${formatResultHeader(result)}\n${result.content}`).join('\n\n');
}

/**
 * Sentinel observation for a search that matched nothing.
 */
export function formatNoResults(filters: { courseName?: string; lessonNumber?: number } = {}): string {
  let message = 'No relevant content found';
  if (filters.courseName !== undefined) {
    message += ` in course '${filters.courseName}'`;
  }
  if (filters.lessonNumber !== undefined) {
    message += ` in lesson ${filters.lessonNumber}`;
  }
  return `${message}.`;
}

export function toSource(result: CourseSearchResult): AnswerSource {
  const source: AnswerSource = { courseTitle: result.courseTitle };
  if (result.lessonNumber !== undefined) {
    source.lessonNumber = result.lessonNumber;
  }
  if (result.link !== undefined) {
    source.link = result.link;
  }
  return source;
}

/**
 * Sources in result order, one per distinct course/lesson.
 */
export function toSources(results: CourseSearchResult[]): AnswerSource[] {
  const seen = new Set<string>();
  const sources: AnswerSource[] = [];
  for (const result of results) {
    const key = `${result.courseTitle}\u0000${result.lessonNumber ?? ''}`;
    if (!seen.has(key)) {
      seen.add(key);
      sources.push(toSource(result));
    }
  }
  return sources;
}

/**
 * Label shown for a source in the terminal: `Title - Lesson n (link)`
 */
export function formatSourceLabel(source: AnswerSource): string {
  const label =
    source.lessonNumber === undefined ? source.courseTitle : `${source.courseTitle} - Lesson ${source.lessonNumber}`;
  return source.link ? `${label} (${source.link})` : label;
}
