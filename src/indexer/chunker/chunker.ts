/**
 * Chunker
 *
 * 1. Parse the document into course metadata and lesson sections
 * 2. Split each lesson body into sentences
 * 3. Pack sentences greedily into windows no longer than the chunk size
 *    (prefix included), repeating trailing sentences that fit in the overlap
 * 4. Prefix each window with its course/lesson context
 *
 * Chunk indexes run from 0 across the whole course, in lesson-number order.
 */

import { readFile, stat } from 'node:fs/promises';
import { MalformedDocumentError } from '../../errors/index.js';
import { contextPrefix, MAX_DOCUMENT_SIZE, resolveChunkingOptions } from './config.js';
import { parseCourseDocument } from './parser.js';
import { splitSentences } from './sentences.js';
import type { ChunkedDocument, ChunkingOptions, CourseChunk } from './types.js';

/**
 * Group sentences into windows whose joined length stays within `budget`.
 *
 * A sentence longer than the budget becomes a window of its own. Each window
 * after the first starts with the longest run of the previous window's
 * trailing sentences that fits in `overlap`, but always starts at least one
 * sentence later than the previous window did.
 */
export function windowSentences(sentences: string[], budget: number, overlap: number): string[] {
  const windows: string[] = [];
  let start = 0;

  while (start < sentences.length) {
    let end = start;
    let length = 0;

    while (end < sentences.length) {
      const sentence = sentences[end] ?? '';
      const addition = sentence.length + (end > start ? 1 : 0);
      if (end > start && length + addition > budget) {
        break;
      }
      length += addition;
      end++;
    }

    windows.push(sentences.slice(start, end).join(' '));
    if (end >= sentences.length) {
      break;
    }

    let carried = 0;
    let carriedLength = 0;
    for (let k = end - 1; k > start; k--) {
      const addition = (sentences[k] ?? '').length + (carried > 0 ? 1 : 0);
      if (carriedLength + addition > overlap) {
        break;
      }
      carriedLength += addition;
      carried++;
    }

    start = end - carried;
  }

  return windows;
}

function chunkBody(
  body: string,
  courseTitle: string,
  lessonNumber: number | undefined,
  options: ChunkingOptions,
  firstIndex: number
): CourseChunk[] {
  const prefix = contextPrefix(courseTitle, lessonNumber);
  const budget = Math.max(1, options.chunkSize - prefix.length);

  return windowSentences(splitSentences(body), budget, options.chunkOverlap).map((window, i) => ({
    text: prefix + window,
    courseTitle,
    lessonNumber,
    index: firstIndex + i,
  }));
}

/**
 * Parse and chunk one course document.
 *
 * @param source - File the text came from, used in error messages
 * @throws MalformedDocumentError
 * @throws ValidationError on invalid options
 *
 * @example
 * ```ts
 * const { course, chunks } = chunkDocument(text, { chunkSize: 800, chunkOverlap: 100 });
 * chunks[0].text; // "Course Intro Lesson 0 content: ..."
 * ```
 */
export function chunkDocument(
  text: string,
  options: Partial<ChunkingOptions> = {},
  source?: string
): ChunkedDocument {
  const resolved = resolveChunkingOptions(options);
  const parsed = parseCourseDocument(text, source);
  const { course } = parsed;
  const chunks: CourseChunk[] = [];

  for (const section of parsed.sections) {
    chunks.push(...chunkBody(section.body, course.title, section.lesson.number, resolved, chunks.length));
  }

  if (parsed.unsectionedBody) {
    chunks.push(...chunkBody(parsed.unsectionedBody, course.title, undefined, resolved, chunks.length));
  }

  return { course, chunks };
}

/**
 * Read a document from disk and chunk it.
 *
 * @throws MalformedDocumentError if the file cannot be read or parsed
 */
export async function chunkCourseFile(
  filePath: string,
  options: Partial<ChunkingOptions> = {}
): Promise<ChunkedDocument> {
  let text: string;
  try {
    const { size } = await stat(filePath);
    if (size > MAX_DOCUMENT_SIZE) {
      throw new MalformedDocumentError(`document is ${size} bytes, larger than the ${MAX_DOCUMENT_SIZE} byte limit`, filePath);
    }
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof MalformedDocumentError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(`cannot read file (${reason})`, filePath);
  }
  return chunkDocument(text, options, filePath);
}
