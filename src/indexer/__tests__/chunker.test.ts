/**
 * Chunker Module Tests
 *
 * - Document parsing (header, lesson markers, lesson links)
 * - Sentence splitting
 * - Sentence windows with overlap
 * - Chunk prefixes and indexes
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  chunkDocument,
  chunkCourseFile,
  parseCourseDocument,
  splitSentences,
  windowSentences,
  contextPrefix,
  resolveChunkingOptions,
} from '../chunker/index.js';
import { MalformedDocumentError, ValidationError } from '../../errors/index.js';

const TEST_DIR = join(tmpdir(), 'cqa-chunker-test-' + Date.now());

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

const INTRO_DOC = [
  'Course Title: Intro',
  'Course Link: https://example.com/intro',
  'Course Instructor: Ada Lovelace',
  '',
  'Lesson 0: Basics',
  'Lesson Link: https://example.com/intro/0',
  'Vectors store meaning. Search compares vectors. Answers cite sources.',
  '',
].join('\n');

const UNORDERED_DOC = [
  'Course Title: Retrieval Basics',
  'Course Instructor: Ada',
  '',
  'Intro text to ignore.',
  'Lesson 2: Ranking',
  'Ranking orders results. Scores come from similarity.',
  'Lesson 1: Embeddings',
  'Lesson Link: https://example.com/l1',
  '',
  'Embeddings are vectors. They capture meaning.',
].join('\n');

// ============================================================================
// Parsing
// ============================================================================

describe('parseCourseDocument', () => {
  it('reads the course header', () => {
    const { course } = parseCourseDocument(INTRO_DOC);

    expect(course.title).toBe('Intro');
    expect(course.link).toBe('https://example.com/intro');
    expect(course.instructor).toBe('Ada Lovelace');
  });

  it('reads lessons with their links', () => {
    const { course, sections } = parseCourseDocument(INTRO_DOC);

    expect(course.lessons).toEqual([{ number: 0, title: 'Basics', link: 'https://example.com/intro/0' }]);
    expect(sections[0]?.body).toBe('Vectors store meaning. Search compares vectors. Answers cite sources.');
  });

  it('orders lessons by number and drops the preamble', () => {
    const { course, sections } = parseCourseDocument(UNORDERED_DOC);

    expect(course.link).toBeUndefined();
    expect(course.lessons.map((l) => l.number)).toEqual([1, 2]);
    expect(course.lessons[0]?.link).toBe('https://example.com/l1');
    expect(course.lessons[1]?.link).toBeUndefined();
    expect(sections.map((s) => s.body).join(' ')).not.toContain('Intro text to ignore');
  });

  it('treats empty header values as absent', () => {
    const { course } = parseCourseDocument('Course Title: X\nCourse Link:\nCourse Instructor: Bob');

    expect(course.link).toBeUndefined();
    expect(course.instructor).toBe('Bob');
  });

  it('finds the title after leading blank lines', () => {
    const { course, sections } = parseCourseDocument(
      '\n  \nCourse Title: Intro\nCourse Instructor: Ada\nLesson 0: Basics\nVectors store meaning.'
    );

    expect(course.title).toBe('Intro');
    expect(course.instructor).toBe('Ada');
    expect(sections.map((s) => s.body)).toEqual(['Vectors store meaning.']);
  });

  it('rejects a blank document', () => {
    expect(() => parseCourseDocument('\n\n')).toThrow(
      'Malformed course document: first non-blank line must be "Course Title: <title>"'
    );
  });

  it('rejects a document without a title line', () => {
    expect(() => parseCourseDocument('Title: Missing label\nLesson 0: A\nText.')).toThrow(MalformedDocumentError);
  });

  it('rejects an empty title', () => {
    expect(() => parseCourseDocument('Course Title:   \nLesson 0: A\nText.')).toThrow(MalformedDocumentError);
  });

  it('rejects a repeated lesson number', () => {
    const doc = 'Course Title: X\nLesson 1: A\nOne.\nLesson 1: B\nTwo.';

    expect(() => parseCourseDocument(doc, 'x.txt')).toThrow(
      'Malformed course document x.txt: lesson 1 appears more than once'
    );
  });

  it('names untitled lessons by number', () => {
    const { course } = parseCourseDocument('Course Title: X\nLesson 3:\nBody.');

    expect(course.lessons).toEqual([{ number: 3, title: 'Lesson 3' }]);
  });
});

// ============================================================================
// Sentences and windows
// ============================================================================

describe('splitSentences', () => {
  it('splits on terminal punctuation followed by a capital', () => {
    expect(splitSentences('Use a tool, e.g. SQL. Dr. Smith agrees! Is it fast? yes it is. Done.')).toEqual([
      'Use a tool, e.g. SQL.',
      'Dr. Smith agrees!',
      'Is it fast? yes it is.',
      'Done.',
    ]);
  });

  it('collapses whitespace and returns nothing for blank text', () => {
    expect(splitSentences('One.\n\n   Two.')).toEqual(['One.', 'Two.']);
    expect(splitSentences('  \n ')).toEqual([]);
  });
});

describe('windowSentences', () => {
  const sentences = ['aaaa.', 'bbbb.', 'cccc.', 'dddd.'];

  it('packs sentences up to the budget', () => {
    expect(windowSentences(sentences, 11, 0)).toEqual(['aaaa. bbbb.', 'cccc. dddd.']);
  });

  it('repeats trailing sentences that fit in the overlap', () => {
    expect(windowSentences(sentences, 11, 5)).toEqual(['aaaa. bbbb.', 'bbbb. cccc.', 'cccc. dddd.']);
  });

  it('always advances even when the overlap covers the whole window', () => {
    expect(windowSentences(sentences, 5, 100)).toEqual(['aaaa.', 'bbbb.', 'cccc.', 'dddd.']);
  });

  it('gives an oversized sentence its own window', () => {
    expect(windowSentences(['tiny.', 'x'.repeat(30), 'end.'], 10, 0)).toEqual(['tiny.', 'x'.repeat(30), 'end.']);
  });
});

// ============================================================================
// chunkDocument
// ============================================================================

describe('chunkDocument', () => {
  it('yields overlapping prefixed chunks when a lesson exceeds the window', () => {
    const { chunks } = chunkDocument(INTRO_DOC, { chunkSize: 80, chunkOverlap: 30 });

    expect(chunks).toEqual([
      {
        text: 'Course Intro Lesson 0 content: Vectors store meaning. Search compares vectors.',
        courseTitle: 'Intro',
        lessonNumber: 0,
        index: 0,
      },
      {
        text: 'Course Intro Lesson 0 content: Search compares vectors. Answers cite sources.',
        courseTitle: 'Intro',
        lessonNumber: 0,
        index: 1,
      },
    ]);
  });

  it('numbers chunks across lessons in lesson order', () => {
    const { chunks } = chunkDocument(UNORDERED_DOC);

    expect(chunks.map((c) => [c.index, c.lessonNumber, c.text])).toEqual([
      [0, 1, 'Course Retrieval Basics Lesson 1 content: Embeddings are vectors. They capture meaning.'],
      [1, 2, 'Course Retrieval Basics Lesson 2 content: Ranking orders results. Scores come from similarity.'],
    ]);
  });

  it('keeps an oversized sentence whole', () => {
    const long = 'This sentence is definitely much longer than the budget allows.';
    const doc = `Course Title: A\nLesson 0: L\nShort one. ${long} End.`;

    const { chunks } = chunkDocument(doc, { chunkSize: 60, chunkOverlap: 0 });

    expect(chunks.map((c) => c.text)).toEqual([
      'Course A Lesson 0 content: Short one.',
      `Course A Lesson 0 content: ${long}`,
      'Course A Lesson 0 content: End.',
    ]);
  });

  it('keeps every chunk within the window and in order', () => {
    const body = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about topic ${i % 7}.`).join(' ');
    const doc = `Course Title: Long Course\nLesson 5: Everything\n${body}`;

    const { chunks } = chunkDocument(doc, { chunkSize: 200, chunkOverlap: 50 });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((c) => c.index)).toEqual(chunks.map((_, i) => i));
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(200);
      expect(chunk.text.startsWith('Course Long Course Lesson 5 content: ')).toBe(true);
    }
    expect(chunks[0]?.text).toContain('Sentence number 0 ');
    expect(chunks[chunks.length - 1]?.text.endsWith('Sentence number 39 talks about topic 4.')).toBe(true);
  });

  it('chunks a document without lesson markers as course-level text', () => {
    const { course, chunks } = chunkDocument('Course Title: Notes\n\nJust some text. More text.');

    expect(course.lessons).toEqual([]);
    expect(chunks).toEqual([
      { text: 'Course Notes content: Just some text. More text.', courseTitle: 'Notes', lessonNumber: undefined, index: 0 },
    ]);
  });

  it('produces no chunks for empty lessons', () => {
    const { course, chunks } = chunkDocument('Course Title: X\nLesson 0: Empty\n\nLesson 1: Also empty');

    expect(course.lessons).toHaveLength(2);
    expect(chunks).toEqual([]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => chunkDocument(INTRO_DOC, { chunkSize: 100, chunkOverlap: 100 })).toThrow(ValidationError);
  });
});

describe('chunking helpers', () => {
  it('builds the context prefix', () => {
    expect(contextPrefix('Intro', 0)).toBe('Course Intro Lesson 0 content: ');
    expect(contextPrefix('Intro')).toBe('Course Intro content: ');
  });

  it('fills in default options', () => {
    expect(resolveChunkingOptions({ chunkSize: 500 })).toEqual({ chunkSize: 500, chunkOverlap: 100 });
  });
});

// ============================================================================
// chunkCourseFile
// ============================================================================

describe('chunkCourseFile', () => {
  it('reads and chunks a file', async () => {
    const filePath = join(TEST_DIR, 'intro.txt');
    writeFileSync(filePath, INTRO_DOC);

    const { course, chunks } = await chunkCourseFile(filePath);

    expect(course.title).toBe('Intro');
    expect(chunks).toHaveLength(1);
  });

  it('reports unreadable files as malformed documents with their path', async () => {
    const filePath = join(TEST_DIR, 'missing.txt');

    await expect(chunkCourseFile(filePath)).rejects.toThrow(MalformedDocumentError);
    await expect(chunkCourseFile(filePath)).rejects.toThrow(filePath);
  });
});
