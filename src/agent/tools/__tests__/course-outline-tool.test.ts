/**
 * get_course_outline Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { createCourseOutlineTool, formatOutline } from '../course-outline-tool.js';
import { NoCourseMatchError } from '../../../errors/index.js';
import type { IndexedCourse } from '../../../search/types.js';

const VECTOR_SEARCH: IndexedCourse = {
  title: 'Building Vector Search',
  link: 'https://example.com/courses/vector-search',
  instructor: 'Ada Park',
  lessons: [
    { number: 0, title: 'Introduction', link: 'https://example.com/courses/vector-search/lesson-0' },
    { number: 1, title: 'Embeddings', link: 'https://example.com/courses/vector-search/lesson-1' },
    { number: 2, title: 'Chunking' },
  ],
  embeddingModel: 'hashing-test',
  createdAt: '2026-01-01 00:00:00',
};

function fakeIndex(course: IndexedCourse | undefined) {
  return {
    resolveCourseName: vi.fn((name: string) =>
      name === 'nothing' ? Promise.reject(new NoCourseMatchError(name)) : Promise.resolve(VECTOR_SEARCH.title)
    ),
    getCourse: vi.fn(() => course),
  };
}

describe('formatOutline', () => {
  it('lists every lesson with its link when present', () => {
    expect(formatOutline(VECTOR_SEARCH)).toBe(
      [
        '**Course Title:** Building Vector Search',
        '**Course Link:** https://example.com/courses/vector-search',
        '**Instructor:** Ada Park',
        '**Total Lessons:** 3',
        '',
        '**Lesson List:**',
        'Lesson 0: Introduction - https://example.com/courses/vector-search/lesson-0',
        'Lesson 1: Embeddings - https://example.com/courses/vector-search/lesson-1',
        'Lesson 2: Chunking',
      ].join('\n')
    );
  });

  it('omits a missing link and instructor', () => {
    const outline = formatOutline({ ...VECTOR_SEARCH, link: undefined, instructor: undefined, lessons: [] });

    expect(outline).toBe('**Course Title:** Building Vector Search\n**Total Lessons:** 0\n\n**Lesson List:**');
  });
});

describe('createCourseOutlineTool', () => {
  it('returns the outline and the course as its source', async () => {
    const index = fakeIndex(VECTOR_SEARCH);
    const tool = createCourseOutlineTool(index);

    const outcome = await tool.execute({ course_title: 'vector' });

    expect(outcome.observation).toBe(formatOutline(VECTOR_SEARCH));
    expect(outcome.sources).toEqual([
      { courseTitle: 'Building Vector Search', link: 'https://example.com/courses/vector-search' },
    ]);
    expect(index.getCourse).toHaveBeenCalledWith('Building Vector Search');
  });

  it('leaves the link off a source for a course without one', async () => {
    const tool = createCourseOutlineTool(fakeIndex({ ...VECTOR_SEARCH, link: undefined }));

    const outcome = await tool.execute({ course_title: 'vector' });

    expect(outcome.sources).toEqual([{ courseTitle: 'Building Vector Search' }]);
  });

  it('reports an unmatched course as text', async () => {
    const tool = createCourseOutlineTool(fakeIndex(VECTOR_SEARCH));

    await expect(tool.execute({ course_title: 'nothing' })).resolves.toEqual({
      observation: "No course found matching 'nothing'.",
      sources: [],
    });
  });

  it('reports a course removed after resolution as text', async () => {
    const tool = createCourseOutlineTool(fakeIndex(undefined));

    await expect(tool.execute({ course_title: 'vector' })).resolves.toEqual({
      observation: "No course found matching 'vector'.",
      sources: [],
    });
  });
});
