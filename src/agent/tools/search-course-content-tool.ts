/**
 * search_course_content
 *
 * Semantic search over course chunks with optional course and lesson
 * filters. A course name that matches nothing is reported to the model as
 * text, not thrown.
 */

import { z } from 'zod';

import { NoCourseMatchError } from '../../errors/index.js';
import { formatNoResults, formatResults, toSources } from '../../search/formatter.js';
import type { CourseIndex } from '../../search/store.js';
import type { CourseTool, ToolOutcome } from './types.js';

export const SEARCH_TOOL_NAME = 'search_course_content';

// Models sometimes send null for an omitted optional argument
const optional = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((value) => value ?? undefined);

export const searchCourseContentArgsSchema = z.object({
  query: z.string().min(1),
  course_name: optional(z.string().min(1)),
  lesson_number: optional(z.number().int().nonnegative()),
});

export type SearchCourseContentArgs = z.infer<typeof searchCourseContentArgsSchema>;

export function createSearchCourseContentTool(
  index: Pick<CourseIndex, 'resolveCourseName' | 'search'>,
  options: { maxResults: number }
): CourseTool<SearchCourseContentArgs> {
  return {
    name: SEARCH_TOOL_NAME,
    description: 'Search course materials with smart course name matching and lesson filtering',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to search for in the course content' },
        course_name: {
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
        lesson_number: {
          type: 'integer',
          description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
        },
      },
      required: ['query'],
    },
    schema: searchCourseContentArgsSchema,

    async execute({ query, course_name, lesson_number }): Promise<ToolOutcome> {
      let courseTitle: string | undefined;
      if (course_name !== undefined) {
        try {
          courseTitle = await index.resolveCourseName(course_name);
        } catch (error) {
          if (error instanceof NoCourseMatchError) {
            return { observation: `No course found matching '${course_name}'.`, sources: [] };
          }
          throw error;
        }
      }

      const results = await index.search(query, {
        courseName: courseTitle,
        lessonNumber: lesson_number,
        limit: options.maxResults,
      });

      if (results.length === 0) {
        return {
          observation: formatNoResults({ courseName: course_name, lessonNumber: lesson_number }),
          sources: [],
        };
      }

      return { observation: formatResults(results), sources: toSources(results) };
    },
  };
}
