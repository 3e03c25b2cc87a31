/**
 * get_course_outline
 *
 * Title, link, instructor and the ordered lesson list of one course.
 */

import { z } from 'zod';

import { NoCourseMatchError } from '../../errors/index.js';
import type { CourseIndex } from '../../search/store.js';
import type { IndexedCourse } from '../../search/types.js';
import type { CourseTool, ToolOutcome } from './types.js';

export const OUTLINE_TOOL_NAME = 'get_course_outline';

export const courseOutlineArgsSchema = z.object({
  course_title: z.string().min(1),
});

export type CourseOutlineArgs = z.infer<typeof courseOutlineArgsSchema>;

export function formatOutline(course: IndexedCourse): string {
  const lines = [`**Course Title:** ${course.title}`];
  if (course.link) {
    lines.push(`**Course Link:** ${course.link}`);
  }
  if (course.instructor) {
    lines.push(`**Instructor:** ${course.instructor}`);
  }
  lines.push(`**Total Lessons:** ${course.lessons.length}`, '', '**Lesson List:**');

  for (const lesson of course.lessons) {
    const line = `Lesson ${lesson.number}: ${lesson.title}`;
    lines.push(lesson.link ? `${line} - ${lesson.link}` : line);
  }

  return lines.join('\n');
}

export function createCourseOutlineTool(
  index: Pick<CourseIndex, 'resolveCourseName' | 'getCourse'>
): CourseTool<CourseOutlineArgs> {
  return {
    name: OUTLINE_TOOL_NAME,
    description: 'Get course outline including title, link, and complete lesson list with numbers and titles',
    parameters: {
      type: 'object',
      properties: {
        course_title: {
          type: 'string',
          description: 'Course title to get outline for (partial matches work)',
        },
      },
      required: ['course_title'],
    },
    schema: courseOutlineArgsSchema,

    async execute({ course_title }): Promise<ToolOutcome> {
      let title: string;
      try {
        title = await index.resolveCourseName(course_title);
      } catch (error) {
        if (error instanceof NoCourseMatchError) {
          return { observation: `No course found matching '${course_title}'.`, sources: [] };
        }
        throw error;
      }

      const course = index.getCourse(title);
      if (!course) {
        return { observation: `No course found matching '${course_title}'.`, sources: [] };
      }

      const source = course.link ? { courseTitle: course.title, link: course.link } : { courseTitle: course.title };
      return { observation: formatOutline(course), sources: [source] };
    },
  };
}
