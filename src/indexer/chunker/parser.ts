/**
 * Course Document Parser
 *
 * Document layout:
 *
 * ```
 * Course Title: <title>
 * Course Link: <url>
 * Course Instructor: <name>
 *
 * Lesson 0: <title>
 * Lesson Link: <url>
 * <body...>
 *
 * Lesson 1: <title>
 * <body...>
 * ```
 *
 * The title must be the first non-blank line. Link and instructor lines are
 * optional and only recognised on the two lines after it. Text between the header and
 * the first lesson marker is dropped.
 */

import { MalformedDocumentError } from '../../errors/index.js';
import type { Lesson, LessonSection, ParsedDocument } from './types.js';

const TITLE_PATTERN = /^course title:\s*(.*)$/i;
const LINK_PATTERN = /^course link:\s*(.*)$/i;
const INSTRUCTOR_PATTERN = /^course instructor:\s*(.*)$/i;
const LESSON_PATTERN = /^lesson\s+(\d+):\s*(.*)$/i;
const LESSON_LINK_PATTERN = /^lesson link:\s*(.*)$/i;

/** Empty values mean "absent" */
function optionalValue(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

interface OpenSection {
  lesson: Lesson;
  lines: string[];
  /** Whether the line after the marker may still be a Lesson Link line */
  awaitingLink: boolean;
}

/**
 * Parse a course document into course metadata and lesson sections.
 *
 * @throws MalformedDocumentError on a missing title or a repeated lesson number
 */
export function parseCourseDocument(text: string, source?: string): ParsedDocument {
  const lines = text.replace(/^﻿/, '').split(/\r?\n/);
  const titleLine = Math.max(0, lines.findIndex((line) => line.trim() !== ''));

  const titleMatch = TITLE_PATTERN.exec(lines[titleLine]?.trim() ?? '');
  const title = optionalValue(titleMatch?.[1]);
  if (!title) {
    throw new MalformedDocumentError('first non-blank line must be "Course Title: <title>"', source);
  }

  let link: string | undefined;
  let instructor: string | undefined;
  let bodyStart = titleLine + 1;
  for (let i = titleLine + 1; i < titleLine + 3 && i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    const linkMatch = LINK_PATTERN.exec(line);
    const instructorMatch = INSTRUCTOR_PATTERN.exec(line);
    if (linkMatch) {
      link = optionalValue(linkMatch[1]);
    } else if (instructorMatch) {
      instructor = optionalValue(instructorMatch[1]);
    } else {
      break;
    }
    bodyStart = i + 1;
  }

  const sections: OpenSection[] = [];
  const seen = new Set<number>();
  const preamble: string[] = [];
  let current: OpenSection | undefined;

  for (const rawLine of lines.slice(bodyStart)) {
    const line = rawLine.trim();
    const lessonMatch = LESSON_PATTERN.exec(line);

    if (lessonMatch) {
      const number = Number.parseInt(lessonMatch[1] ?? '', 10);
      if (seen.has(number)) {
        throw new MalformedDocumentError(`lesson ${number} appears more than once`, source);
      }
      seen.add(number);
      current = {
        lesson: { number, title: optionalValue(lessonMatch[2]) ?? `Lesson ${number}` },
        lines: [],
        awaitingLink: true,
      };
      sections.push(current);
      continue;
    }

    if (!current) {
      preamble.push(line);
      continue;
    }

    if (current.awaitingLink && line !== '') {
      current.awaitingLink = false;
      const linkMatch = LESSON_LINK_PATTERN.exec(line);
      if (linkMatch) {
        current.lesson.link = optionalValue(linkMatch[1]);
        continue;
      }
    }

    current.lines.push(line);
  }

  const ordered: LessonSection[] = sections
    .map((section) => ({ lesson: section.lesson, body: section.lines.join('\n').trim() }))
    .sort((a, b) => a.lesson.number - b.lesson.number);

  const parsed: ParsedDocument = {
    course: {
      title,
      link,
      instructor,
      lessons: ordered.map((section) => section.lesson),
    },
    sections: ordered,
  };

  if (sections.length === 0) {
    const body = preamble.join('\n').trim();
    if (body) {
      parsed.unsectionedBody = body;
    }
  }

  return parsed;
}
