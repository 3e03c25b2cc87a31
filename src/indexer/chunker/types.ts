/**
 * Chunker Types
 *
 * Course documents are parsed into a Course with its lessons, then cut into
 * context-prefixed chunks ready for embedding.
 */

export interface Lesson {
  /** Non-negative lesson number, unique within the course */
  number: number;
  title: string;
  link?: string;
}

export interface Course {
  /** Unique identifier of the course */
  title: string;
  link?: string;
  instructor?: string;
  /** Ordered by lesson number */
  lessons: Lesson[];
}

/**
 * A chunk of course text, prefixed with its course/lesson context.
 */
export interface CourseChunk {
  /** Prefixed text; this is what gets embedded and stored */
  text: string;
  courseTitle: string;
  /** Absent for documents that have no lesson markers */
  lessonNumber?: number;
  /** Emission order within the course, from 0 */
  index: number;
}

/**
 * A lesson and its raw body text, before chunking.
 */
export interface LessonSection {
  lesson: Lesson;
  body: string;
}

export interface ParsedDocument {
  course: Course;
  /** One section per lesson, in lesson-number order */
  sections: LessonSection[];
  /** Body of a document with no lesson markers at all */
  unsectionedBody?: string;
}

export interface ChunkedDocument {
  course: Course;
  chunks: CourseChunk[];
}

export interface ChunkingOptions {
  /** Maximum chunk length in characters, context prefix included */
  chunkSize: number;
  /** Characters of trailing whole sentences repeated at the start of the next chunk */
  chunkOverlap: number;
}
