/**
 * Search Module
 *
 * The SQLite-backed course index and result formatting.
 */

export { CourseIndex, DEFAULT_MAX_RESULTS, listCourseSummaries } from './store.js';
export { cosineSimilarity } from './similarity.js';
export {
  formatResultHeader,
  formatResults,
  formatNoResults,
  formatSourceLabel,
  toSource,
  toSources,
} from './formatter.js';
export type {
  CourseIndexOptions,
  UpsertOptions,
  UpsertResult,
  SearchOptions,
  CourseSearchResult,
  IndexedCourse,
  CourseSummary,
  AnswerSource,
} from './types.js';
export { openCourseIndex, type OpenCourseIndexOptions, type OpenedCourseIndex } from './open.js';
