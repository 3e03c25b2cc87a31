/**
 * Agent Tools
 */

export { ToolRegistry } from './registry.js';
export {
  createSearchCourseContentTool,
  searchCourseContentArgsSchema,
  SEARCH_TOOL_NAME,
  type SearchCourseContentArgs,
} from './search-course-content-tool.js';
export {
  createCourseOutlineTool,
  courseOutlineArgsSchema,
  formatOutline,
  OUTLINE_TOOL_NAME,
  type CourseOutlineArgs,
} from './course-outline-tool.js';
export type { CourseTool, ToolOutcome, ToolRequest } from './types.js';
