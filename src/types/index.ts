export type {
  TaskStatus,
  TaskType,
  TaskError,
  Task,
  TaskInfo,
  TaskList,
} from './task.js';
export {
  TASK_STATUSES,
  TERMINAL_TASK_STATUSES,
  isTerminalStatus,
  parseTimestamp,
  parseTask,
  parseTaskInfo,
  parseTaskList,
} from './task.js';
export type {
  Document,
  DocumentId,
  DocumentWriteOptions,
  SearchParams,
  SearchResults,
  GetDocumentOptions,
  DocumentsQuery,
  DocumentsPage,
} from './document.js';
export { parseSearchResults, parseDocument, parseDocumentsPage } from './document.js';
export { parseWith } from './parse.js';
