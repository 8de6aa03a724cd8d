// Types
export { TaskStatus } from './types/task-status.js';
export type { Task } from './types/task.js';
export type { IndexResult } from './types/results.js';
export { isApplied, isOutOfRange } from './types/results.js';

// Errors
export { TaskParseError, FileEncodingError, InvalidNoteError, ConfigError } from './errors.js';

// Display
export { plainPalette } from './display.js';
export type { Palette } from './display.js';

// Task
export {
  createTask, checkTask, undoTask, isDone,
  parseTask, renderTask, formatTask,
} from './task/task.js';

// Task list
export { TaskList, parseTodoFile, renderTodoFile, decodeTodoFile } from './task-list/task-list.js';

// Config
export { resolveTodoPath, TODO_FILE_NAME, TODO_FILE_ENV } from './config.js';
export type { TodoPathSources } from './config.js';
