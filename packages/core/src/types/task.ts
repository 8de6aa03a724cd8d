import type { TaskStatus } from './task-status.js';

export interface Task {
  readonly status: TaskStatus;
  readonly note: string; // single line, never contains a line break
}
