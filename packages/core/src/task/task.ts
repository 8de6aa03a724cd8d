/**
 * A single todo entry and its two text forms: the persisted line
 * (`- [x] note`) and the terminal display form (`✓ note`).
 */

import type { Task } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { Palette } from '../display.js';
import { plainPalette } from '../display.js';
import { InvalidNoteError, TaskParseError } from '../errors.js';

const DONE_MARK = 'x';
const TODO_MARK = ' ';
const LINE_BREAK_RE = /[\r\n]/;

/** Create a new Todo task */
export function createTask(note: string): Task {
  if (LINE_BREAK_RE.test(note)) throw new InvalidNoteError(note);
  return { status: TaskStatus.Todo, note };
}

/** Return the task as Done. A Done task is returned unchanged. */
export function checkTask(task: Task): Task {
  return task.status === TaskStatus.Todo ? { ...task, status: TaskStatus.Done } : task;
}

/** Return the task as Todo. A Todo task is returned unchanged. */
export function undoTask(task: Task): Task {
  return task.status === TaskStatus.Done ? { ...task, status: TaskStatus.Todo } : task;
}

export function isDone(task: Task): boolean {
  return task.status === TaskStatus.Done;
}

/**
 * Parse one line of the todo file.
 * Grammar: `- [` STATUS `] ` NOTE, where STATUS is `x` or a single space.
 */
export function parseTask(line: string): Task {
  if (!line.startsWith('- [') || line.slice(4, 6) !== '] ') {
    throw new TaskParseError(line);
  }

  const note = line.slice(6);
  if (LINE_BREAK_RE.test(note)) throw new TaskParseError(line);

  switch (line.charAt(3)) {
    case DONE_MARK: return { status: TaskStatus.Done, note };
    case TODO_MARK: return { status: TaskStatus.Todo, note };
    default: throw new TaskParseError(line);
  }
}

/** Render a task as it is stored in the todo file */
export function renderTask(task: Task): string {
  const mark = task.status === TaskStatus.Done ? DONE_MARK : TODO_MARK;
  return `- [${mark}] ${task.note}`;
}

/** Display form for terminal listings, never written to disk */
export function formatTask(task: Task, palette: Palette = plainPalette): string {
  const glyph = task.status === TaskStatus.Done
    ? palette.done('✓')
    : palette.todo('✖');
  return `${glyph} ${task.note}`;
}
