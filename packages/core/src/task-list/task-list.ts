/**
 * The ordered, file-backed list of tasks for one invocation.
 *
 * Every mutation rewrites the whole file from memory, so the file is a
 * complete snapshot of the list after each call returns. There is no locking:
 * two processes saving the same file concurrently will overwrite each other.
 */

import {
  chmodSync, existsSync, readFileSync, realpathSync,
  renameSync, rmSync, statSync, writeFileSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { Task } from '../types/task.js';
import type { IndexResult } from '../types/results.js';
import type { Palette } from '../display.js';
import { plainPalette } from '../display.js';
import { TaskParseError, FileEncodingError } from '../errors.js';
import {
  createTask, checkTask, undoTask, isDone,
  parseTask, renderTask, formatTask,
} from '../task/task.js';

/** Parse the contents of a todo file. Empty lines are skipped. */
export function parseTodoFile(content: string): Task[] {
  const tasks: Task[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.replace(/\r$/, '');
    if (line.length === 0) continue;

    try {
      tasks.push(parseTask(line));
    } catch (err: unknown) {
      if (err instanceof TaskParseError) throw err.atLine(i + 1);
      throw err;
    }
  }

  return tasks;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decode file bytes, refusing invalid UTF-8 rather than replacing it */
export function decodeTodoFile(path: string, bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new FileEncodingError(path);
  }
}

/** Serialize tasks to todo file contents, one line per task */
export function renderTodoFile(tasks: readonly Task[]): string {
  return tasks.map(t => `${renderTask(t)}\n`).join('');
}

export class TaskList {
  readonly path: string;
  private list: Task[];

  private constructor(path: string, list: Task[]) {
    this.path = path;
    this.list = list;
  }

  /** Read the todo file at `path`, creating an empty one if it is missing */
  static load(path: string): TaskList {
    if (!existsSync(path)) {
      writeFileSync(path, '', { flag: 'wx' });
    }
    return new TaskList(path, parseTodoFile(decodeTodoFile(path, readFileSync(path))));
  }

  get tasks(): readonly Task[] { return this.list; }
  get length(): number { return this.list.length; }

  /**
   * Rewrite the whole file: write a sibling temp file, then rename it over the
   * original. Symlinks are followed and the file mode is kept.
   */
  save(): void {
    const target = existsSync(this.path) ? realpathSync(this.path) : this.path;
    const tmpPath = join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);

    try {
      writeFileSync(tmpPath, renderTodoFile(this.list), 'utf8');
      if (existsSync(target)) chmodSync(tmpPath, statSync(target).mode & 0o7777);
      renameSync(tmpPath, target);
    } catch (err: unknown) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }

  add(note: string): Task {
    const task = createTask(note);
    this.modify(l => { l.push(task); });
    return task;
  }

  check(index: number): IndexResult {
    return this.replaceAt(index, checkTask);
  }

  undo(index: number): IndexResult {
    return this.replaceAt(index, undoTask);
  }

  remove(index: number): IndexResult {
    const i = this.toOffset(index);
    if (i == null) return this.outOfRange(index);

    const removed = this.list[i]!;
    this.modify(l => { l.splice(i, 1); });
    return { type: 'success', index, task: removed };
  }

  /** Drop every Done task, keeping the order of the rest. Returns how many were removed. */
  cleanup(): number {
    const before = this.list.length;
    this.modify(l => l.filter(t => !isDone(t)));
    return before - this.list.length;
  }

  /** Drop every task. Returns how many were removed. */
  clear(): number {
    const before = this.list.length;
    this.modify(() => []);
    return before;
  }

  /** Todo tasks only, numbered by their position in the full list */
  printUnchecked(palette: Palette = plainPalette): Iterable<string> {
    return this.printLines(palette, t => !isDone(t));
  }

  printAll(palette: Palette = plainPalette): Iterable<string> {
    return this.printLines(palette, () => true);
  }

  private printLines(palette: Palette, include: (task: Task) => boolean): Iterable<string> {
    return { [Symbol.iterator]: () => this.renderLines(palette, include) };
  }

  private *renderLines(palette: Palette, include: (task: Task) => boolean): Generator<string> {
    for (let i = 0; i < this.list.length; i++) {
      const task = this.list[i]!;
      if (!include(task)) continue;
      yield ` ${palette.dim(`${i + 1}.`)} ${formatTask(task, palette)}`;
    }
  }

  private replaceAt(index: number, transition: (task: Task) => Task): IndexResult {
    const i = this.toOffset(index);
    if (i == null) return this.outOfRange(index);

    const task = transition(this.list[i]!);
    this.modify(l => { l[i] = task; });
    return { type: 'success', index, task };
  }

  /** Apply an in-place edit (or return a replacement list), then persist */
  private modify(action: (list: Task[]) => Task[] | void): void {
    const next = action(this.list);
    if (next) this.list = next;
    this.save();
  }

  /** 1-based index to array offset, or null when it does not address a task */
  private toOffset(index: number): number | null {
    if (!Number.isInteger(index) || index < 1 || index > this.list.length) return null;
    return index - 1;
  }

  private outOfRange(index: number): IndexResult {
    return { type: 'out-of-range', index, length: this.list.length };
  }
}
