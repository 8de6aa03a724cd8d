/**
 * CLI helpers: todo file resolution, argument parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import type { Palette } from '@todo/core';
import { TaskList, resolveTodoPath } from '@todo/core';
import * as out from './output.js';

/** What the commands need from the outside world */
export interface CliContext {
  env: Readonly<Record<string, string | undefined>>;
  /** Home directory override; `os.homedir()` when absent */
  home?: string;
  palette: Palette;
}

/** Load the todo file named by `--file`, TODO_FILE or the home directory */
export function openTaskList(ctx: CliContext, cmd: Command): TaskList {
  const g = cmd.optsWithGlobals<{ file?: string }>();
  const path = resolveTodoPath({
    file: g.file,
    env: ctx.env,
    ...(ctx.home != null ? { home: ctx.home } : {}),
  });
  return TaskList.load(path);
}

/** Print the unchecked listing, the final step of every command */
export function printUnchecked(list: TaskList, palette: Palette): void {
  for (const line of list.printUnchecked(palette)) console.log(line);
}

/**
 * Parse a task index argument. Range is not checked here: an index past the
 * end of the list is a no-op for the task list, not a usage error.
 */
export function parseIndexArg(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Index must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

/**
 * Run a command action, reporting any error and setting a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
