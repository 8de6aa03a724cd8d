import { Command } from 'commander';
import type { TaskList, IndexResult } from '@todo/core';
import type { CliContext } from '../helpers.js';
import { openTaskList, printUnchecked, parseIndexArg, $try } from '../helpers.js';

type IndexAction = (list: TaskList, index: number) => IndexResult;

function createIndexCommand(ctx: CliContext, name: string, description: string, apply: IndexAction): Command {
  return new Command(name)
    .description(description)
    .argument('<index>', 'Position of the task in the full list', parseIndexArg)
    .action((index: number, _opts: unknown, cmd: Command) => $try(() => {
      const list = openTaskList(ctx, cmd);
      // An out-of-range index leaves the list untouched; the listing below is all the user sees
      apply(list, index);
      printUnchecked(list, ctx.palette);
    }));
}

export function createCheckCommand(ctx: CliContext): Command {
  return createIndexCommand(ctx, 'check', 'Check a task by index', (list, i) => list.check(i));
}

export function createUndoCommand(ctx: CliContext): Command {
  return createIndexCommand(ctx, 'undo', 'Undo a task by index', (list, i) => list.undo(i));
}

export function createRemoveCommand(ctx: CliContext): Command {
  return createIndexCommand(ctx, 'remove', 'Remove a task by index', (list, i) => list.remove(i));
}
