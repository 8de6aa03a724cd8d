import { Command } from 'commander';
import type { CliContext } from '../helpers.js';
import { openTaskList, printUnchecked, $try } from '../helpers.js';

export function createCleanupCommand(ctx: CliContext): Command {
  return new Command('cleanup')
    .description('Clear checked tasks')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const list = openTaskList(ctx, cmd);
      list.cleanup();
      printUnchecked(list, ctx.palette);
    }));
}

export function createClearCommand(ctx: CliContext): Command {
  return new Command('clear')
    .description('Clear all tasks')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const list = openTaskList(ctx, cmd);
      list.clear();
      printUnchecked(list, ctx.palette);
    }));
}
