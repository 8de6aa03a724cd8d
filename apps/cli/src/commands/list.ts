import { Command } from 'commander';
import type { CliContext } from '../helpers.js';
import { openTaskList, printUnchecked, $try } from '../helpers.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('ls')
    .description('List unchecked tasks')
    .option('--all', 'List all tasks')
    .action((opts: { all?: boolean }, cmd: Command) => $try(() => {
      const list = openTaskList(ctx, cmd);

      if (opts.all) {
        for (const line of list.printAll(ctx.palette)) console.log(line);
        return;
      }

      printUnchecked(list, ctx.palette);
    }));
}
