import type { Command } from 'commander';
import type { CliContext } from '../helpers.js';
import { openTaskList, printUnchecked, $try } from '../helpers.js';

/**
 * Default action of the program: `todo buy milk` adds "buy milk".
 * Without words it only prints the listing.
 */
export function addAction(ctx: CliContext): (words: string[], _opts: unknown, cmd: Command) => void {
  return (words, _opts, cmd) => $try(() => {
    const list = openTaskList(ctx, cmd);
    if (words.length > 0) list.add(words.join(' '));
    printUnchecked(list, ctx.palette);
  });
}
