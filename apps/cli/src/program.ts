import { Command } from 'commander';
import type { CliContext } from './helpers.js';
import { addAction } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand, createUndoCommand, createRemoveCommand } from './commands/check.js';
import { createCleanupCommand, createClearCommand } from './commands/delete.js';

export const VERSION = '0.2.0';

/** Build the CLI program. A fresh program is needed for every parse. */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('todo')
    .description('CLI Todo-List Tool')
    .version(VERSION)
    .option('-f, --file <path>', 'Todo file to use (default: $TODO_FILE or ~/todo.txt)')
    .argument('[task...]', 'Add a new task')
    .action(addAction(ctx));

  // Register commands
  program.addCommand(createListCommand(ctx));
  program.addCommand(createRemoveCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createUndoCommand(ctx));
  program.addCommand(createCleanupCommand(ctx));
  program.addCommand(createClearCommand(ctx));

  return program;
}
