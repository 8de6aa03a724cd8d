import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from './errors.js';

export const TODO_FILE_NAME = 'todo.txt';
export const TODO_FILE_ENV = 'TODO_FILE';

export interface TodoPathSources {
  /** Explicit path, e.g. from `--file` */
  file?: string | undefined;
  env?: Readonly<Record<string, string | undefined>>;
  /** Home directory; defaults to `os.homedir()` */
  home?: string;
}

/**
 * Resolve the todo file location.
 * Priority: explicit file > TODO_FILE env var > ~/todo.txt.
 */
export function resolveTodoPath(sources: TodoPathSources = {}): string {
  if (sources.file) return sources.file;

  const fromEnv = (sources.env ?? process.env)[TODO_FILE_ENV];
  if (fromEnv) return fromEnv;

  return join(getHomeDir(sources.home), TODO_FILE_NAME);
}

function getHomeDir(home?: string): string {
  let dir: string;
  try {
    dir = home ?? homedir();
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not determine home directory: ${reason}`);
  }
  if (!dir) throw new ConfigError('Could not determine home directory');
  return dir;
}
