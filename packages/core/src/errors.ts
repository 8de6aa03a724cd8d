/**
 * Named failure conditions. File system errors are not wrapped and reach
 * callers as the original Node error.
 */

/** A line of the todo file does not match `- [x] note` / `- [ ] note` */
export class TaskParseError extends Error {
  constructor(
    public readonly content: string,
    public readonly line: number | null = null,
  ) {
    super(line == null
      ? `Invalid task line: '${content}'`
      : `Failed to parse line ${line}: '${content}'`);
    this.name = 'TaskParseError';
  }

  /** Same error, tagged with the 1-based line number it was read from */
  atLine(line: number): TaskParseError {
    return new TaskParseError(this.content, line);
  }
}

/** The todo file is not valid UTF-8 */
export class FileEncodingError extends Error {
  constructor(public readonly path: string) {
    super(`Todo file is not valid UTF-8: ${path}`);
    this.name = 'FileEncodingError';
  }
}

/** A note would span more than one line of the todo file */
export class InvalidNoteError extends Error {
  constructor(public readonly note: string) {
    super('Task note must be a single line');
    this.name = 'InvalidNoteError';
  }
}

/** The todo file location cannot be determined */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
