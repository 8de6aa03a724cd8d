import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command, InvalidArgumentError } from 'commander';
import { plainPalette, TaskStatus } from '@todo/core';
import type { CliContext } from '../src/helpers.js';
import { openTaskList, printUnchecked, parseIndexArg, $try } from '../src/helpers.js';

describe('parseIndexArg', () => {
  it('parses decimal integers', () => {
    expect(parseIndexArg('1')).toBe(1);
    expect(parseIndexArg('42')).toBe(42);
  });

  it('accepts 0', () => {
    expect(parseIndexArg('0')).toBe(0);
  });

  it.each(['', '-1', '1.5', 'abc', '2x', ' 3'])('rejects %j', (value) => {
    expect(() => parseIndexArg(value)).toThrow(InvalidArgumentError);
  });
});

describe('openTaskList', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'todo-cli-helpers-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads todo.txt from the home directory', () => {
    writeFileSync(join(tmpDir, 'todo.txt'), '- [x] a\n');
    const ctx: CliContext = { env: {}, home: tmpDir, palette: plainPalette };
    const list = openTaskList(ctx, new Command());
    expect(list.path).toBe(join(tmpDir, 'todo.txt'));
    expect(list.tasks).toEqual([{ status: TaskStatus.Done, note: 'a' }]);
  });

  it('prefers the --file option', () => {
    const file = join(tmpDir, 'other.txt');
    const ctx: CliContext = { env: { TODO_FILE: join(tmpDir, 'env.txt') }, home: tmpDir, palette: plainPalette };
    const cmd = new Command().option('-f, --file <path>');
    cmd.parse(['-f', file], { from: 'user' });

    const list = openTaskList(ctx, cmd);
    expect(list.path).toBe(file);
    expect(readFileSync(file, 'utf8')).toBe('');
  });
});

describe('printUnchecked', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'todo-cli-helpers-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints one line per unchecked task', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    writeFileSync(join(tmpDir, 'todo.txt'), '- [ ] a\n- [x] b\n- [ ] c\n');
    const list = openTaskList({ env: {}, home: tmpDir, palette: plainPalette }, new Command());

    printUnchecked(list, plainPalette);

    expect(log.mock.calls).toEqual([[' 1. ✖ a'], [' 3. ✖ c']]);
  });
});

describe('$try', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('catches errors, logs them and fails the process', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    $try(() => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(String(consoleSpy.mock.calls[0]![0])).toContain('test error');
    expect(process.exitCode).toBe(1);
  });
});
