import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { resolveTodoPath } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolveTodoPath', () => {
  it('defaults to todo.txt in the home directory', () => {
    expect(resolveTodoPath({ env: {}, home: '/home/user' })).toBe(join('/home/user', 'todo.txt'));
  });

  it('uses TODO_FILE from the environment', () => {
    expect(resolveTodoPath({ env: { TODO_FILE: '/tmp/work.txt' }, home: '/home/user' })).toBe('/tmp/work.txt');
  });

  it('explicit file takes precedence over the environment', () => {
    expect(resolveTodoPath({
      file: './local.txt',
      env: { TODO_FILE: '/tmp/work.txt' },
      home: '/home/user',
    })).toBe('./local.txt');
  });

  it('ignores an empty TODO_FILE', () => {
    expect(resolveTodoPath({ env: { TODO_FILE: '' }, home: '/home/user' })).toBe(join('/home/user', 'todo.txt'));
  });

  it('fails when the home directory is unknown', () => {
    expect(() => resolveTodoPath({ env: {}, home: '' })).toThrow(ConfigError);
  });
});
