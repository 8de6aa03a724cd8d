/**
 * chalk-based terminal output.
 */

import chalk from 'chalk';
import type { Palette } from '@todo/core';

export const palette: Palette = {
  done: text => chalk.green(text),
  todo: text => chalk.red(text),
  dim: text => chalk.dim(text),
};

// --- Basic output ---

export function error(message: string): void {
  console.log(chalk.red(message));
}
