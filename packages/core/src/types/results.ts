import type { Task } from './task.js';

/** Outcome of an operation addressed by a 1-based list index */
export type IndexResult =
  | { readonly type: 'success'; readonly index: number; readonly task: Task }
  | { readonly type: 'out-of-range'; readonly index: number; readonly length: number };

// Helper functions
export function isApplied(r: IndexResult): r is Extract<IndexResult, { type: 'success' }> {
  return r.type === 'success';
}

export function isOutOfRange(r: IndexResult): r is Extract<IndexResult, { type: 'out-of-range' }> {
  return r.type === 'out-of-range';
}
