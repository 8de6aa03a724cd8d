export const TaskStatus = {
  Todo: 0,
  Done: 1,
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

