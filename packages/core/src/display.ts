/**
 * Terminal styling is injected so the core never touches the terminal itself.
 * The CLI supplies a chalk palette; tests use the plain one.
 */
export interface Palette {
  readonly done: (text: string) => string;
  readonly todo: (text: string) => string;
  readonly dim: (text: string) => string;
}

const identity = (text: string): string => text;

export const plainPalette: Palette = {
  done: identity,
  todo: identity,
  dim: identity,
};
