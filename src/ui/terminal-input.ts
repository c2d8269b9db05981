import type { Key } from 'ink';

export type KeyState = Pick<
  Key,
  | 'return'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'escape'
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
  | 'ctrl'
  | 'meta'
>;

const NAVIGATION_SEQUENCES: Array<[keyof KeyState, string]> = [
  ['upArrow', '\x1b[A'],
  ['downArrow', '\x1b[B'],
  ['rightArrow', '\x1b[C'],
  ['leftArrow', '\x1b[D'],
  ['pageUp', '\x1b[5~'],
  ['pageDown', '\x1b[6~'],
];

/**
 * Translates an Ink keypress into the bytes a terminal would send to the shell.
 * Returns `undefined` for keys with no terminal equivalent.
 */
export function toTerminalInput(input: string, key: KeyState): string | undefined {
  if (key.return) {
    return '\r';
  }

  if (key.backspace || key.delete) {
    return '\x7f';
  }

  if (key.tab) {
    return '\t';
  }

  if (key.escape) {
    return '\x1b';
  }

  for (const [name, sequence] of NAVIGATION_SEQUENCES) {
    if (key[name]) {
      return sequence;
    }
  }

  if (key.ctrl && /^[a-z]$/iu.test(input)) {
    return String.fromCharCode(input.toLowerCase().charCodeAt(0) - 96);
  }

  if (input.length === 0) {
    return undefined;
  }

  return key.meta ? `\x1b${input}` : input;
}
