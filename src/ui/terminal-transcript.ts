import stripAnsi from 'strip-ansi';

const DEFAULT_MAX_LINES = 500;
const MAX_HELD_ESCAPE = 4096;
const CSI_COMPLETE = /^\u001b\[[0-?]*[ -/]*[@-~]/u;
const OSC_TERMINATOR = /\u0007|\u001b\\/u;

/**
 * Keeps a plain-text tail of the PTY stream for display. Handles the few
 * control characters a line-oriented shell emits (CR, LF, backspace); anything
 * richer is flattened.
 */
export class TerminalTranscript {
  private readonly lines: string[] = [''];
  /** Start of an escape sequence cut off at the end of the last chunk. */
  private held = '';

  constructor(private readonly maxLines: number = DEFAULT_MAX_LINES) {}

  push(chunk: string): void {
    const [complete, held] = splitTrailingEscape(`${this.held}${chunk}`);
    this.held = held;
    const text = stripAnsi(complete).replace(/\r\n/gu, '\n');

    for (const char of text) {
      const last = this.lines.length - 1;
      if (char === '\n') {
        this.lines.push('');
      } else if (char === '\r') {
        this.lines[last] = '';
      } else if (char === '\b') {
        this.lines[last] = (this.lines[last] ?? '').slice(0, -1);
      } else if (char === '\t') {
        this.lines[last] = `${this.lines[last] ?? ''}  `;
      } else if (char < ' ') {
        continue;
      } else {
        this.lines[last] = `${this.lines[last] ?? ''}${char}`;
      }
    }

    if (this.lines.length > this.maxLines) {
      this.lines.splice(0, this.lines.length - this.maxLines);
    }
  }

  tail(count: number): string[] {
    if (count <= 0) {
      return [];
    }
    return this.lines.slice(-count);
  }

  clear(): void {
    this.lines.splice(0, this.lines.length, '');
    this.held = '';
  }
}

/** Splits off an unterminated escape sequence at the end of `text`. */
function splitTrailingEscape(text: string): [string, string] {
  const osc = text.lastIndexOf('\u001b]');
  if (osc !== -1 && !OSC_TERMINATOR.test(text.slice(osc + 2))) {
    return hold(text, osc);
  }

  const start = text.lastIndexOf('\u001b');
  if (start === -1) {
    return [text, ''];
  }

  const tail = text.slice(start);
  if (tail.length === 1 || (tail.charAt(1) === '[' && !CSI_COMPLETE.test(tail))) {
    return hold(text, start);
  }
  return [text, ''];
}

function hold(text: string, start: number): [string, string] {
  if (text.length - start > MAX_HELD_ESCAPE) {
    return [text, ''];
  }
  return [text.slice(0, start), text.slice(start)];
}
