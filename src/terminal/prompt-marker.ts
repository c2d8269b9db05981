import stripAnsi from 'strip-ansi';

const MARKER_TAG = 'shellgate-exit';

// ESC ] 777 ; shellgate-exit ; <status> BEL
const MARKER_PATTERN = /\x1b\]777;shellgate-exit;(-?\d+)\x07/u;

/**
 * Shell line that makes bash print an invisible exit-status marker before every
 * prompt. The existing PROMPT_COMMAND, if any, runs after ours so `$?` is still
 * the status of the user's command. The leading space keeps it out of history
 * under `HISTCONTROL=ignorespace`.
 */
export const PROMPT_MARKER_SETUP =
  ` PROMPT_COMMAND='printf "\\033]777;${MARKER_TAG};%s\\007" "$?"'"\${PROMPT_COMMAND:+;\$PROMPT_COMMAND}"\r`;

export interface PromptMarker {
  /** Offset of the marker in the scanned text. */
  index: number;
  /** Offset just past the marker. */
  end: number;
  exitCode: number;
}

export function findPromptMarker(text: string): PromptMarker | undefined {
  const match = MARKER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  return {
    index: match.index,
    end: match.index + match[0].length,
    exitCode: Number.parseInt(match[1] ?? '', 10),
  };
}

export function formatPromptMarker(exitCode: number): string {
  return `\x1b]777;${MARKER_TAG};${exitCode}\x07`;
}

/**
 * Turns raw PTY bytes captured between a write and its prompt marker into the
 * command's output: ANSI sequences removed, CRLF normalized, and the terminal's
 * echo of the input line dropped. When `echoedCommand` is omitted the first line
 * is always treated as the echo.
 */
export function cleanCommandOutput(raw: string, echoedCommand?: string): string {
  const normalized = stripAnsi(raw)
    .replace(/\r+\n/gu, '\n')
    .replace(/\r/gu, '');

  const lines = normalized.split('\n');
  const firstLine = lines[0] ?? '';

  if (echoedCommand === undefined || firstLine.includes(echoedCommand.trim())) {
    lines.shift();
  }

  return lines.join('\n').replace(/\n+$/u, '');
}
