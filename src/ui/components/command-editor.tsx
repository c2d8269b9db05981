import React, { useEffect, useState } from 'react';
import { Text, useInput } from 'ink';
import chalk from 'chalk';

export interface CommandEditorProps {
  value: string;
  focus?: boolean;
  placeholder?: string;
  onChange: (value: string) => void;
  onSubmit: (value: string) => void;
  onCancel?: () => void;
}

const clamp = (value: number, min: number, max: number): number => {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

// Single-line editor for rewriting a gated command before it runs.
export function CommandEditor({
  value,
  focus = true,
  placeholder = '',
  onChange,
  onSubmit,
  onCancel,
}: CommandEditorProps): React.JSX.Element {
  const [cursorOffset, setCursorOffset] = useState(value.length);

  useEffect(() => {
    setCursorOffset((current) => (current > value.length ? value.length : current));
  }, [value]);

  useInput(
    (input, key) => {
      if (key.escape) {
        onCancel?.();
        return;
      }

      if (key.return) {
        onSubmit(value);
        return;
      }

      if (key.upArrow || key.downArrow || key.tab || (key.ctrl && input === 'c')) {
        return;
      }

      if (key.leftArrow) {
        setCursorOffset(clamp(cursorOffset - 1, 0, value.length));
        return;
      }

      if (key.rightArrow) {
        setCursorOffset(clamp(cursorOffset + 1, 0, value.length));
        return;
      }

      if (key.ctrl && input === 'a') {
        setCursorOffset(0);
        return;
      }

      if (key.ctrl && input === 'e') {
        setCursorOffset(value.length);
        return;
      }

      if (key.backspace || key.delete) {
        if (cursorOffset > 0) {
          onChange(value.slice(0, cursorOffset - 1) + value.slice(cursorOffset));
          setCursorOffset(cursorOffset - 1);
        }
        return;
      }

      // Newlines become spaces; Enter is the only submit.
      const insertion = input.replace(/[\r\n]+/gu, ' ');
      if (insertion.length === 0) {
        return;
      }

      onChange(value.slice(0, cursorOffset) + insertion + value.slice(cursorOffset));
      setCursorOffset(cursorOffset + insertion.length);
    },
    { isActive: focus },
  );

  if (!focus) {
    return <Text>{value.length > 0 ? value : chalk.grey(placeholder)}</Text>;
  }

  if (value.length === 0) {
    const rendered =
      placeholder.length > 0
        ? chalk.inverse(placeholder[0]) + chalk.grey(placeholder.slice(1))
        : chalk.inverse(' ');
    return <Text>{rendered}</Text>;
  }

  let rendered = '';
  let index = 0;
  for (const char of value) {
    rendered += index === cursorOffset ? chalk.inverse(char) : char;
    index += 1;
  }
  if (cursorOffset === value.length) {
    rendered += chalk.inverse(' ');
  }

  return <Text>{rendered}</Text>;
}
