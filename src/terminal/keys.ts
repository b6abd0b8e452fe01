/**
 * Keypress decoding.
 *
 * Maps Node's readline keypress events (`str`, `key`) onto KeyEvents.
 */

import type { Key } from 'node:readline';
import { CTRL_C, isPrintable } from './ansi.js';
import { KeyKind, type KeyEvent } from './types.js';

const NAMED_KEYS: Record<string, KeyEvent> = {
  up: { kind: KeyKind.ARROW_UP, character: '' },
  down: { kind: KeyKind.ARROW_DOWN, character: '' },
  left: { kind: KeyKind.ARROW_LEFT, character: '' },
  right: { kind: KeyKind.ARROW_RIGHT, character: '' },
  return: { kind: KeyKind.ENTER, character: '\r' },
  enter: { kind: KeyKind.ENTER, character: '\r' },
  space: { kind: KeyKind.SPACE, character: ' ' },
  escape: { kind: KeyKind.ESCAPE, character: '\x1b' },
};

/**
 * Decode one keypress. Returns null for keys the navigation ignores
 * (function keys, modifier combinations, backspace).
 */
export function decodeKeypress(str: string | undefined, key: Key | undefined): KeyEvent | null {
  if (key?.ctrl && key.name === 'c') {
    return { kind: KeyKind.NORMAL, character: CTRL_C };
  }

  const named = key?.name !== undefined ? NAMED_KEYS[key.name] : undefined;
  if (named) {
    return { ...named };
  }

  if (key?.ctrl || key?.meta) {
    return null;
  }

  if (str !== undefined && isPrintable(str)) {
    return { kind: KeyKind.NORMAL, character: str };
  }

  return null;
}

/**
 * Convenience constructors, mostly for tests and scripted input.
 */
export const Keys = {
  char: (character: string): KeyEvent => ({ kind: KeyKind.NORMAL, character }),
  up: (): KeyEvent => ({ kind: KeyKind.ARROW_UP, character: '' }),
  down: (): KeyEvent => ({ kind: KeyKind.ARROW_DOWN, character: '' }),
  left: (): KeyEvent => ({ kind: KeyKind.ARROW_LEFT, character: '' }),
  right: (): KeyEvent => ({ kind: KeyKind.ARROW_RIGHT, character: '' }),
  enter: (): KeyEvent => ({ kind: KeyKind.ENTER, character: '\r' }),
  space: (): KeyEvent => ({ kind: KeyKind.SPACE, character: ' ' }),
  escape: (): KeyEvent => ({ kind: KeyKind.ESCAPE, character: '\x1b' }),
  resize: (): KeyEvent => ({ kind: KeyKind.RESIZE, character: '' }),
} as const;
