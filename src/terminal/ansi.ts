/**
 * ANSI escape sequences used by the terminal driver.
 *
 * Key sequences:
 * - CSI n;m H    (CUP) - Cursor position to row n, column m
 * - CSI 2J       (ED2) - Erase entire screen
 * - CSI ?25l/h         - Hide/show cursor
 * - CSI ?1049h/l       - Enter/leave the alternate screen buffer
 */

export const ANSI = {
  ESC: '\x1b',
  CSI: '\x1b[',

  // Cursor positioning
  cursorTo: (row: number, col: number = 1): string => `\x1b[${row};${col}H`,
  HIDE_CURSOR: '\x1b[?25l',
  SHOW_CURSOR: '\x1b[?25h',

  // Erase operations
  CLEAR_SCREEN: '\x1b[2J',
  CLEAR_LINE: '\x1b[2K',

  // Alternate screen buffer (like vim/less use)
  ENTER_ALT_SCREEN: '\x1b[?1049h',
  EXIT_ALT_SCREEN: '\x1b[?1049l',

  RESET: '\x1b[0m',
} as const;

/** Ctrl+C as delivered in raw mode */
export const CTRL_C = '\x03';

const DELETE = '\x7f';

/**
 * True for a single printable character.
 */
export function isPrintable(value: string): boolean {
  return value.length === 1 && value >= ' ' && value !== DELETE;
}
