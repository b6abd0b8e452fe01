/**
 * Terminal Driver Types
 *
 * The navigation controller talks to the terminal only through the
 * TerminalDriver interface, so a fake driver can stand in for tests.
 */

/**
 * Decoded key categories.
 */
export enum KeyKind {
  /** A printable character (or Ctrl+C), carried in `character` */
  NORMAL = 'normal',
  ARROW_UP = 'arrow_up',
  ARROW_DOWN = 'arrow_down',
  ARROW_LEFT = 'arrow_left',
  ARROW_RIGHT = 'arrow_right',
  ENTER = 'enter',
  SPACE = 'space',
  ESCAPE = 'escape',
  /** Synthetic event: the terminal was resized */
  RESIZE = 'resize',
}

export interface KeyEvent {
  kind: KeyKind;
  /** Character for NORMAL keys, the raw control character or '' otherwise */
  character: string;
}

export interface TerminalSize {
  rows: number;
  cols: number;
}

/**
 * Capabilities the navigation loop needs from a terminal.
 *
 * Rows and columns are 1-indexed.
 */
export interface TerminalDriver {
  /** Enter raw mode. Throws if the terminal cannot be put in raw mode. */
  setup(): void;
  /** Leave raw mode and restore the screen. Safe to call more than once. */
  restore(): void;
  getSize(): TerminalSize;
  clearScreen(): void;
  moveCursor(row: number, col: number): void;
  write(text: string): void;
  /** Send everything written since the last flush */
  flush(): void;
  /** Wait for the next key. Resolves to null once input has ended. */
  readKey(): Promise<KeyEvent | null>;
}
