/**
 * Node.js Terminal Driver
 *
 * Implements TerminalDriver over process.stdin / process.stdout:
 * - Raw mode via setRawMode, keypresses via readline.emitKeypressEvents
 * - Alternate screen buffer and hidden cursor while active
 * - Keys are queued so readKey() never misses input between calls
 * - Terminal resizes arrive as synthetic RESIZE keys
 *
 * Output is collected between flush() calls and written in one chunk.
 */

import * as readline from 'node:readline';
import { TerminalError } from '../errors/index.js';
import { ANSI } from './ansi.js';
import { decodeKeypress } from './keys.js';
import { KeyKind, type KeyEvent, type TerminalDriver, type TerminalSize } from './types.js';

/** Input side: process.stdin or anything shaped like it. */
export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Output side: process.stdout or anything shaped like it. */
export type TerminalOutput = NodeJS.WritableStream & {
  rows?: number;
  columns?: number;
};

export interface NodeTerminalOptions {
  /** Input stream (default: process.stdin) */
  stdin?: TerminalInput;
  /** Output stream (default: process.stdout) */
  stdout?: TerminalOutput;
  /** Use alternate screen buffer (default: true) */
  useAlternateScreen?: boolean;
}

export class NodeTerminal implements TerminalDriver {
  private stdin: TerminalInput;
  private stdout: TerminalOutput;
  private useAlternateScreen: boolean;

  private active: boolean = false;
  private ended: boolean = false;
  private queue: KeyEvent[] = [];
  private pending: ((key: KeyEvent | null) => void) | null = null;
  private output: string[] = [];

  private readonly keypressHandler = (str: string | undefined, key: readline.Key | undefined): void => {
    const event = decodeKeypress(str, key);
    if (event) {
      this.deliver(event);
    }
  };

  private readonly endHandler = (): void => {
    this.ended = true;
    this.deliver(null);
  };

  private readonly resizeHandler = (): void => {
    this.deliver({ kind: KeyKind.RESIZE, character: '' });
  };

  constructor(options: NodeTerminalOptions = {}) {
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
    this.useAlternateScreen = options.useAlternateScreen ?? true;
  }

  setup(): void {
    if (this.active) {
      return;
    }

    if (!this.stdin.isTTY || !this.stdin.setRawMode) {
      throw new TerminalError('Interactive mode needs a TTY on stdin');
    }

    readline.emitKeypressEvents(this.stdin);
    this.stdin.setRawMode(true);
    this.stdin.resume();
    this.stdin.on('keypress', this.keypressHandler);
    this.stdin.on('end', this.endHandler);
    this.stdout.on('resize', this.resizeHandler);

    this.active = true;
    this.ended = false;

    if (this.useAlternateScreen) {
      this.write(ANSI.ENTER_ALT_SCREEN);
    }
    this.write(ANSI.HIDE_CURSOR);
    this.flush();
  }

  restore(): void {
    if (!this.active) {
      return;
    }

    this.stdin.off('keypress', this.keypressHandler);
    this.stdin.off('end', this.endHandler);
    this.stdout.off('resize', this.resizeHandler);

    this.stdin.setRawMode?.(false);
    this.stdin.pause();

    this.write(ANSI.RESET + ANSI.SHOW_CURSOR);
    if (this.useAlternateScreen) {
      this.write(ANSI.EXIT_ALT_SCREEN);
    }
    this.flush();

    this.active = false;
    this.queue = [];

    // Nobody will read further keys; release a waiting reader
    this.deliver(null);
  }

  getSize(): TerminalSize {
    return {
      rows: this.stdout.rows || 24, // || catches both undefined and 0
      cols: this.stdout.columns || 80,
    };
  }

  clearScreen(): void {
    this.write(ANSI.CLEAR_SCREEN + ANSI.cursorTo(1, 1));
  }

  moveCursor(row: number, col: number): void {
    this.write(ANSI.cursorTo(row, col));
  }

  write(text: string): void {
    this.output.push(text);
  }

  flush(): void {
    if (this.output.length === 0) {
      return;
    }

    const data = this.output.join('');
    this.output = [];

    try {
      this.stdout.write(data);
    } catch (error: unknown) {
      // EPIPE is expected when stdout is piped to a closed consumer
      if (!(error instanceof Error) || !('code' in error) || error.code !== 'EPIPE') {
        throw error;
      }
    }
  }

  readKey(): Promise<KeyEvent | null> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.ended || !this.active) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  /** Whether raw mode is currently held. */
  get isActive(): boolean {
    return this.active;
  }

  private deliver(event: KeyEvent | null): void {
    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve(event);
      return;
    }
    if (event) {
      this.queue.push(event);
    }
  }
}
