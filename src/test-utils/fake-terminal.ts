/**
 * In-process terminal driver for tests.
 *
 * Plays back a scripted list of keys and keeps a simple character grid of
 * what was painted, so tests can assert on individual screen rows.
 */

import type { KeyEvent, TerminalDriver, TerminalSize } from '../terminal/types.js';

export class FakeTerminal implements TerminalDriver {
  size: TerminalSize;
  setupCalls = 0;
  restoreCalls = 0;
  flushCount = 0;
  /** Every string passed to write(), in order */
  writes: string[] = [];

  private keys: KeyEvent[];
  private grid = new Map<number, string[]>();
  private cursor = { row: 1, col: 1 };

  constructor(keys: KeyEvent[] = [], size: TerminalSize = { rows: 24, cols: 80 }) {
    this.keys = [...keys];
    this.size = size;
  }

  /** Queue more keys for readKey(). */
  push(...keys: KeyEvent[]): void {
    this.keys.push(...keys);
  }

  setup(): void {
    this.setupCalls++;
  }

  restore(): void {
    this.restoreCalls++;
  }

  getSize(): TerminalSize {
    return { ...this.size };
  }

  clearScreen(): void {
    this.grid.clear();
    this.cursor = { row: 1, col: 1 };
  }

  moveCursor(row: number, col: number): void {
    this.cursor = { row, col };
  }

  write(text: string): void {
    this.writes.push(text);
    const cells = this.grid.get(this.cursor.row) ?? [];
    let col = this.cursor.col;
    for (const char of text) {
      while (cells.length < col - 1) cells.push(' ');
      cells[col - 1] = char;
      col++;
    }
    this.grid.set(this.cursor.row, cells);
    this.cursor = { row: this.cursor.row, col };
  }

  flush(): void {
    this.flushCount++;
  }

  readKey(): Promise<KeyEvent | null> {
    return Promise.resolve(this.keys.shift() ?? null);
  }

  /** Text painted on `row`, trailing spaces removed. */
  row(row: number): string {
    return (this.grid.get(row) ?? []).join('').trimEnd();
  }

  /** All painted rows as `row -> text`, ascending. */
  rows(): Array<[number, string]> {
    return [...this.grid.keys()]
      .sort((a, b) => a - b)
      .map((row): [number, string] => [row, this.row(row)]);
  }
}
