/**
 * Text Layout
 *
 * Word-wrapping and centering of text to a column width. The layout result
 * reports how many lines were produced so that callers can anchor a
 * multi-line block upward from a fixed bottom row.
 *
 * Lengths are measured in UTF-16 code units; callers pass plain text and
 * apply colors after layout.
 */

export interface LayoutResult {
  /** Laid-out text, lines joined by `\n` (no trailing newline) */
  text: string;
  /** Number of lines in `text` */
  lineCount: number;
}

/**
 * Left-pad `text` so it sits centered in `width` columns.
 * Text at least as wide as `width` is returned unchanged.
 */
export function centerLine(text: string, width: number): string {
  if (text.length === 0 || text.length >= width) {
    return text;
  }
  const padding = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(padding) + text;
}

/**
 * Wrap and center `text` to `width` columns.
 *
 * - Explicit newlines always start a new line.
 * - A line growing past `width` is broken at its last space; the part
 *   after the space keeps accumulating.
 * - A line without any space is never broken, however long.
 *
 * With `centered` off the text is returned as-is and counts as one line.
 */
export function layoutText(text: string, width: number, centered: boolean = true): LayoutResult {
  if (!centered) {
    return { text, lineCount: 1 };
  }

  const lines: string[] = [];
  let current = '';

  for (const char of text) {
    if (char === '\n') {
      lines.push(centerLine(current, width));
      current = '';
      continue;
    }

    current += char;

    if (current.length > width) {
      const breakAt = current.lastIndexOf(' ');
      if (breakAt !== -1) {
        lines.push(centerLine(current.slice(0, breakAt), width));
        current = current.slice(breakAt + 1);
      }
    }
  }

  if (current.length > 0) {
    lines.push(centerLine(current, width));
  }

  return { text: lines.join('\n'), lineCount: lines.length };
}

/**
 * Split a layout result into its lines. An uncentered result is a single line.
 */
export function layoutLines(result: LayoutResult): string[] {
  if (result.lineCount === 0) return [];
  if (result.lineCount === 1) return [result.text];
  return result.text.split('\n');
}

/**
 * First row of a block whose last line must land on `anchorRow`.
 */
export function anchorTopRow(anchorRow: number, lineCount: number): number {
  return anchorRow - (Math.max(1, lineCount) - 1);
}
