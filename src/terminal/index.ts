/**
 * Terminal
 *
 * The TerminalDriver interface the navigation renders through, plus the
 * Node.js implementation and keypress decoding.
 */

export { KeyKind, type KeyEvent, type TerminalDriver, type TerminalSize } from './types.js';
export { ANSI, CTRL_C, isPrintable } from './ansi.js';
export { decodeKeypress, Keys } from './keys.js';
export {
  NodeTerminal,
  type NodeTerminalOptions,
  type TerminalInput,
  type TerminalOutput,
} from './node-terminal.js';
