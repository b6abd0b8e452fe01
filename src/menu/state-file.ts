/**
 * Selection State Files
 *
 * Saves and restores item selection in INI form:
 *
 * ```ini
 * [Privacy]
 * Location = true
 * Camera = false
 * ```
 *
 * Sections and items are matched by name on restore; entries that match
 * nothing are ignored. Names that would not survive a plain read (edge
 * whitespace, a leading comment or quote character, line breaks) are written
 * as JSON strings: `"#1 priority" = true`.
 */

import * as fs from 'node:fs';
import { FileNotFoundError, ValidationError } from '../errors/index.js';
import type { Section } from '../model/section.js';

/** Section name -> item name -> selected */
export type SelectionState = Map<string, Map<string, boolean>>;

const SECTION_HEADER = /^\[(.*)\]$/;
const NEEDS_QUOTES = /^[\s;#"\[]|\s$|[\r\n]/;

function encodeName(name: string): string {
  return NEEDS_QUOTES.test(name) ? JSON.stringify(name) : name;
}

/**
 * Undo encodeName(). Returns null for a quoted name that is not a valid
 * JSON string.
 */
function decodeName(raw: string): string | null {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'string' ? parsed : null;
  } catch {
    return null;
  }
}

export function formatStateIni<TItem, TSection>(sections: ReadonlyArray<Section<TItem, TSection>>): string {
  let output = '';
  for (const section of sections) {
    output += `[${encodeName(section.name)}]\n`;
    for (const item of section.getItems()) {
      output += `${encodeName(item.name)} = ${item.selected ? 'true' : 'false'}\n`;
    }
  }
  return output;
}

/**
 * Parse INI text. Blank lines and `;` / `#` comments are skipped.
 *
 * @throws ValidationError listing every malformed line
 */
export function parseStateIni(content: string): SelectionState {
  const state: SelectionState = new Map();
  const issues: string[] = [];
  let current: Map<string, boolean> | null = null;

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;

    if (line === '' || line.startsWith(';') || line.startsWith('#')) {
      return;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      const name = decodeName(header[1] ?? '');
      if (name === null) {
        issues.push(`line ${lineNumber}: malformed quoted section name`);
        current = null;
        return;
      }
      current = state.get(name) ?? new Map<string, boolean>();
      state.set(name, current);
      return;
    }

    const separator = line.lastIndexOf('=');
    if (separator === -1) {
      issues.push(`line ${lineNumber}: expected "name = true|false"`);
      return;
    }
    if (!current) {
      issues.push(`line ${lineNumber}: entry outside of a [section]`);
      return;
    }

    const name = decodeName(line.slice(0, separator).trim());
    if (name === null) {
      issues.push(`line ${lineNumber}: malformed quoted item name`);
      return;
    }
    const value = line.slice(separator + 1).trim().toLowerCase();
    if (value !== 'true' && value !== 'false') {
      issues.push(`line ${lineNumber}: value must be true or false, got "${value}"`);
      return;
    }

    current.set(name, value === 'true');
  });

  if (issues.length > 0) {
    throw new ValidationError('Invalid state file', issues);
  }
  return state;
}

/**
 * Apply saved selections to matching sections and items.
 *
 * @returns Number of items whose state changed
 */
export function applyState<TItem, TSection>(
  sections: ReadonlyArray<Section<TItem, TSection>>,
  state: SelectionState
): number {
  let changed = 0;
  for (const section of sections) {
    const entries = state.get(section.name);
    if (!entries) continue;

    section.getItems().forEach((item, index) => {
      const selected = entries.get(item.name);
      if (selected !== undefined && section.setItemSelected(index, selected)) {
        changed++;
      }
    });
  }
  return changed;
}

export function saveState<TItem, TSection>(
  filePath: string,
  sections: ReadonlyArray<Section<TItem, TSection>>
): void {
  fs.writeFileSync(filePath, formatStateIni(sections), 'utf-8');
}

export function loadState(filePath: string): SelectionState {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }
  return parseStateIni(fs.readFileSync(filePath, 'utf-8'));
}
