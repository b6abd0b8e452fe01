/**
 * Menu Loader
 *
 * Reads a menu file, validates it and turns it into Sections.
 * The format follows the extension: .json or .toml.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { FileNotFoundError, ValidationError, formatZodIssues } from '../errors/index.js';
import { SectionBuilder } from '../model/section-builder.js';
import type { Section } from '../model/section.js';
import { MenuSchema, type Menu } from './schema.js';

export const MENU_EXTENSIONS = ['.json', '.toml'] as const;

function parseMenuText(content: string, extension: string, filePath: string): unknown {
  try {
    return extension === '.json' ? JSON.parse(content) : TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ValidationError(`Could not parse menu file ${filePath}`, [message]);
  }
}

/**
 * Validate already-parsed menu data.
 */
export function parseMenu(data: unknown, source: string = 'menu'): Menu {
  const result = MenuSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Invalid ${source}`, formatZodIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Load and validate a menu file.
 *
 * @throws FileNotFoundError if the file is missing
 * @throws ValidationError for unsupported extensions, syntax errors or schema violations
 */
export function loadMenuFile(filePath: string): Menu {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const extension = path.extname(filePath).toLowerCase();
  if (extension !== '.json' && extension !== '.toml') {
    throw new ValidationError(`Unsupported menu format: ${extension || '(none)'}`, [
      `Use one of: ${MENU_EXTENSIONS.join(', ')}`,
    ]);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  return parseMenu(parseMenuText(content, extension, filePath), `menu file ${filePath}`);
}

/**
 * Fresh Section instances for every section in the menu, in file order.
 */
export function buildSections(menu: Menu): Section[] {
  return menu.sections.map((section) =>
    SectionBuilder.create(section.name)
      .description(section.description ?? '')
      .items(section.items)
      .build()
  );
}
