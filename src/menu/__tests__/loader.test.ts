/**
 * Tests for menu file loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { buildSections, loadMenuFile, parseMenu } from '../loader.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

const TOML_MENU = `title = "Workstation setup"

[[sections]]
name = "Privacy"
description = "Keep data private"

[[sections.items]]
name = "Location"
selected = true

[[sections.items]]
name = "Camera"
description = "Block camera access"

[[sections]]
name = "Empty"
`;

describe('parseMenu', () => {
  it('fills in defaults', () => {
    const menu = parseMenu({ sections: [{ name: 'Only' }] });

    expect(menu).toEqual({ sections: [{ name: 'Only', items: [] }] });
  });

  it('requires at least one section', () => {
    const error = catchError(() => parseMenu({ sections: [] }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.message).toBe('Invalid menu');
      expect(error.issues).toEqual(['sections: A menu needs at least one section']);
    }
  });

  it('reports every field problem with its path', () => {
    const error = catchError(() => parseMenu({ sections: [{ name: '', items: [{ name: 'ok', selected: 'yes' }] }] }, 'menu.json'));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.message).toBe('Invalid menu.json');
      expect(error.issues).toEqual([
        'sections.0.name: String must contain at least 1 character(s)',
        'sections.0.items.0.selected: Expected boolean, received string',
      ]);
    }
  });
});

describe('loadMenuFile', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sectionpick-menu-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function writeMenu(name: string, content: string): string {
    const filePath = path.join(testDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('loads a TOML menu', () => {
    const menu = loadMenuFile(writeMenu('menu.toml', TOML_MENU));

    expect(menu.title).toBe('Workstation setup');
    expect(menu.sections.map((section) => section.name)).toEqual(['Privacy', 'Empty']);
    expect(menu.sections[0]?.items).toEqual([
      { name: 'Location', selected: true },
      { name: 'Camera', description: 'Block camera access' },
    ]);
    expect(menu.sections[1]?.items).toEqual([]);
  });

  it('loads a JSON menu', () => {
    const filePath = writeMenu(
      'menu.JSON',
      JSON.stringify({ sections: [{ name: 'Fonts', items: [{ name: 'Mono', id: 7 }] }] })
    );

    const menu = loadMenuFile(filePath);

    expect(menu.sections[0]?.items[0]).toEqual({ name: 'Mono', id: 7 });
  });

  it('throws FileNotFoundError for a missing file', () => {
    const missing = path.join(testDir, 'missing.toml');
    expect(() => loadMenuFile(missing)).toThrow(FileNotFoundError);
  });

  it('rejects unsupported extensions', () => {
    expect(() => loadMenuFile(writeMenu('menu.yaml', 'sections: []'))).toThrow(
      'Unsupported menu format: .yaml'
    );
    expect(() => loadMenuFile(writeMenu('menu', '{}'))).toThrow('Unsupported menu format: (none)');
  });

  it('wraps syntax errors in a ValidationError', () => {
    const filePath = writeMenu('broken.json', '{ "sections": [');

    expect(() => loadMenuFile(filePath)).toThrow(ValidationError);
    expect(() => loadMenuFile(filePath)).toThrow(`Could not parse menu file ${filePath}`);
  });

  it('names the file in schema errors', () => {
    const filePath = writeMenu('empty.json', '{ "sections": [] }');
    expect(() => loadMenuFile(filePath)).toThrow(`Invalid menu file ${filePath}`);
  });
});

describe('buildSections', () => {
  it('creates sections with items, descriptions and initial selection', () => {
    const sections = buildSections(
      parseMenu({
        sections: [
          {
            name: 'Privacy',
            description: 'Keep data private',
            items: [{ name: 'Location', selected: true }, { name: 'Camera', id: 2 }],
          },
          { name: 'Empty' },
        ],
      })
    );

    expect(sections).toHaveLength(2);
    expect(sections[0]?.description).toBe('Keep data private');
    expect(sections[0]?.getSelectedNames()).toEqual(['Location']);
    expect(sections[0]?.getItemById(2)?.name).toBe('Camera');
    expect(sections[1]?.isEmpty()).toBe(true);
  });

  it('returns fresh instances on every call', () => {
    const menu = parseMenu({ sections: [{ name: 'S', items: [{ name: 'a' }] }] });

    const first = buildSections(menu);
    first[0]?.toggleItem(0);

    expect(buildSections(menu)[0]?.getSelectedCount()).toBe(0);
  });
});
