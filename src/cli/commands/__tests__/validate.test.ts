/**
 * Tests for validate command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';
import { createValidateCommand, summarizeMenu } from '../validate.js';
import type { CommandContext } from '../../types.js';
import { parseMenu } from '../../../menu/index.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';

const MENU_TOML = `title = "Workstation setup"

[[sections]]
name = "Privacy"

[[sections.items]]
name = "Location"
selected = true

[[sections.items]]
name = "Camera"

[[sections]]
name = "Empty"
`;

describe('summarizeMenu', () => {
  it('counts sections, items and initial selections', () => {
    const summary = summarizeMenu(
      parseMenu({
        sections: [
          { name: 'A', items: [{ name: 'x', selected: true }, { name: 'y', selected: false }] },
          { name: 'B', items: [{ name: 'z' }] },
        ],
      })
    );

    expect(summary).toEqual({
      title: null,
      sectionCount: 2,
      itemCount: 3,
      sections: [
        { name: 'A', items: 2, selected: 1 },
        { name: 'B', items: 1, selected: 0 },
      ],
    });
  });
});

describe('createValidateCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let testDir: string;
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sectionpick-validate-'));
    previousLevel = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    chalk.level = previousLevel;
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function writeMenu(name: string, content: string): string {
    const filePath = path.join(testDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function printedSummary(): unknown {
    return JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
  }

  async function run(menuPath: string): Promise<void> {
    const program = new Command();
    program.addCommand(createValidateCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'validate', menuPath]);
  }

  it('creates command with correct name', () => {
    expect(createValidateCommand(() => mockContext).name()).toBe('validate');
  });

  it('prints a summary table for a valid menu', async () => {
    const menuPath = writeMenu('menu.toml', MENU_TOML);

    await run(menuPath);

    expect(logOutput).toEqual([
      `✓ ${menuPath} is valid`,
      '  Title: Workstation setup',
      '',
      [
        '┌─────────┬───────┬──────────┐',
        '│ Section │ Items │ Selected │',
        '├─────────┼───────┼──────────┤',
        '│ Privacy │     2 │        1 │',
        '│ Empty   │     0 │        0 │',
        '└─────────┴───────┴──────────┘',
      ].join('\n'),
      '',
      '2 sections, 2 items',
    ]);
  });

  it('uses singular counts', async () => {
    const menuPath = writeMenu('one.json', JSON.stringify({ sections: [{ name: 'S', items: [{ name: 'x' }] }] }));

    await run(menuPath);

    expect(logOutput[0]).toBe(`✓ ${menuPath} is valid`);
    expect(logOutput.at(-1)).toBe('1 section, 1 item');
  });

  it('outputs JSON with the summary', async () => {
    mockContext.options.json = true;
    const menuPath = writeMenu('menu.toml', MENU_TOML);

    await run(menuPath);

    expect(printedSummary()).toEqual({
      valid: true,
      title: 'Workstation setup',
      sectionCount: 2,
      itemCount: 2,
      sections: [
        { name: 'Privacy', items: 2, selected: 1 },
        { name: 'Empty', items: 0, selected: 0 },
      ],
    });
    expect(logOutput).toEqual([]);
  });

  it('accepts the example menu', async () => {
    const examplePath = fileURLToPath(new URL('../../../../fixtures/menus/workstation.toml', import.meta.url));
    mockContext.options.json = true;

    await run(examplePath);

    expect(printedSummary()).toMatchObject({ valid: true, sectionCount: 4, itemCount: 9 });
  });

  it('fails for an invalid menu', async () => {
    const menuPath = writeMenu('bad.json', JSON.stringify({ sections: [] }));
    await expect(run(menuPath)).rejects.toThrow(ValidationError);
  });

  it('fails for a missing menu', async () => {
    await expect(run(path.join(testDir, 'missing.toml'))).rejects.toThrow(FileNotFoundError);
  });
});
