/**
 * Validate Command
 *
 * Checks a menu file without opening the selector:
 *   sectionpick validate menu.toml
 *   sectionpick validate menu.json --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadMenuFile, type Menu } from '../../menu/index.js';
import { formatTable, type Column } from '../../utils/table.js';

export interface MenuSummary {
  title: string | null;
  sectionCount: number;
  itemCount: number;
  sections: Array<{ name: string; items: number; selected: number }>;
}

export function summarizeMenu(menu: Menu): MenuSummary {
  const sections = menu.sections.map((section) => ({
    name: section.name,
    items: section.items.length,
    selected: section.items.filter((item) => item.selected === true).length,
  }));

  return {
    title: menu.title ?? null,
    sectionCount: sections.length,
    itemCount: sections.reduce((total, section) => total + section.items, 0),
    sections,
  };
}

const COLUMNS: Column[] = [
  { header: 'Section', key: 'name' },
  { header: 'Items', key: 'items', align: 'right' },
  { header: 'Selected', key: 'selected', align: 'right' },
];

export function createValidateCommand(getContext: () => CommandContext): Command {
  return new Command('validate')
    .description('Check a menu file for errors')
    .argument('<menu>', 'Menu file (.json or .toml)')
    .action((menuPath: string) => {
      const ctx = getContext();
      const summary = summarizeMenu(loadMenuFile(menuPath));

      if (ctx.options.json) {
        console.log(JSON.stringify({ valid: true, ...summary }, null, 2));
        return;
      }

      ctx.log(`${chalk.green('✓')} ${menuPath} is valid`);
      if (summary.title) {
        ctx.log(`  Title: ${summary.title}`);
      }
      ctx.log('');
      ctx.log(formatTable(COLUMNS, summary.sections));
      ctx.log('');
      ctx.log(
        chalk.dim(
          `${summary.sectionCount} section${summary.sectionCount === 1 ? '' : 's'}, ` +
            `${summary.itemCount} item${summary.itemCount === 1 ? '' : 's'}`
        )
      );
    });
}
