/**
 * Run Command
 *
 * Opens a menu file in the interactive selector:
 *   sectionpick run menu.toml
 *   sectionpick run menu.json --restore state.ini --save state.ini
 *   sectionpick run menu.json --theme fancy --layout compact --page-size 5
 *
 * On exit the selected items are printed (text, or JSON with --json).
 * With --save the state is also written on exit, and `s` saves mid-session.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { RunOptionsSchema, validateInput, type RunOptions } from '../validation.js';
import { loadConfig, resolveNavigationConfig } from '../../config/index.js';
import { applyState, buildSections, loadMenuFile, loadState, saveState } from '../../menu/index.js';
import { NavigationBuilder } from '../../navigation/builder.js';
import type { NavigationController } from '../../navigation/controller.js';
import type { TerminalDriver } from '../../terminal/types.js';
import { createDeferredLogger, type Logger } from '../../utils/logger.js';

const SAVE_KEY = 's';

/**
 * Injection points for tests.
 */
export interface RunCommandDependencies {
  /** Terminal driver (default: NodeTerminal on process stdio) */
  createTerminal?: () => TerminalDriver;
}

/**
 * Configure the controller for a menu file and the command options.
 * The controller logs to `logger`, which defaults to the command context.
 */
export function createMenuNavigator(
  menuPath: string,
  options: RunOptions,
  ctx: CommandContext,
  terminal?: TerminalDriver,
  logger: Logger = ctx
): NavigationController {
  const menu = loadMenuFile(menuPath);
  const sections = buildSections(menu);
  ctx.debug(`Loaded ${sections.length} sections from ${menuPath}`);

  if (options.restore) {
    const changed = applyState(sections, loadState(options.restore));
    ctx.debug(`Restored ${changed} selections from ${options.restore}`);
  }

  const config = resolveNavigationConfig(loadConfig());
  let builder = NavigationBuilder.create().config(config).logger(logger).sections(sections);

  if (menu.title) {
    builder = builder.text({ sectionTitle: menu.title });
  }
  if (options.theme) {
    builder = builder.themePreset(options.theme);
  }
  if (options.layout) {
    builder = builder.layoutPreset(options.layout);
  }
  // An explicit page size wins over the layout preset's
  if (options.pageSize !== undefined) {
    builder = builder.itemsPerPage(options.pageSize);
  }
  if (terminal) {
    builder = builder.terminal(terminal);
  }

  const savePath = options.save;
  if (savePath) {
    builder = builder.customShortcut(SAVE_KEY, 'Save').onCustomCommand((character) => {
      if (character.toLowerCase() !== SAVE_KEY) {
        return false;
      }
      saveState(savePath, sections);
      return true;
    });
  }

  return builder.build();
}

/**
 * Selected item names by section, as printed on exit.
 */
export function formatSelections(selections: Map<string, string[]>): string[] {
  if (selections.size === 0) {
    return [chalk.dim('No items selected')];
  }

  const lines: string[] = [];
  for (const [section, names] of selections) {
    lines.push(chalk.bold(section));
    for (const name of names) {
      lines.push(`  ${chalk.green('✓')} ${name}`);
    }
  }
  return lines;
}

export function createRunCommand(
  getContext: () => CommandContext,
  dependencies: RunCommandDependencies = {}
): Command {
  return new Command('run')
    .description('Open a menu file in the interactive selector')
    .argument('<menu>', 'Menu file (.json or .toml)')
    .option('--save <file>', 'Write selections to an INI file on exit (press S to save mid-session)')
    .option('--restore <file>', 'Preselect items from a previously saved INI file')
    .option('--page-size <n>', 'Items per page (1-100)')
    .option('--theme <preset>', 'Theme preset (default, minimal, fancy, retro, modern)')
    .option('--layout <preset>', 'Layout preset (compact, comfortable, fullscreen, centered)')
    .action(async (menuPath: string, rawOptions: Record<string, unknown>) => {
      const ctx = getContext();
      const options = validateInput(RunOptionsSchema, rawOptions);

      // Controller log lines wait until the screen is restored
      const sessionLog = createDeferredLogger(ctx);
      const navigator = createMenuNavigator(
        menuPath,
        options,
        ctx,
        dependencies.createTerminal?.(),
        sessionLog
      );

      try {
        await navigator.run();
      } finally {
        sessionLog.flush();
      }

      if (options.save) {
        saveState(options.save, navigator.getSections());
        ctx.debug(`Saved selections to ${options.save}`);
      }

      const selections = navigator.getAllSelections();

      if (ctx.options.json) {
        console.log(JSON.stringify({ selections: Object.fromEntries(selections) }, null, 2));
        return;
      }

      for (const line of formatSelections(selections)) {
        ctx.log(line);
      }
      if (options.save) {
        ctx.log(chalk.dim(`Saved to ${options.save}`));
      }
    });
}
