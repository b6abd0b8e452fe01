/**
 * Tests for NavigationController
 *
 * Tests cover:
 * - Section management and index re-validation
 * - SECTION_SELECTION / ITEM_SELECTION transitions and callbacks
 * - Cursor movement with page rollover
 * - Toggling and selection queries
 * - Key handling (quit, custom commands, digits, letters, vim keys)
 * - The run loop against an in-process terminal
 */

import { describe, it, expect, vi } from 'vitest';
import { NavigationController } from '../controller.js';
import { NavigationState } from '../types.js';
import { Keys } from '../../terminal/keys.js';
import { TerminalError } from '../../errors/index.js';
import { FakeTerminal } from '../../test-utils/fake-terminal.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { KeyEvent } from '../../terminal/types.js';

function itemNames(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `Item ${index + 1}`);
}

/**
 * Controller with one section per entry of `itemCounts`.
 */
function createNav(
  itemCounts: number[] = [5],
  pageSize: number = 2,
  keys: KeyEvent[] = [],
  logger: Logger = silentLogger
): { nav: NavigationController; terminal: FakeTerminal } {
  const terminal = new FakeTerminal(keys);
  const nav = new NavigationController({
    config: { layout: { itemsPerPage: pageSize } },
    terminal,
    logger,
  });
  itemCounts.forEach((count, index) => {
    nav.addSection({ name: `Section ${index + 1}`, items: itemNames(count) });
  });
  return { nav, terminal };
}

describe('NavigationController', () => {
  describe('initial state', () => {
    it('starts in the section list with one page and empty bounds', () => {
      const { nav } = createNav();

      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
      expect(nav.getCurrentSectionIndex()).toBe(0);
      expect(nav.getCurrentSelectionIndex()).toBe(0);
      expect(nav.getTotalPages()).toBe(1);
      expect(nav.getPageBounds()).toEqual({ start: 0, end: 0 });
    });
  });

  describe('sections', () => {
    it('looks sections up by index and name', () => {
      const { nav } = createNav([1, 2]);

      expect(nav.getSectionCount()).toBe(2);
      expect(nav.getSection(1)?.name).toBe('Section 2');
      expect(nav.getSection(2)).toBeUndefined();
      expect(nav.getSectionByName('Section 1')?.size).toBe(1);
      expect(nav.getSectionByName('Missing')).toBeUndefined();
    });

    it('removes by index and by name', () => {
      const { nav } = createNav([1, 1, 1]);

      expect(nav.removeSection(7)).toBe(false);
      expect(nav.removeSectionByName('Section 2')).toBe(true);
      expect(nav.getSections().map((section) => section.name)).toEqual(['Section 1', 'Section 3']);
    });

    it('clamps the cursor when the section under it is removed', () => {
      const { nav } = createNav([1, 1, 1]);
      nav.moveDown();
      nav.moveDown();

      nav.removeSection(2);

      expect(nav.getCurrentSelectionIndex()).toBe(1);
    });

    it('recovers after removing the only, active section', () => {
      const { nav } = createNav([3]);
      nav.enterSection(0);

      nav.removeSection(0);

      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
      expect(nav.getCurrentSectionIndex()).toBe(0);
      expect(nav.getCurrentSelectionIndex()).toBe(0);

      nav.addSection({ name: 'Fresh', items: ['x', 'y'] });
      expect(nav.enterSection(0)).toBe(true);
      expect(nav.getState()).toBe(NavigationState.ITEM_SELECTION);
      expect(nav.getCurrentSectionIndex()).toBe(0);
      expect(nav.getPageBounds()).toEqual({ start: 0, end: 2 });
    });

    it('clearSections resets everything', () => {
      const { nav } = createNav([5, 5]);
      nav.enterSection(1);
      nav.nextPage();

      nav.clearSections();

      expect(nav.getSectionCount()).toBe(0);
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
      expect(nav.getCurrentSectionIndex()).toBe(0);
      expect(nav.getCurrentPage()).toBe(0);
    });
  });

  describe('state transitions', () => {
    it('enters a section and fires callbacks in order', () => {
      const calls: string[] = [];
      const terminal = new FakeTerminal();
      const nav = new NavigationController({ terminal, logger: silentLogger });
      nav.addSection({ name: 'Only', items: ['a'], onEnter: () => calls.push('enter') });
      nav
        .onStateChanged((from, to) => calls.push(`state:${from}->${to}`))
        .onSectionSelected((index, section) => calls.push(`selected:${index}:${section.name}`));

      expect(nav.enterSection(0)).toBe(true);

      expect(calls).toEqual([
        'state:section_selection->item_selection',
        'enter',
        'selected:0:Only',
      ]);
    });

    it('ignores invalid section indices', () => {
      const { nav } = createNav([1]);
      const onSectionSelected = vi.fn();
      nav.onSectionSelected(onSectionSelected);

      expect(nav.enterSection(1)).toBe(false);
      expect(nav.enterSection(-1)).toBe(false);
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
      expect(onSectionSelected).not.toHaveBeenCalled();
    });

    it('returns to the section list with the cursor on the active section', () => {
      const onExit = vi.fn();
      const { nav } = createNav([1, 1, 1]);
      nav.getSection(2)?.setExitCallback(onExit);
      nav.enterSection(2);

      expect(nav.returnToSections()).toBe(true);

      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
      expect(nav.getCurrentSelectionIndex()).toBe(2);
      expect(nav.getCurrentPage()).toBe(0);
      expect(onExit).toHaveBeenCalledTimes(1);
    });

    it('does nothing when already in the section list', () => {
      const onStateChanged = vi.fn();
      const { nav } = createNav();
      nav.onStateChanged(onStateChanged);

      expect(nav.returnToSections()).toBe(false);
      expect(onStateChanged).not.toHaveBeenCalled();
    });

    it('opens the section under the cursor, not the previously entered one', () => {
      const { nav } = createNav([1, 1, 1]);
      nav.enterSection(0);
      nav.returnToSections();
      nav.moveDown();
      nav.moveDown();

      nav.selectCurrentItem();

      expect(nav.getState()).toBe(NavigationState.ITEM_SELECTION);
      expect(nav.getCurrentSectionIndex()).toBe(2);
    });
  });

  describe('movement', () => {
    it('clamps the cursor in the section list', () => {
      const { nav } = createNav([1, 1]);

      nav.moveUp();
      expect(nav.getCurrentSelectionIndex()).toBe(0);

      nav.moveDown();
      nav.moveDown();
      expect(nav.getCurrentSelectionIndex()).toBe(1);
    });

    it('rolls to the next page past the last item of a non-final page', () => {
      const onPageChanged = vi.fn();
      const { nav } = createNav([5], 2);
      nav.onPageChanged(onPageChanged);
      nav.enterSection(0);

      nav.moveDown();
      expect(nav.getCurrentSelectionIndex()).toBe(1);
      expect(onPageChanged).not.toHaveBeenCalled();

      nav.moveDown();
      expect(nav.getCurrentPage()).toBe(1);
      expect(nav.getCurrentSelectionIndex()).toBe(0);
      expect(onPageChanged).toHaveBeenCalledTimes(1);
      expect(onPageChanged).toHaveBeenCalledWith(1, 3);
    });

    it('rolls to the last item of the previous page before the first item', () => {
      const { nav } = createNav([5], 2);
      nav.enterSection(0);
      nav.goToPage(1);

      nav.moveUp();

      expect(nav.getCurrentPage()).toBe(0);
      expect(nav.getCurrentSelectionIndex()).toBe(1);
    });

    it('stays put at the edges of the first and last page', () => {
      const { nav } = createNav([5], 2);
      nav.enterSection(0);

      nav.moveUp();
      expect(nav.getCurrentPage()).toBe(0);
      expect(nav.getCurrentSelectionIndex()).toBe(0);

      nav.goToPage(2);
      nav.moveDown();
      expect(nav.getCurrentPage()).toBe(2);
      expect(nav.getCurrentSelectionIndex()).toBe(0);
    });

    it('does not move inside an empty section', () => {
      const { nav } = createNav([0]);
      nav.enterSection(0);

      nav.moveDown();
      nav.moveUp();

      expect(nav.getCurrentSelectionIndex()).toBe(0);
      expect(nav.getTotalPages()).toBe(1);
    });
  });

  describe('pagination', () => {
    it('computes pages for the open section', () => {
      const { nav } = createNav([5], 2);
      nav.enterSection(0);

      expect(nav.getTotalPages()).toBe(3);
      expect(nav.getPageBounds()).toEqual({ start: 0, end: 2 });
      nav.goToPage(2);
      expect(nav.getPageBounds()).toEqual({ start: 4, end: 5 });
    });

    it('rejects out-of-range and same-page jumps', () => {
      const onPageChanged = vi.fn();
      const { nav } = createNav([5], 2);
      nav.onPageChanged(onPageChanged);
      nav.enterSection(0);

      expect(nav.goToPage(0)).toBe(false);
      expect(nav.goToPage(3)).toBe(false);
      expect(nav.goToPage(-1)).toBe(false);
      expect(nav.previousPage()).toBe(false);
      expect(onPageChanged).not.toHaveBeenCalled();
    });

    it('resets the cursor on a page change', () => {
      const { nav } = createNav([5], 2);
      nav.enterSection(0);
      nav.moveDown();

      expect(nav.nextPage()).toBe(true);
      expect(nav.getCurrentSelectionIndex()).toBe(0);
    });

    it('re-clamps the page after the page size changes', () => {
      const { nav } = createNav([5], 2);
      nav.enterSection(0);
      nav.goToPage(2);

      nav.updateConfig({ layout: { itemsPerPage: 10 } });

      expect(nav.getCurrentPage()).toBe(0);
      expect(nav.getTotalPages()).toBe(1);
      expect(nav.getConfig().layout.itemsPerPage).toBe(10);
    });
  });

  describe('toggling and selections', () => {
    it('returns to the original state after two toggles with two notifications', () => {
      const onItemToggled = vi.fn();
      const { nav } = createNav([5], 2);
      nav.onItemToggled(onItemToggled);
      nav.enterSection(0);
      nav.goToPage(1);
      nav.moveDown();

      nav.toggleCurrentItem();
      nav.toggleCurrentItem();

      expect(nav.getSection(0)?.getItem(3)?.selected).toBe(false);
      expect(onItemToggled.mock.calls).toEqual([
        [0, 3, true],
        [0, 3, false],
      ]);
    });

    it('does not toggle in the section list', () => {
      const { nav } = createNav();
      expect(nav.toggleCurrentItem()).toBe(false);
    });

    it('prunes sections without selections from getAllSelections', () => {
      const { nav } = createNav([2, 2]);
      nav.enterSection(1);

      nav.toggleCurrentItem();
      expect(nav.getAllSelections()).toEqual(new Map([['Section 2', ['Item 1']]]));

      nav.toggleCurrentItem();
      expect(nav.getAllSelections().size).toBe(0);
    });

    it('returns selections per section', () => {
      const { nav } = createNav([3]);
      nav.getSection(0)?.selectAll();

      expect(nav.getSectionSelections(0)).toEqual(['Item 1', 'Item 2', 'Item 3']);
      expect(nav.getSectionSelections(4)).toEqual([]);
    });

    it('clears selections per section and everywhere', () => {
      const { nav } = createNav([2, 2]);
      nav.getSection(0)?.selectAll();
      nav.getSection(1)?.selectAll();

      expect(nav.clearSectionSelections(0)).toBe(true);
      expect(nav.clearSectionSelections(5)).toBe(false);
      expect(nav.getSectionSelections(0)).toEqual([]);

      nav.clearAllSelections();
      expect(nav.getAllSelections().size).toBe(0);
    });
  });

  describe('handleInput', () => {
    it('enters the highlighted section on Enter and goes back on Enter', () => {
      const { nav } = createNav([1, 1]);

      nav.handleInput(Keys.down());
      nav.handleInput(Keys.enter());
      expect(nav.getCurrentSectionIndex()).toBe(1);
      expect(nav.getState()).toBe(NavigationState.ITEM_SELECTION);

      nav.handleInput(Keys.enter());
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
    });

    it('toggles with Space and pages with Left/Right', () => {
      const { nav } = createNav([5], 2);
      nav.handleInput(Keys.enter());

      nav.handleInput(Keys.space());
      expect(nav.getSectionSelections(0)).toEqual(['Item 1']);

      nav.handleInput(Keys.right());
      expect(nav.getCurrentPage()).toBe(1);
      nav.handleInput(Keys.left());
      expect(nav.getCurrentPage()).toBe(0);
    });

    it('goes back on Escape and b', () => {
      const { nav } = createNav([1]);

      nav.handleInput(Keys.enter());
      nav.handleInput(Keys.escape());
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);

      nav.handleInput(Keys.enter());
      nav.handleInput(Keys.char('b'));
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
    });

    it('selects all with a and clears with n in the item list', () => {
      const { nav } = createNav([3], 10);
      nav.handleInput(Keys.enter());

      nav.handleInput(Keys.char('a'));
      expect(nav.getSection(0)?.getSelectedCount()).toBe(3);

      nav.handleInput(Keys.char('N'));
      expect(nav.getSection(0)?.getSelectedCount()).toBe(0);
    });

    it('ignores letter commands in the section list', () => {
      const { nav } = createNav([3]);
      nav.handleInput(Keys.char('a'));
      expect(nav.getSection(0)?.getSelectedCount()).toBe(0);
    });

    it('maps digits to sections and pages', () => {
      const { nav } = createNav([1, 7], 2);

      nav.handleInput(Keys.char('2'));
      expect(nav.getCurrentSectionIndex()).toBe(1);

      nav.handleInput(Keys.char('4'));
      expect(nav.getCurrentPage()).toBe(3);

      nav.handleInput(Keys.char('9'));
      expect(nav.getCurrentPage()).toBe(3);
    });

    it('ignores digits for sections that do not exist', () => {
      const { nav } = createNav([1]);
      nav.handleInput(Keys.char('5'));
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
    });

    it('ignores digits when quick select is off', () => {
      const { nav } = createNav([1, 1]);
      nav.updateConfig({ keys: { quickSelect: false } });

      nav.handleInput(Keys.char('2'));

      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
    });

    it('moves with j/k only when vim keys are on', () => {
      const { nav } = createNav([1, 1]);

      nav.handleInput(Keys.char('j'));
      expect(nav.getCurrentSelectionIndex()).toBe(0);

      nav.updateConfig({ keys: { vimKeys: true } });
      nav.handleInput(Keys.char('j'));
      expect(nav.getCurrentSelectionIndex()).toBe(1);
      nav.handleInput(Keys.char('k'));
      expect(nav.getCurrentSelectionIndex()).toBe(0);

      nav.handleInput(Keys.enter());
      nav.handleInput(Keys.char('h'));
      expect(nav.getState()).toBe(NavigationState.SECTION_SELECTION);
    });

    it('lets the custom command hook consume a key', () => {
      const hook = vi.fn((character: string) => character === 'a');
      const { nav } = createNav([3]);
      nav.onCustomCommand(hook);
      nav.handleInput(Keys.enter());

      nav.handleInput(Keys.char('a'));

      expect(hook).toHaveBeenCalledWith('a', NavigationState.ITEM_SELECTION);
      expect(nav.getSection(0)?.getSelectedCount()).toBe(0);
    });

    it('falls through to defaults when the hook declines', () => {
      const hook = vi.fn(() => false);
      const { nav } = createNav([3]);
      nav.onCustomCommand(hook);
      nav.handleInput(Keys.enter());

      nav.handleInput(Keys.char('a'));

      expect(nav.getSection(0)?.getSelectedCount()).toBe(3);
    });

    it('re-clamps the page when the hook removes the last item of the final page', () => {
      const { nav } = createNav([5]);
      nav.onCustomCommand((character) => {
        if (character !== 'x') return false;
        nav.getSection(0)?.removeItem(4);
        return true;
      });

      nav.handleInput(Keys.char('1'));
      nav.handleInput(Keys.char('3'));
      expect(nav.getCurrentPage()).toBe(2);

      nav.handleInput(Keys.char('x'));

      expect(nav.getTotalPages()).toBe(2);
      expect(nav.getCurrentPage()).toBe(1);
      expect(nav.getCurrentSelectionIndex()).toBe(0);
      expect(nav.getPageBounds()).toEqual({ start: 2, end: 4 });
    });

    it('re-clamps before painting when items were removed outside input handling', () => {
      const { nav, terminal } = createNav([5]);
      nav.handleInput(Keys.enter());
      nav.goToPage(2);
      nav.getSection(0)?.clearItems();

      nav.render();

      expect(nav.getCurrentPage()).toBe(0);
      expect(nav.getPageBounds()).toEqual({ start: 0, end: 0 });
      expect(terminal.rows().some(([, text]) => text.endsWith('Page 1 of 1'))).toBe(true);
    });

    it('checks quit before the custom command hook', () => {
      const hook = vi.fn(() => true);
      const { nav } = createNav();
      nav.onCustomCommand(hook);

      nav.handleInput(Keys.char('q'));
      nav.handleInput(Keys.char('\x03'));

      expect(hook).not.toHaveBeenCalled();
    });

    it('does not consult the hook for arrow keys', () => {
      const hook = vi.fn(() => true);
      const { nav } = createNav([1, 1]);
      nav.onCustomCommand(hook);

      nav.handleInput(Keys.down());

      expect(hook).not.toHaveBeenCalled();
      expect(nav.getCurrentSelectionIndex()).toBe(1);
    });

    it('marks the view dirty on resize', () => {
      const { nav } = createNav();
      nav.render();
      expect(nav.isDirty()).toBe(false);

      nav.handleInput(Keys.resize());

      expect(nav.isDirty()).toBe(true);
    });
  });

  describe('run', () => {
    it('refuses to start without sections', async () => {
      const warn = vi.fn();
      const terminal = new FakeTerminal([Keys.char('q')]);
      const nav = new NavigationController({ terminal, logger: { warn } });
      const onExit = vi.fn();
      nav.onExit(onExit);

      await nav.run();

      expect(warn).toHaveBeenCalledWith('No sections to display');
      expect(terminal.setupCalls).toBe(0);
      expect(onExit).not.toHaveBeenCalled();
    });

    it('applies keys until quit and hands the sections to onExit', async () => {
      const { nav, terminal } = createNav([2, 2], 10, [
        Keys.down(),
        Keys.enter(),
        Keys.down(),
        Keys.space(),
        Keys.char('q'),
        Keys.char('a'),
      ]);
      const onExit = vi.fn();
      nav.onExit(onExit);

      await nav.run();

      expect(terminal.setupCalls).toBe(1);
      expect(terminal.restoreCalls).toBe(1);
      expect(nav.isRunning()).toBe(false);
      expect(onExit).toHaveBeenCalledTimes(1);
      expect(onExit).toHaveBeenCalledWith(nav.getSections());
      expect(nav.getAllSelections()).toEqual(new Map([['Section 2', ['Item 2']]]));
      // 'a' after quit is never read
      expect(nav.getSection(1)?.getSelectedCount()).toBe(1);
    });

    it('renders only when something changed', async () => {
      const { nav, terminal } = createNav([1], 10, [Keys.char('x'), Keys.char('z'), Keys.down()]);

      await nav.run();

      // First frame only: unknown letters and a clamped move change nothing
      expect(terminal.flushCount).toBe(1);
    });

    it('stops when input ends', async () => {
      const onExit = vi.fn();
      const { nav, terminal } = createNav([1]);
      nav.onExit(onExit);

      await nav.run();

      expect(terminal.restoreCalls).toBe(1);
      expect(onExit).toHaveBeenCalledTimes(1);
    });

    it('refuses a second concurrent run', async () => {
      const warn = vi.fn();
      const { nav, terminal } = createNav([1], 2, [], { warn });

      const first = nav.run();
      const second = nav.run();
      await Promise.all([first, second]);

      expect(warn).toHaveBeenCalledWith('Navigation is already running');
      expect(terminal.setupCalls).toBe(1);
    });

    it('propagates setup failures without restoring', async () => {
      class BrokenTerminal extends FakeTerminal {
        override setup(): void {
          throw new TerminalError('no tty');
        }
      }
      const terminal = new BrokenTerminal();
      const nav = new NavigationController({ terminal, logger: silentLogger });
      nav.addSection({ name: 'S', items: ['a'] });

      await expect(nav.run()).rejects.toThrow('no tty');
      expect(terminal.restoreCalls).toBe(0);
      expect(nav.isRunning()).toBe(false);
    });

    it('restores the terminal when a callback throws', async () => {
      const { nav, terminal } = createNav([1], 2, [Keys.enter()]);
      nav.onSectionSelected(() => {
        throw new Error('callback failed');
      });

      await expect(nav.run()).rejects.toThrow('callback failed');
      expect(terminal.restoreCalls).toBe(1);
      expect(nav.isRunning()).toBe(false);
    });
  });
});
