/**
 * Navigation Controller
 *
 * Two-state machine over a list of sections:
 * - SECTION_SELECTION: the cursor moves over sections, Enter/digits open one
 * - ITEM_SELECTION: the cursor moves over the current page of items,
 *   Space toggles, Left/Right (or digits) change page, Esc/B go back
 *
 * The controller owns its sections for one session. `run()` drives the
 * loop: render when dirty, wait for one key, apply it (callbacks included),
 * repeat until quit or end of input. The terminal is restored on every exit
 * path and the exit callback then receives the final sections.
 *
 * `currentSelectionIndex` is the cursor. In SECTION_SELECTION it is an index
 * into the section list; in ITEM_SELECTION it is the index within the
 * current page (the global item index is `pageStart + currentSelectionIndex`).
 *
 * Usage:
 * ```typescript
 * const nav = new NavigationController({ config: { layout: { itemsPerPage: 5 } } });
 * nav.addSection({ name: 'Privacy', items: ['Location', 'Camera'] });
 * nav.onExit((sections) => save(sections));
 * await nav.run();
 * ```
 */

import { Section, type SectionInit } from '../model/section.js';
import { RenderCoordinator } from '../render/render-coordinator.js';
import { NodeTerminal } from '../terminal/node-terminal.js';
import { KeyKind, type KeyEvent, type TerminalDriver } from '../terminal/types.js';
import { CTRL_C } from '../terminal/ansi.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import {
  EMPTY_BOUNDS,
  calculatePageBounds,
  calculateTotalPages,
  pageLength,
  type PageBounds,
} from './pagination.js';
import {
  DEFAULT_NAVIGATION_CONFIG,
  NavigationState,
  mergeNavigationConfig,
  type CustomCommandCallback,
  type ExitCallback,
  type ItemToggledCallback,
  type NavigationConfig,
  type NavigationConfigUpdate,
  type PageChangedCallback,
  type SectionSelectedCallback,
  type StateChangedCallback,
} from './types.js';

const QUIT_KEYS = new Set(['q', 'Q', CTRL_C]);
const QUICK_SELECT_PATTERN = /^[1-9]$/;

export interface NavigationControllerOptions {
  /** Overrides merged over DEFAULT_NAVIGATION_CONFIG */
  config?: NavigationConfigUpdate;
  /** Terminal driver (default: NodeTerminal over process stdio) */
  terminal?: TerminalDriver;
  /** Logger for warnings and debug output (default: console) */
  logger?: Logger;
}

export class NavigationController<TItem = unknown, TSection = unknown> {
  private sections: Array<Section<TItem, TSection>> = [];
  private config: NavigationConfig;
  private readonly terminal: TerminalDriver;
  private readonly renderer: RenderCoordinator;
  private readonly logger: Logger;

  private state: NavigationState = NavigationState.SECTION_SELECTION;
  private currentSectionIndex: number = 0;
  private currentSelectionIndex: number = 0;
  private currentPage: number = 0;
  private running: boolean = false;
  private needsRedraw: boolean = true;

  private sectionSelectedCallback: SectionSelectedCallback<TItem, TSection> | null = null;
  private itemToggledCallback: ItemToggledCallback | null = null;
  private pageChangedCallback: PageChangedCallback | null = null;
  private stateChangedCallback: StateChangedCallback | null = null;
  private customCommandCallback: CustomCommandCallback | null = null;
  private exitCallback: ExitCallback<TItem, TSection> | null = null;

  constructor(options: NavigationControllerOptions = {}) {
    this.config = mergeNavigationConfig(DEFAULT_NAVIGATION_CONFIG, options.config);
    this.terminal = options.terminal ?? new NodeTerminal();
    this.renderer = new RenderCoordinator(this.terminal);
    this.logger = options.logger ?? consoleLogger;
  }

  // ==========================================================================
  // Sections
  // ==========================================================================

  addSection(section: Section<TItem, TSection> | SectionInit<TItem, TSection> | string): Section<TItem, TSection> {
    const created = section instanceof Section ? section : new Section<TItem, TSection>(section);
    this.sections.push(created);
    this.validateIndices();
    this.needsRedraw = true;
    return created;
  }

  addSections(sections: Array<Section<TItem, TSection> | SectionInit<TItem, TSection> | string>): void {
    for (const section of sections) {
      this.addSection(section);
    }
  }

  getSection(index: number): Section<TItem, TSection> | undefined {
    return this.isValidSectionIndex(index) ? this.sections[index] : undefined;
  }

  getSectionByName(name: string): Section<TItem, TSection> | undefined {
    return this.sections.find((section) => section.name === name);
  }

  getSections(): ReadonlyArray<Section<TItem, TSection>> {
    return this.sections;
  }

  getSectionCount(): number {
    return this.sections.length;
  }

  /**
   * Remove the section at `index`. Removing the last remaining section
   * also returns the view to the section list.
   */
  removeSection(index: number): boolean {
    if (!this.isValidSectionIndex(index)) {
      return false;
    }

    this.sections.splice(index, 1);
    if (this.sections.length === 0) {
      this.changeState(NavigationState.SECTION_SELECTION);
    }
    this.validateIndices();
    this.needsRedraw = true;
    return true;
  }

  removeSectionByName(name: string): boolean {
    const index = this.sections.findIndex((section) => section.name === name);
    return index === -1 ? false : this.removeSection(index);
  }

  clearSections(): void {
    this.sections = [];
    this.changeState(NavigationState.SECTION_SELECTION);
    this.currentSectionIndex = 0;
    this.currentSelectionIndex = 0;
    this.currentPage = 0;
    this.needsRedraw = true;
  }

  // ==========================================================================
  // Observers
  // ==========================================================================

  onSectionSelected(callback: SectionSelectedCallback<TItem, TSection>): this {
    this.sectionSelectedCallback = callback;
    return this;
  }

  onItemToggled(callback: ItemToggledCallback): this {
    this.itemToggledCallback = callback;
    return this;
  }

  onPageChanged(callback: PageChangedCallback): this {
    this.pageChangedCallback = callback;
    return this;
  }

  onStateChanged(callback: StateChangedCallback): this {
    this.stateChangedCallback = callback;
    return this;
  }

  /**
   * Hook consulted for every non-quit key that carries a character,
   * before the default key handling.
   */
  onCustomCommand(callback: CustomCommandCallback): this {
    this.customCommandCallback = callback;
    return this;
  }

  onExit(callback: ExitCallback<TItem, TSection>): this {
    this.exitCallback = callback;
    return this;
  }

  // ==========================================================================
  // State transitions
  // ==========================================================================

  /**
   * Open the section at `index` in ITEM_SELECTION.
   */
  enterSection(index: number): boolean {
    const section = this.getSection(index);
    if (!section) {
      return false;
    }

    this.currentSectionIndex = index;
    this.currentSelectionIndex = 0;
    this.currentPage = 0;
    this.changeState(NavigationState.ITEM_SELECTION);
    this.needsRedraw = true;

    section.triggerEnter();
    this.sectionSelectedCallback?.(index, section);
    return true;
  }

  /**
   * Leave the item list; the cursor lands on the section that was open.
   */
  returnToSections(): boolean {
    if (this.state !== NavigationState.ITEM_SELECTION) {
      return false;
    }

    this.getSection(this.currentSectionIndex)?.triggerExit();

    this.changeState(NavigationState.SECTION_SELECTION);
    this.currentPage = 0;
    this.currentSelectionIndex = this.currentSectionIndex;
    this.needsRedraw = true;
    return true;
  }

  moveUp(): void {
    if (this.state === NavigationState.SECTION_SELECTION) {
      if (this.currentSelectionIndex > 0) {
        this.currentSelectionIndex--;
        this.needsRedraw = true;
      }
      return;
    }

    if (this.currentSelectionIndex > 0) {
      this.currentSelectionIndex--;
      this.needsRedraw = true;
    } else if (this.currentPage > 0) {
      this.setPage(this.currentPage - 1);
      this.currentSelectionIndex = Math.max(0, pageLength(this.getPageBounds()) - 1);
    }
  }

  moveDown(): void {
    if (this.state === NavigationState.SECTION_SELECTION) {
      if (this.currentSelectionIndex < this.sections.length - 1) {
        this.currentSelectionIndex++;
        this.needsRedraw = true;
      }
      return;
    }

    const length = pageLength(this.getPageBounds());
    if (length === 0) {
      return;
    }

    if (this.currentSelectionIndex < length - 1) {
      this.currentSelectionIndex++;
      this.needsRedraw = true;
    } else if (this.currentPage < this.getTotalPages() - 1) {
      this.setPage(this.currentPage + 1);
    }
  }

  /**
   * Enter (section list) or toggle (item list) whatever is under the cursor.
   */
  selectCurrentItem(): void {
    if (this.state === NavigationState.SECTION_SELECTION) {
      this.enterSection(this.currentSelectionIndex);
    } else {
      this.toggleCurrentItem();
    }
  }

  /**
   * Toggle the highlighted item.
   *
   * @returns True if an item was toggled
   */
  toggleCurrentItem(): boolean {
    if (this.state !== NavigationState.ITEM_SELECTION) {
      return false;
    }

    const section = this.getSection(this.currentSectionIndex);
    const globalIndex = this.getPageBounds().start + this.currentSelectionIndex;
    const item = section?.getItem(globalIndex);
    if (!section || !item) {
      return false;
    }

    const before = item.selected;
    section.toggleItem(globalIndex);
    this.needsRedraw = true;

    if (item.selected !== before) {
      this.itemToggledCallback?.(this.currentSectionIndex, globalIndex, item.selected);
    }
    return true;
  }

  selectAllInSection(): void {
    if (this.state !== NavigationState.ITEM_SELECTION) {
      return;
    }
    this.getSection(this.currentSectionIndex)?.selectAll();
    this.needsRedraw = true;
  }

  clearSectionInView(): void {
    if (this.state !== NavigationState.ITEM_SELECTION) {
      return;
    }
    this.getSection(this.currentSectionIndex)?.clearSelections();
    this.needsRedraw = true;
  }

  clearSectionSelections(index: number): boolean {
    const section = this.getSection(index);
    if (!section) {
      return false;
    }
    section.clearSelections();
    this.needsRedraw = true;
    return true;
  }

  clearAllSelections(): void {
    for (const section of this.sections) {
      section.clearSelections();
    }
    this.needsRedraw = true;
  }

  // ==========================================================================
  // Pagination
  // ==========================================================================

  /**
   * Pages of the open section; always 1 in the section list.
   */
  getTotalPages(): number {
    if (this.state !== NavigationState.ITEM_SELECTION) {
      return 1;
    }
    const section = this.getSection(this.currentSectionIndex);
    return calculateTotalPages(section?.size ?? 0, this.config.layout.itemsPerPage);
  }

  /**
   * Global item range of the current page; empty outside ITEM_SELECTION.
   */
  getPageBounds(): PageBounds {
    const section = this.getSection(this.currentSectionIndex);
    if (this.state !== NavigationState.ITEM_SELECTION || !section) {
      return { ...EMPTY_BOUNDS };
    }
    return calculatePageBounds(this.currentPage, this.config.layout.itemsPerPage, section.size);
  }

  goToPage(page: number): boolean {
    if (page < 0 || page >= this.getTotalPages() || page === this.currentPage) {
      return false;
    }
    this.setPage(page);
    return true;
  }

  nextPage(): boolean {
    return this.goToPage(this.currentPage + 1);
  }

  previousPage(): boolean {
    return this.goToPage(this.currentPage - 1);
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  /**
   * Apply one decoded key event.
   */
  handleInput(key: KeyEvent): void {
    if (key.kind === KeyKind.RESIZE) {
      this.needsRedraw = true;
      return;
    }

    if (key.kind === KeyKind.NORMAL && QUIT_KEYS.has(key.character)) {
      this.exit();
      return;
    }

    if (key.character && this.customCommandCallback) {
      const handled = this.customCommandCallback(key.character, this.state);
      // the hook may have added or removed items
      this.validateIndices();
      if (handled) {
        this.needsRedraw = true;
        return;
      }
    }

    switch (key.kind) {
      case KeyKind.ESCAPE:
        this.returnToSections();
        break;
      case KeyKind.ARROW_UP:
        this.moveUp();
        break;
      case KeyKind.ARROW_DOWN:
        this.moveDown();
        break;
      case KeyKind.ARROW_LEFT:
        this.previousPage();
        break;
      case KeyKind.ARROW_RIGHT:
        this.nextPage();
        break;
      case KeyKind.SPACE:
        this.toggleCurrentItem();
        break;
      case KeyKind.ENTER:
        if (this.state === NavigationState.SECTION_SELECTION) {
          this.selectCurrentItem();
        } else {
          this.returnToSections();
        }
        break;
      case KeyKind.NORMAL:
        this.handleCharacter(key.character);
        break;
    }
  }

  private handleCharacter(character: string): void {
    if (this.config.keys.quickSelect && QUICK_SELECT_PATTERN.test(character)) {
      const target = Number(character) - 1;
      if (this.state === NavigationState.SECTION_SELECTION) {
        this.enterSection(target);
      } else {
        this.goToPage(target);
      }
      return;
    }

    if (this.config.keys.vimKeys) {
      switch (character) {
        case 'j':
          this.moveDown();
          return;
        case 'k':
          this.moveUp();
          return;
        case 'h':
          this.returnToSections();
          return;
      }
    }

    if (this.state !== NavigationState.ITEM_SELECTION) {
      return;
    }

    switch (character.toLowerCase()) {
      case 'a':
        this.selectAllInSection();
        break;
      case 'n':
        this.clearSectionInView();
        break;
      case 'b':
        this.returnToSections();
        break;
    }
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  /**
   * Run the interactive loop until quit or end of input.
   *
   * Refused (with a warning) when there are no sections or when a loop is
   * already running. Errors from terminal setup propagate.
   */
  async run(): Promise<void> {
    if (this.running) {
      this.logger.warn('Navigation is already running');
      return;
    }
    if (this.sections.length === 0) {
      this.logger.warn('No sections to display');
      return;
    }

    this.terminal.setup();
    this.running = true;
    this.needsRedraw = true;
    this.validateIndices();

    try {
      while (this.running) {
        if (this.needsRedraw) {
          this.render();
        }

        const key = await this.terminal.readKey();
        if (key === null) {
          this.logger.debug?.('Input closed, leaving navigation');
          break;
        }
        this.handleInput(key);
      }
    } finally {
      this.running = false;
      this.terminal.restore();
    }

    this.exitCallback?.(this.sections);
  }

  /**
   * Paint the current frame.
   */
  render(): void {
    this.validateIndices();
    this.renderer.render({
      state: this.state,
      sections: this.sections,
      sectionIndex: this.currentSectionIndex,
      selectionIndex: this.currentSelectionIndex,
      page: this.currentPage,
      totalPages: this.getTotalPages(),
      bounds: this.getPageBounds(),
      config: this.config,
    });
    this.needsRedraw = false;
  }

  /**
   * Stop the loop after the current key.
   */
  exit(): void {
    this.running = false;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Selected item names by section name; sections with nothing selected
   * are left out.
   */
  getAllSelections(): Map<string, string[]> {
    const selections = new Map<string, string[]>();
    for (const section of this.sections) {
      const names = section.getSelectedNames();
      if (names.length > 0) {
        selections.set(section.name, names);
      }
    }
    return selections;
  }

  getSectionSelections(index: number): string[] {
    return this.getSection(index)?.getSelectedNames() ?? [];
  }

  getState(): NavigationState {
    return this.state;
  }

  getCurrentSectionIndex(): number {
    return this.currentSectionIndex;
  }

  getCurrentSelectionIndex(): number {
    return this.currentSelectionIndex;
  }

  getCurrentPage(): number {
    return this.currentPage;
  }

  isRunning(): boolean {
    return this.running;
  }

  isDirty(): boolean {
    return this.needsRedraw;
  }

  getConfig(): Readonly<NavigationConfig> {
    return this.config;
  }

  updateConfig(update: NavigationConfigUpdate): void {
    this.config = mergeNavigationConfig(this.config, update);
    this.validateIndices();
    this.needsRedraw = true;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private changeState(next: NavigationState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.needsRedraw = true;
    this.logger.debug?.(`Navigation state: ${previous} -> ${next}`);
    this.stateChangedCallback?.(previous, next);
  }

  private setPage(page: number): void {
    this.currentPage = page;
    this.currentSelectionIndex = 0;
    this.needsRedraw = true;

    const totalPages = this.getTotalPages();
    this.logger.debug?.(`Page ${page + 1} of ${totalPages}`);
    this.pageChangedCallback?.(page, totalPages);
  }

  /**
   * Clamp section index, page and cursor after sections, items or the page
   * size changed.
   */
  private validateIndices(): void {
    if (this.sections.length === 0) {
      this.currentSectionIndex = 0;
      this.currentSelectionIndex = 0;
      this.currentPage = 0;
      return;
    }

    this.currentSectionIndex = clamp(this.currentSectionIndex, 0, this.sections.length - 1);

    if (this.state === NavigationState.SECTION_SELECTION) {
      this.currentSelectionIndex = clamp(this.currentSelectionIndex, 0, this.sections.length - 1);
      return;
    }

    this.currentPage = clamp(this.currentPage, 0, this.getTotalPages() - 1);
    const length = pageLength(this.getPageBounds());
    this.currentSelectionIndex = length === 0 ? 0 : clamp(this.currentSelectionIndex, 0, length - 1);
  }

  private isValidSectionIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.sections.length;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
