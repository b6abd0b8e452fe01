/**
 * Section
 *
 * A named, ordered group of selectable items with its own lifecycle
 * callbacks. Item order is the canonical display and pagination order and
 * only changes through the explicit add/remove/clear/sort operations below.
 *
 * Every item transition caused by a section operation is reported to the
 * section-level `onItemToggled` callback with the item's index in this
 * section (not its index on the current page).
 */

import { SelectableItem, type SelectableItemInit } from './selectable-item.js';

/**
 * Called after an item in the section changes state.
 */
export type SectionItemToggledCallback = (index: number, selected: boolean) => void;

/**
 * Construction options for a Section.
 */
export interface SectionInit<TItem = unknown, TSection = unknown> {
  name: string;
  description?: string;
  items?: Array<SelectableItem<TItem> | SelectableItemInit<TItem> | string>;
  data?: TSection;
  onEnter?: () => void;
  onExit?: () => void;
  onItemToggled?: SectionItemToggledCallback;
}

function toItem<T>(item: SelectableItem<T> | SelectableItemInit<T> | string): SelectableItem<T> {
  return item instanceof SelectableItem ? item : new SelectableItem<T>(item);
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class Section<TItem = unknown, TSection = unknown> {
  name: string;
  description: string;

  private items: Array<SelectableItem<TItem>>;
  private data: TSection | undefined;
  private enterCallback: (() => void) | null;
  private exitCallback: (() => void) | null;
  private itemToggledCallback: SectionItemToggledCallback | null;

  constructor(init: SectionInit<TItem, TSection> | string) {
    const options: SectionInit<TItem, TSection> = typeof init === 'string' ? { name: init } : init;

    this.name = options.name;
    this.description = options.description ?? '';
    this.items = (options.items ?? []).map((item) => toItem(item));
    this.data = options.data;
    this.enterCallback = options.onEnter ?? null;
    this.exitCallback = options.onExit ?? null;
    this.itemToggledCallback = options.onItemToggled ?? null;
  }

  // ==========================================================================
  // Items
  // ==========================================================================

  addItem(item: SelectableItem<TItem> | SelectableItemInit<TItem> | string): SelectableItem<TItem> {
    const created = toItem(item);
    this.items.push(created);
    return created;
  }

  addItems(items: Array<SelectableItem<TItem> | SelectableItemInit<TItem> | string>): void {
    for (const item of items) {
      this.addItem(item);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Read-only view of the items in display order.
   */
  getItems(): ReadonlyArray<SelectableItem<TItem>> {
    return this.items;
  }

  getItem(index: number): SelectableItem<TItem> | undefined {
    return this.isValidIndex(index) ? this.items[index] : undefined;
  }

  getItemByName(name: string): SelectableItem<TItem> | undefined {
    return this.items.find((item) => item.name === name);
  }

  /**
   * First item with the given id. Ids default to 0 and are not unique,
   * so assign them explicitly when lookup by id matters.
   */
  getItemById(id: number): SelectableItem<TItem> | undefined {
    return this.items.find((item) => item.id === id);
  }

  removeItem(index: number): boolean {
    if (!this.isValidIndex(index)) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  removeItemByName(name: string): boolean {
    const index = this.items.findIndex((item) => item.name === name);
    return index === -1 ? false : this.removeItem(index);
  }

  clearItems(): void {
    this.items = [];
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  /**
   * Toggle the item at `index`.
   *
   * @returns True if the item exists (and therefore changed state)
   */
  toggleItem(index: number): boolean {
    const item = this.getItem(index);
    if (!item) {
      return false;
    }

    const selected = item.toggle();
    this.itemToggledCallback?.(index, selected);
    return true;
  }

  /**
   * @returns True only if the item exists and its state changed
   */
  setItemSelected(index: number, selected: boolean): boolean {
    const item = this.getItem(index);
    if (!item) {
      return false;
    }

    const changed = item.setSelected(selected);
    if (changed) {
      this.itemToggledCallback?.(index, selected);
    }
    return changed;
  }

  selectAll(): void {
    this.items.forEach((_, index) => this.setItemSelected(index, true));
  }

  clearSelections(): void {
    this.items.forEach((_, index) => this.setItemSelected(index, false));
  }

  invertSelections(): void {
    this.items.forEach((_, index) => this.toggleItem(index));
  }

  getSelectedCount(): number {
    return this.items.filter((item) => item.selected).length;
  }

  getSelectedNames(): string[] {
    return this.items.filter((item) => item.selected).map((item) => item.name);
  }

  getSelectedItems(): Array<SelectableItem<TItem>> {
    return this.items.filter((item) => item.selected);
  }

  getSelectedIndices(): number[] {
    const indices: number[] = [];
    this.items.forEach((item, index) => {
      if (item.selected) indices.push(index);
    });
    return indices;
  }

  // ==========================================================================
  // Ordering
  // ==========================================================================

  sortItemsByName(): void {
    this.items.sort((a, b) => compareNames(a.name, b.name));
  }

  /**
   * Stable sort grouping selected and unselected items.
   */
  sortItemsBySelection(selectedFirst: boolean = true): void {
    this.items.sort((a, b) => {
      if (a.selected === b.selected) return 0;
      return a.selected === selectedFirst ? -1 : 1;
    });
  }

  // ==========================================================================
  // Display
  // ==========================================================================

  getDisplayString(): string {
    return this.description ? `${this.name} - ${this.description}` : this.name;
  }

  /**
   * Display string with a `(selected/total)` counter; no counter for an
   * empty section.
   */
  getDisplayStringWithCount(): string {
    const base = this.getDisplayString();
    return this.size > 0 ? `${base} (${this.getSelectedCount()}/${this.size})` : base;
  }

  /**
   * Copy with fresh items. Payloads and callbacks are shared.
   */
  clone(): Section<TItem, TSection> {
    return new Section<TItem, TSection>({
      name: this.name,
      description: this.description,
      items: this.items.map((item) => item.clone()),
      data: this.data,
      onEnter: this.enterCallback ?? undefined,
      onExit: this.exitCallback ?? undefined,
      onItemToggled: this.itemToggledCallback ?? undefined,
    });
  }

  // ==========================================================================
  // Payload and callbacks
  // ==========================================================================

  hasUserData(): boolean {
    return this.data !== undefined;
  }

  getUserData(): TSection | undefined {
    return this.data;
  }

  setUserData(data: TSection): void {
    this.data = data;
  }

  setEnterCallback(callback: (() => void) | null): void {
    this.enterCallback = callback;
  }

  setExitCallback(callback: (() => void) | null): void {
    this.exitCallback = callback;
  }

  setItemToggledCallback(callback: SectionItemToggledCallback | null): void {
    this.itemToggledCallback = callback;
  }

  triggerEnter(): void {
    this.enterCallback?.();
  }

  triggerExit(): void {
    this.exitCallback?.();
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }
}
