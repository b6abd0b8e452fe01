/**
 * Selectable Item
 *
 * A single toggleable leaf entry in a section. Items carry a display name,
 * an optional long description, an integer id and an optional payload of
 * whatever type the caller attaches.
 *
 * The toggle callback fires once per actual state transition:
 * `toggle()` always transitions, `setSelected()` only when the value differs.
 */

/**
 * Called with the new selection state after a transition.
 */
export type ItemToggleCallback = (selected: boolean) => void;

/**
 * Construction options for a SelectableItem.
 */
export interface SelectableItemInit<T = unknown> {
  name: string;
  description?: string;
  selected?: boolean;
  /** Not required to be unique (defaults to 0) */
  id?: number;
  data?: T;
  onToggle?: ItemToggleCallback;
}

/**
 * Prefix pair used when rendering an item's selection indicator.
 */
export interface IndicatorPrefixes {
  selected: string;
  unselected: string;
}

export class SelectableItem<T = unknown> {
  name: string;
  description: string;
  selected: boolean;
  id: number;

  private data: T | undefined;
  private hasData: boolean;
  private onToggle: ItemToggleCallback | null;

  constructor(init: SelectableItemInit<T> | string) {
    const options: SelectableItemInit<T> = typeof init === 'string' ? { name: init } : init;

    this.name = options.name;
    this.description = options.description ?? '';
    this.selected = options.selected ?? false;
    this.id = options.id ?? 0;
    this.data = options.data;
    this.hasData = options.data !== undefined;
    this.onToggle = options.onToggle ?? null;
  }

  /**
   * Flip the selection state.
   *
   * @returns The new selection state
   */
  toggle(): boolean {
    this.selected = !this.selected;
    this.onToggle?.(this.selected);
    return this.selected;
  }

  /**
   * Set the selection state explicitly.
   *
   * @returns True if the state changed, false if it already had that value
   */
  setSelected(selected: boolean): boolean {
    if (this.selected === selected) {
      return false;
    }

    this.selected = selected;
    this.onToggle?.(this.selected);
    return true;
  }

  setToggleCallback(callback: ItemToggleCallback | null): void {
    this.onToggle = callback;
  }

  /**
   * Render the item with its selection indicator, e.g. `[X] Dark Mode`.
   */
  getDisplayString(prefixes: IndicatorPrefixes = { selected: '* ', unselected: '  ' }): string {
    return (this.selected ? prefixes.selected : prefixes.unselected) + this.name;
  }

  /**
   * `name - description`, or just the name when there is no description.
   */
  getFullDescription(): string {
    return this.description ? `${this.name} - ${this.description}` : this.name;
  }

  hasUserData(): boolean {
    return this.hasData;
  }

  getUserData(): T | undefined {
    return this.data;
  }

  setUserData(data: T): void {
    this.data = data;
    this.hasData = true;
  }

  /**
   * Independent copy sharing the payload and toggle callback.
   */
  clone(): SelectableItem<T> {
    const copy = new SelectableItem<T>({
      name: this.name,
      description: this.description,
      selected: this.selected,
      id: this.id,
      data: this.data,
      onToggle: this.onToggle ?? undefined,
    });
    copy.hasData = this.hasData;
    return copy;
  }

  /**
   * Two items are equal when both id and name match.
   */
  equals(other: SelectableItem<unknown>): boolean {
    return this.id === other.id && this.name === other.name;
  }
}
