/**
 * Section Builder
 *
 * Value-returning builder for sections: every call returns a new builder and
 * leaves the receiver untouched, so a partially configured builder can be
 * reused as a template.
 *
 * ```typescript
 * const privacy = SectionBuilder.create('Privacy')
 *   .description('Stop apps from reading personal data')
 *   .item('Location', 'Hide location from apps')
 *   .item('Camera')
 *   .selectItems(['Camera'])
 *   .sortByName()
 *   .build();
 * ```
 */

import { Section, type SectionItemToggledCallback } from './section.js';
import type { SelectableItemInit } from './selectable-item.js';

type SortOrder = 'name' | 'selected-first' | 'selected-last';

interface SectionBuilderState<TItem, TSection> {
  name: string;
  description: string;
  data: TSection | undefined;
  items: ReadonlyArray<SelectableItemInit<TItem>>;
  preselected: ReadonlyArray<string>;
  sort: SortOrder | null;
  onEnter: (() => void) | null;
  onExit: (() => void) | null;
  onItemToggled: SectionItemToggledCallback | null;
}

/**
 * Produces the item at position `index` for generatedItems().
 */
export type ItemGenerator<TItem> = (index: number) => SelectableItemInit<TItem> | string;

function toInit<TItem>(item: SelectableItemInit<TItem> | string): SelectableItemInit<TItem> {
  return typeof item === 'string' ? { name: item } : { ...item };
}

export class SectionBuilder<TItem = unknown, TSection = unknown> {
  private constructor(private readonly state: SectionBuilderState<TItem, TSection>) {}

  static create<TItem = unknown, TSection = unknown>(name: string): SectionBuilder<TItem, TSection> {
    return new SectionBuilder<TItem, TSection>({
      name,
      description: '',
      data: undefined,
      items: [],
      preselected: [],
      sort: null,
      onEnter: null,
      onExit: null,
      onItemToggled: null,
    });
  }

  private with(patch: Partial<SectionBuilderState<TItem, TSection>>): SectionBuilder<TItem, TSection> {
    return new SectionBuilder({ ...this.state, ...patch });
  }

  description(description: string): SectionBuilder<TItem, TSection> {
    return this.with({ description });
  }

  data(data: TSection): SectionBuilder<TItem, TSection> {
    return this.with({ data });
  }

  item(item: SelectableItemInit<TItem> | string, description?: string): SectionBuilder<TItem, TSection> {
    const init = toInit(item);
    if (description !== undefined) {
      init.description = description;
    }
    return this.with({ items: [...this.state.items, init] });
  }

  items(items: ReadonlyArray<SelectableItemInit<TItem> | string>): SectionBuilder<TItem, TSection> {
    return this.with({ items: [...this.state.items, ...items.map((item) => toInit(item))] });
  }

  /**
   * Append `count` items produced by `generator(0..count-1)`.
   */
  generatedItems(
    count: number,
    generator: ItemGenerator<TItem> = (index) => `Item ${index + 1}`
  ): SectionBuilder<TItem, TSection> {
    const generated = Array.from({ length: Math.max(0, count) }, (_, index) => toInit(generator(index)));
    return this.with({ items: [...this.state.items, ...generated] });
  }

  /**
   * Mark items with these names as selected when the section is built.
   */
  selectItems(names: ReadonlyArray<string>): SectionBuilder<TItem, TSection> {
    return this.with({ preselected: [...this.state.preselected, ...names] });
  }

  sortByName(): SectionBuilder<TItem, TSection> {
    return this.with({ sort: 'name' });
  }

  sortBySelection(selectedFirst: boolean = true): SectionBuilder<TItem, TSection> {
    return this.with({ sort: selectedFirst ? 'selected-first' : 'selected-last' });
  }

  onEnter(callback: () => void): SectionBuilder<TItem, TSection> {
    return this.with({ onEnter: callback });
  }

  onExit(callback: () => void): SectionBuilder<TItem, TSection> {
    return this.with({ onExit: callback });
  }

  onItemToggled(callback: SectionItemToggledCallback): SectionBuilder<TItem, TSection> {
    return this.with({ onItemToggled: callback });
  }

  /**
   * Create a fresh Section. Each call returns a new, independent instance.
   */
  build(): Section<TItem, TSection> {
    const { state } = this;
    const preselected = new Set(state.preselected);

    const section = new Section<TItem, TSection>({
      name: state.name,
      description: state.description,
      data: state.data,
      items: state.items.map((item) => ({
        ...item,
        selected: (item.selected ?? false) || preselected.has(item.name),
      })),
      onEnter: state.onEnter ?? undefined,
      onExit: state.onExit ?? undefined,
      onItemToggled: state.onItemToggled ?? undefined,
    });

    switch (state.sort) {
      case 'name':
        section.sortItemsByName();
        break;
      case 'selected-first':
        section.sortItemsBySelection(true);
        break;
      case 'selected-last':
        section.sortItemsBySelection(false);
        break;
    }

    return section;
  }
}
