/**
 * Data Model
 *
 * Plain hierarchical records holding selection state:
 * - SelectableItem: a toggleable leaf entry
 * - Section: a named, ordered group of items
 */

export {
  SelectableItem,
  type SelectableItemInit,
  type ItemToggleCallback,
  type IndicatorPrefixes,
} from './selectable-item.js';

export {
  Section,
  type SectionInit,
  type SectionItemToggledCallback,
} from './section.js';

export { SectionBuilder, type ItemGenerator } from './section-builder.js';
