/**
 * Menu Files
 *
 * Loading menus from .json/.toml and saving/restoring selection state.
 */

export {
  MenuSchema,
  MenuSectionSchema,
  MenuItemSchema,
  type Menu,
  type MenuSection,
  type MenuItem,
} from './schema.js';

export { loadMenuFile, parseMenu, buildSections, MENU_EXTENSIONS } from './loader.js';

export {
  formatStateIni,
  parseStateIni,
  applyState,
  saveState,
  loadState,
  type SelectionState,
} from './state-file.js';
