/**
 * Navigation
 *
 * The two-state navigation controller, its configuration, pagination
 * helpers, presets and the value-returning builder.
 */

export {
  NavigationState,
  DEFAULT_NAVIGATION_CONFIG,
  ACCENT_COLORS,
  mergeNavigationConfig,
  type AccentColor,
  type LayoutConfig,
  type ThemeConfig,
  type TextConfig,
  type KeyConfig,
  type NavigationConfig,
  type NavigationConfigUpdate,
  type SectionSelectedCallback,
  type ItemToggledCallback,
  type PageChangedCallback,
  type StateChangedCallback,
  type CustomCommandCallback,
  type ExitCallback,
} from './types.js';

export {
  calculateTotalPages,
  calculatePageBounds,
  pageLength,
  EMPTY_BOUNDS,
  type PageBounds,
} from './pagination.js';

export {
  THEME_PRESETS,
  LAYOUT_PRESETS,
  isThemePreset,
  isLayoutPreset,
  applyThemePreset,
  applyLayoutPreset,
  type ThemePreset,
  type LayoutPreset,
} from './presets.js';

export { NavigationController, type NavigationControllerOptions } from './controller.js';
export { NavigationBuilder, type SectionSource } from './builder.js';
