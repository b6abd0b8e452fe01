/**
 * Maps the snake_case file configuration onto the controller's
 * NavigationConfig, applying the theme preset before explicit prefixes.
 */

import {
  DEFAULT_NAVIGATION_CONFIG,
  type NavigationConfig,
} from '../navigation/types.js';
import { applyThemePreset } from '../navigation/presets.js';
import type { Config } from './schema.js';

export function resolveNavigationConfig(config: Config): NavigationConfig {
  const presetTheme = applyThemePreset(DEFAULT_NAVIGATION_CONFIG.theme, config.theme.preset);

  return {
    layout: {
      itemsPerPage: config.layout.items_per_page,
      centerHorizontally: config.layout.center_horizontally,
      centerVertically: config.layout.center_vertically,
      autoResize: config.layout.auto_resize,
      minContentWidth: config.layout.min_content_width,
      maxContentWidth: config.layout.max_content_width,
      verticalPadding: config.layout.vertical_padding,
    },
    theme: {
      selectedPrefix: config.theme.selected_prefix ?? presetTheme.selectedPrefix,
      unselectedPrefix: config.theme.unselected_prefix ?? presetTheme.unselectedPrefix,
      // An explicit use_colors = true wins over a colorless preset
      useColors: config.theme.use_colors || presetTheme.useColors,
      accentColor: config.theme.accent_color,
    },
    text: {
      sectionTitle: config.text.section_title,
      itemTitlePrefix: config.text.item_title_prefix,
      emptySectionMessage: config.text.empty_section_message,
      helpSections: config.text.help_sections,
      helpItems: config.text.help_items,
      showHelp: config.text.show_help,
      showPageNumbers: config.text.show_page_numbers,
      showCounters: config.text.show_counters,
      showDescriptions: config.text.show_descriptions,
    },
    keys: {
      quickSelect: config.keys.quick_select,
      vimKeys: config.keys.vim_keys,
      customShortcuts: {},
    },
  };
}
