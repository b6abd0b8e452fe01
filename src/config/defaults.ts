/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { DEFAULT_NAVIGATION_CONFIG } from '../navigation/types.js';
import type { Config } from './schema.js';

const { layout, theme, text, keys } = DEFAULT_NAVIGATION_CONFIG;

export const DEFAULT_CONFIG: Config = {
  layout: {
    items_per_page: layout.itemsPerPage,
    center_horizontally: layout.centerHorizontally,
    center_vertically: layout.centerVertically,
    auto_resize: layout.autoResize,
    min_content_width: layout.minContentWidth,
    max_content_width: layout.maxContentWidth,
    vertical_padding: layout.verticalPadding,
  },
  theme: {
    preset: 'default',
    use_colors: theme.useColors,
    accent_color: theme.accentColor,
  },
  text: {
    section_title: text.sectionTitle,
    item_title_prefix: text.itemTitlePrefix,
    empty_section_message: text.emptySectionMessage,
    help_sections: text.helpSections,
    help_items: text.helpItems,
    show_help: text.showHelp,
    show_page_numbers: text.showPageNumbers,
    show_counters: text.showCounters,
    show_descriptions: text.showDescriptions,
  },
  keys: {
    quick_select: keys.quickSelect,
    vim_keys: keys.vimKeys,
  },
};

/**
 * Config file template (TOML format)
 * Written to config.toml on first run
 */
export const CONFIG_TEMPLATE = `# sectionpick configuration
# Every key is optional; missing keys fall back to the built-in defaults.

[layout]
items_per_page = ${DEFAULT_CONFIG.layout.items_per_page}
center_horizontally = ${DEFAULT_CONFIG.layout.center_horizontally}
center_vertically = ${DEFAULT_CONFIG.layout.center_vertically}
# Content width follows the terminal, clamped to [min, max]
auto_resize = ${DEFAULT_CONFIG.layout.auto_resize}
min_content_width = ${DEFAULT_CONFIG.layout.min_content_width}
max_content_width = ${DEFAULT_CONFIG.layout.max_content_width}
vertical_padding = ${DEFAULT_CONFIG.layout.vertical_padding}

[theme]
# default | minimal | fancy | retro | modern
preset = "${DEFAULT_CONFIG.theme.preset}"
# selected_prefix = "[x] "
# unselected_prefix = "[ ] "
use_colors = ${DEFAULT_CONFIG.theme.use_colors}
accent_color = "${DEFAULT_CONFIG.theme.accent_color}"

[text]
show_help = ${DEFAULT_CONFIG.text.show_help}
show_page_numbers = ${DEFAULT_CONFIG.text.show_page_numbers}
show_counters = ${DEFAULT_CONFIG.text.show_counters}
show_descriptions = ${DEFAULT_CONFIG.text.show_descriptions}

[keys]
# Digits 1-9 open a section or jump to a page
quick_select = ${DEFAULT_CONFIG.keys.quick_select}
# j/k move, h goes back
vim_keys = ${DEFAULT_CONFIG.keys.vim_keys}
`;
