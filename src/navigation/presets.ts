/**
 * Theme and layout presets.
 *
 * Named bundles of configuration values selectable from the config file,
 * the CLI (--theme / --layout) or the NavigationBuilder.
 */

import type { LayoutConfig, ThemeConfig } from './types.js';

export const THEME_PRESETS = ['default', 'minimal', 'fancy', 'retro', 'modern'] as const;
export type ThemePreset = (typeof THEME_PRESETS)[number];

export const LAYOUT_PRESETS = ['compact', 'comfortable', 'fullscreen', 'centered'] as const;
export type LayoutPreset = (typeof LAYOUT_PRESETS)[number];

const THEMES: Record<ThemePreset, Partial<ThemeConfig>> = {
  default: { selectedPrefix: '[x] ', unselectedPrefix: '[ ] ' },
  minimal: { selectedPrefix: '* ', unselectedPrefix: '  ', useColors: false },
  fancy: { selectedPrefix: '✓ ', unselectedPrefix: '○ ', useColors: true },
  retro: { selectedPrefix: '[X] ', unselectedPrefix: '[ ] ', useColors: false },
  modern: { selectedPrefix: '● ', unselectedPrefix: '○ ', useColors: true, accentColor: 'blue' },
};

const LAYOUTS: Record<LayoutPreset, Partial<LayoutConfig>> = {
  compact: {
    itemsPerPage: 25,
    centerHorizontally: false,
    centerVertically: false,
    minContentWidth: 40,
    maxContentWidth: 60,
  },
  comfortable: {
    itemsPerPage: 15,
    centerHorizontally: false,
    centerVertically: false,
    minContentWidth: 60,
    maxContentWidth: 100,
    verticalPadding: 2,
  },
  fullscreen: {
    itemsPerPage: 30,
    centerHorizontally: false,
    centerVertically: false,
    autoResize: true,
    minContentWidth: 80,
    maxContentWidth: 120,
  },
  centered: {
    itemsPerPage: 20,
    centerHorizontally: true,
    centerVertically: false,
    minContentWidth: 60,
    maxContentWidth: 80,
    verticalPadding: 3,
  },
};

export function isThemePreset(value: string): value is ThemePreset {
  return (THEME_PRESETS as readonly string[]).includes(value);
}

export function isLayoutPreset(value: string): value is LayoutPreset {
  return (LAYOUT_PRESETS as readonly string[]).includes(value);
}

export function applyThemePreset(theme: ThemeConfig, preset: ThemePreset): ThemeConfig {
  return { ...theme, ...THEMES[preset] };
}

export function applyLayoutPreset(layout: LayoutConfig, preset: LayoutPreset): LayoutConfig {
  return { ...layout, ...LAYOUTS[preset] };
}
