/**
 * Navigation Types
 *
 * Core type definitions for the navigation system:
 * - Navigation state enum
 * - Observer callback signatures
 * - Layout, theme, text and key configuration
 */

import type { Section } from '../model/section.js';

/**
 * Which list the user is browsing.
 */
export enum NavigationState {
  /** Top-level list of sections */
  SECTION_SELECTION = 'section_selection',
  /** Paginated items of the current section */
  ITEM_SELECTION = 'item_selection',
}

// ============================================================================
// Observer callbacks
// ============================================================================

export type SectionSelectedCallback<TItem = unknown, TSection = unknown> = (
  sectionIndex: number,
  section: Section<TItem, TSection>
) => void;

export type ItemToggledCallback = (
  sectionIndex: number,
  itemIndex: number,
  selected: boolean
) => void;

export type PageChangedCallback = (page: number, totalPages: number) => void;

export type StateChangedCallback = (
  oldState: NavigationState,
  newState: NavigationState
) => void;

/**
 * Consulted before default key handling.
 * Return true to mark the key as handled and skip the defaults.
 */
export type CustomCommandCallback = (character: string, state: NavigationState) => boolean;

export type ExitCallback<TItem = unknown, TSection = unknown> = (
  sections: ReadonlyArray<Section<TItem, TSection>>
) => void;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Chalk foreground colors accepted as the highlight color.
 */
export const ACCENT_COLORS = [
  'cyan',
  'blue',
  'green',
  'red',
  'yellow',
  'magenta',
  'white',
  'cyanBright',
  'blueBright',
  'greenBright',
  'redBright',
  'yellowBright',
  'magentaBright',
  'whiteBright',
] as const;

export type AccentColor = (typeof ACCENT_COLORS)[number];

export interface LayoutConfig {
  /** Items shown per page in a section */
  itemsPerPage: number;
  centerHorizontally: boolean;
  centerVertically: boolean;
  /** Derive content width from the terminal width (clamped to min/max) */
  autoResize: boolean;
  minContentWidth: number;
  maxContentWidth: number;
  /** Rows above the header when not centered vertically */
  verticalPadding: number;
}

export interface ThemeConfig {
  selectedPrefix: string;
  unselectedPrefix: string;
  useColors: boolean;
  accentColor: AccentColor;
}

export interface TextConfig {
  sectionTitle: string;
  /** Prepended to the section name in the item list header */
  itemTitlePrefix: string;
  emptySectionMessage: string;
  helpSections: string;
  helpItems: string;
  showHelp: boolean;
  showPageNumbers: boolean;
  /** Show `(selected/total)` next to each section */
  showCounters: boolean;
  /** Show the highlighted entry's description above the help line */
  showDescriptions: boolean;
}

export interface KeyConfig {
  /** Digits 1-9 jump to a section or page */
  quickSelect: boolean;
  /** j/k move, h goes back */
  vimKeys: boolean;
  /** Extra keys advertised in the help line, e.g. { s: 'Save' } */
  customShortcuts: Record<string, string>;
}

export interface NavigationConfig {
  layout: LayoutConfig;
  theme: ThemeConfig;
  text: TextConfig;
  keys: KeyConfig;
}

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = {
  layout: {
    itemsPerPage: 10,
    centerHorizontally: true,
    centerVertically: false,
    autoResize: true,
    minContentWidth: 40,
    maxContentWidth: 80,
    verticalPadding: 1,
  },
  theme: {
    selectedPrefix: '[x] ',
    unselectedPrefix: '[ ] ',
    useColors: false,
    accentColor: 'cyan',
  },
  text: {
    sectionTitle: 'Select a Section',
    itemTitlePrefix: 'Section: ',
    emptySectionMessage: 'No items in this section.',
    helpSections: 'Up/Down: Navigate | Enter: Select | 1-9: Quick Select | Q: Quit',
    helpItems: 'Up/Down: Navigate | Space: Toggle | Left/Right: Page | A: All | N: None | B: Back | Q: Quit',
    showHelp: true,
    showPageNumbers: true,
    showCounters: true,
    showDescriptions: true,
  },
  keys: {
    quickSelect: true,
    vimKeys: false,
    customShortcuts: {},
  },
};

/**
 * Partial configuration accepted by updateConfig() and the builder.
 */
export type NavigationConfigUpdate = {
  [K in keyof NavigationConfig]?: Partial<NavigationConfig[K]>;
};

/**
 * Merge a partial update over a complete configuration.
 */
export function mergeNavigationConfig(
  base: NavigationConfig,
  update: NavigationConfigUpdate = {}
): NavigationConfig {
  return {
    layout: { ...base.layout, ...update.layout },
    theme: { ...base.theme, ...update.theme },
    text: { ...base.text, ...update.text },
    keys: {
      ...base.keys,
      ...update.keys,
      customShortcuts: { ...base.keys.customShortcuts, ...update.keys?.customShortcuts },
    },
  };
}
