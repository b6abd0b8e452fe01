/**
 * Navigation Builder
 *
 * Value-returning builder for a NavigationController. Every call returns a
 * new builder; `build()` creates the controller, materializes the sections
 * and wires the observers.
 *
 * ```typescript
 * const nav = NavigationBuilder.create()
 *   .textTitles('Tweaks', 'Configure: ')
 *   .themePreset('fancy')
 *   .layoutPreset('compact')
 *   .customShortcut('s', 'Save')
 *   .section(privacy)
 *   .onExit((sections) => report(sections))
 *   .build();
 * await nav.run();
 * ```
 */

import { Section, type SectionInit } from '../model/section.js';
import { SectionBuilder } from '../model/section-builder.js';
import { SelectableItem } from '../model/selectable-item.js';
import type { TerminalDriver } from '../terminal/types.js';
import type { Logger } from '../utils/logger.js';
import { NavigationController } from './controller.js';
import { applyLayoutPreset, applyThemePreset, type LayoutPreset, type ThemePreset } from './presets.js';
import {
  DEFAULT_NAVIGATION_CONFIG,
  mergeNavigationConfig,
  type AccentColor,
  type CustomCommandCallback,
  type ExitCallback,
  type ItemToggledCallback,
  type KeyConfig,
  type LayoutConfig,
  type NavigationConfig,
  type NavigationConfigUpdate,
  type PageChangedCallback,
  type SectionSelectedCallback,
  type StateChangedCallback,
  type TextConfig,
  type ThemeConfig,
} from './types.js';

export type SectionSource<TItem, TSection> =
  | Section<TItem, TSection>
  | SectionBuilder<TItem, TSection>
  | SectionInit<TItem, TSection>
  | string;

interface NavigationBuilderState<TItem, TSection> {
  config: NavigationConfig;
  sections: ReadonlyArray<SectionSource<TItem, TSection>>;
  terminal: TerminalDriver | undefined;
  logger: Logger | undefined;
  onSectionSelected: SectionSelectedCallback<TItem, TSection> | null;
  onItemToggled: ItemToggledCallback | null;
  onPageChanged: PageChangedCallback | null;
  onStateChanged: StateChangedCallback | null;
  onCustomCommand: CustomCommandCallback | null;
  onExit: ExitCallback<TItem, TSection> | null;
}

function initialState<TItem, TSection>(): NavigationBuilderState<TItem, TSection> {
  return {
    config: mergeNavigationConfig(DEFAULT_NAVIGATION_CONFIG),
    sections: [],
    terminal: undefined,
    logger: undefined,
    onSectionSelected: null,
    onItemToggled: null,
    onPageChanged: null,
    onStateChanged: null,
    onCustomCommand: null,
    onExit: null,
  };
}

/** Section instances already handed to a controller */
const handedOut = new WeakSet<object>();

/**
 * A Section instance goes to the first controller built with it; later
 * builds get copies, so no two controllers share a section or its items.
 */
function materialize<TItem, TSection>(source: SectionSource<TItem, TSection>): Section<TItem, TSection> | SectionInit<TItem, TSection> | string {
  if (source instanceof SectionBuilder) {
    return source.build();
  }
  if (source instanceof Section) {
    if (handedOut.has(source)) {
      return source.clone();
    }
    handedOut.add(source);
    return source;
  }
  if (typeof source === 'string' || !source.items) {
    return source;
  }
  return {
    ...source,
    items: source.items.map((item) => (item instanceof SelectableItem ? item.clone() : item)),
  };
}

export class NavigationBuilder<TItem = unknown, TSection = unknown> {
  private constructor(private readonly state: NavigationBuilderState<TItem, TSection>) {}

  static create<TItem = unknown, TSection = unknown>(): NavigationBuilder<TItem, TSection> {
    return new NavigationBuilder<TItem, TSection>(initialState());
  }

  private with(patch: Partial<NavigationBuilderState<TItem, TSection>>): NavigationBuilder<TItem, TSection> {
    return new NavigationBuilder({ ...this.state, ...patch });
  }

  private configure(update: NavigationConfigUpdate): NavigationBuilder<TItem, TSection> {
    return this.with({ config: mergeNavigationConfig(this.state.config, update) });
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  config(update: NavigationConfigUpdate): NavigationBuilder<TItem, TSection> {
    return this.configure(update);
  }

  layout(layout: Partial<LayoutConfig>): NavigationBuilder<TItem, TSection> {
    return this.configure({ layout });
  }

  theme(theme: Partial<ThemeConfig>): NavigationBuilder<TItem, TSection> {
    return this.configure({ theme });
  }

  text(text: Partial<TextConfig>): NavigationBuilder<TItem, TSection> {
    return this.configure({ text });
  }

  keys(keys: Partial<Omit<KeyConfig, 'customShortcuts'>>): NavigationBuilder<TItem, TSection> {
    return this.configure({ keys });
  }

  itemsPerPage(itemsPerPage: number): NavigationBuilder<TItem, TSection> {
    return this.configure({ layout: { itemsPerPage } });
  }

  centering(horizontal: boolean, vertical: boolean = false): NavigationBuilder<TItem, TSection> {
    return this.configure({ layout: { centerHorizontally: horizontal, centerVertically: vertical } });
  }

  contentWidth(min: number, max: number): NavigationBuilder<TItem, TSection> {
    return this.configure({ layout: { minContentWidth: min, maxContentWidth: max } });
  }

  prefixes(selected: string, unselected: string): NavigationBuilder<TItem, TSection> {
    return this.configure({ theme: { selectedPrefix: selected, unselectedPrefix: unselected } });
  }

  colors(enabled: boolean, accentColor?: AccentColor): NavigationBuilder<TItem, TSection> {
    return this.configure({ theme: accentColor ? { useColors: enabled, accentColor } : { useColors: enabled } });
  }

  textTitles(sectionTitle: string, itemTitlePrefix: string): NavigationBuilder<TItem, TSection> {
    return this.configure({ text: { sectionTitle, itemTitlePrefix } });
  }

  textHelp(helpSections: string, helpItems: string): NavigationBuilder<TItem, TSection> {
    return this.configure({ text: { helpSections, helpItems } });
  }

  vimKeys(enabled: boolean = true): NavigationBuilder<TItem, TSection> {
    return this.configure({ keys: { vimKeys: enabled } });
  }

  themePreset(preset: ThemePreset): NavigationBuilder<TItem, TSection> {
    const { config } = this.state;
    return this.with({ config: { ...config, theme: applyThemePreset(config.theme, preset) } });
  }

  layoutPreset(preset: LayoutPreset): NavigationBuilder<TItem, TSection> {
    const { config } = this.state;
    return this.with({ config: { ...config, layout: applyLayoutPreset(config.layout, preset) } });
  }

  /**
   * Advertise an extra key in the help line. Handle it with onCustomCommand().
   */
  customShortcut(key: string, description: string): NavigationBuilder<TItem, TSection> {
    return this.configure({ keys: { customShortcuts: { [key]: description } } });
  }

  // ==========================================================================
  // Sections and collaborators
  // ==========================================================================

  section(section: SectionSource<TItem, TSection>): NavigationBuilder<TItem, TSection> {
    return this.with({ sections: [...this.state.sections, section] });
  }

  sections(sections: ReadonlyArray<SectionSource<TItem, TSection>>): NavigationBuilder<TItem, TSection> {
    return this.with({ sections: [...this.state.sections, ...sections] });
  }

  terminal(terminal: TerminalDriver): NavigationBuilder<TItem, TSection> {
    return this.with({ terminal });
  }

  logger(logger: Logger): NavigationBuilder<TItem, TSection> {
    return this.with({ logger });
  }

  // ==========================================================================
  // Observers
  // ==========================================================================

  onSectionSelected(callback: SectionSelectedCallback<TItem, TSection>): NavigationBuilder<TItem, TSection> {
    return this.with({ onSectionSelected: callback });
  }

  onItemToggled(callback: ItemToggledCallback): NavigationBuilder<TItem, TSection> {
    return this.with({ onItemToggled: callback });
  }

  onPageChanged(callback: PageChangedCallback): NavigationBuilder<TItem, TSection> {
    return this.with({ onPageChanged: callback });
  }

  onStateChanged(callback: StateChangedCallback): NavigationBuilder<TItem, TSection> {
    return this.with({ onStateChanged: callback });
  }

  onCustomCommand(callback: CustomCommandCallback): NavigationBuilder<TItem, TSection> {
    return this.with({ onCustomCommand: callback });
  }

  onExit(callback: ExitCallback<TItem, TSection>): NavigationBuilder<TItem, TSection> {
    return this.with({ onExit: callback });
  }

  /**
   * A builder with nothing configured.
   */
  reset(): NavigationBuilder<TItem, TSection> {
    return NavigationBuilder.create<TItem, TSection>();
  }

  /**
   * Snapshot of the configuration this builder would apply.
   */
  getConfig(): Readonly<NavigationConfig> {
    return this.state.config;
  }

  /**
   * Create a controller. Safe to call more than once: section sources are
   * materialized per call, and a Section instance is only ever owned by the
   * first controller built with it.
   */
  build(): NavigationController<TItem, TSection> {
    const { state } = this;
    const controller = new NavigationController<TItem, TSection>({
      config: state.config,
      terminal: state.terminal,
      logger: state.logger,
    });

    controller.addSections(state.sections.map((source) => materialize(source)));

    if (state.onSectionSelected) controller.onSectionSelected(state.onSectionSelected);
    if (state.onItemToggled) controller.onItemToggled(state.onItemToggled);
    if (state.onPageChanged) controller.onPageChanged(state.onPageChanged);
    if (state.onStateChanged) controller.onStateChanged(state.onStateChanged);
    if (state.onCustomCommand) controller.onCustomCommand(state.onCustomCommand);
    if (state.onExit) controller.onExit(state.onExit);

    return controller;
  }
}
