/**
 * sectionpick - Library Entry Point
 *
 * Interactive two-level selection for the terminal: a list of sections,
 * each holding a paginated list of toggleable items.
 *
 * @example
 * ```typescript
 * import { NavigationBuilder, SectionBuilder } from 'sectionpick';
 *
 * const privacy = SectionBuilder.create('Privacy')
 *   .item('Location', 'Hide location from apps')
 *   .item('Camera');
 *
 * const nav = NavigationBuilder.create()
 *   .section(privacy)
 *   .onExit((sections) => console.log(sections.map((s) => s.getSelectedNames())))
 *   .build();
 *
 * await nav.run();
 * ```
 *
 * @packageDocumentation
 */

// Data model
export {
  SelectableItem,
  Section,
  SectionBuilder,
  type SelectableItemInit,
  type ItemToggleCallback,
  type IndicatorPrefixes,
  type SectionInit,
  type SectionItemToggledCallback,
  type ItemGenerator,
} from './model/index.js';

// Navigation
export * from './navigation/index.js';

// Rendering and layout
export * from './render/index.js';
export * from './layout/index.js';

// Terminal
export * from './terminal/index.js';

// Menu files and saved state
export * from './menu/index.js';

// Configuration
export {
  loadConfig,
  resolveNavigationConfig,
  getConfigPath,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
} from './config/index.js';

// Errors and logging
export {
  CLIError,
  ConfigError,
  FileNotFoundError,
  ValidationError,
  TerminalError,
  formatError,
} from './errors/index.js';
export { consoleLogger, silentLogger, formatTable, type Logger, type Column } from './utils/index.js';

export type { GlobalOptions, CommandContext } from './cli/types.js';
