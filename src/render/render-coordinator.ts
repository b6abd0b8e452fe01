/**
 * Render Coordinator
 *
 * Paints one frame of the navigation view through a TerminalDriver:
 * 1. Geometry: content width, left padding and start row for this frame
 * 2. Body: the section list or the current page of items
 * 3. Footer: description block and help/page-info block, each wrapped by
 *    the text layout engine and anchored to a bottom row
 *
 * Layout (horizontal centering on):
 * ```
 * start        Select a Section          <- header title
 * start+1      ================          <- separator
 * start+2                                <- blank
 * start+3    > 1. Privacy (2/8)          <- body rows
 *            ...
 * rows-3       Stop apps from reading    <- description block
 * rows-1       Up/Down: Navigate | ...   <- help block (anchor)
 * ```
 *
 * Every frame clears the screen and writes cursor-addressed lines directly;
 * there is no off-screen buffer.
 */

import chalk from 'chalk';
import type { Section } from '../model/section.js';
import { NavigationState, type LayoutConfig, type NavigationConfig } from '../navigation/types.js';
import { pageLength, type PageBounds } from '../navigation/pagination.js';
import { anchorTopRow, centerLine, layoutLines, layoutText } from '../layout/text-layout.js';
import type { TerminalDriver, TerminalSize } from '../terminal/types.js';

/** Columns reserved at the sides when deriving the content width */
export const SIDE_MARGIN = 4;
/** Left margin used when horizontal centering is off */
export const FIXED_LEFT_MARGIN = 2;
/** Title, separator and blank line */
export const HEADER_ROWS = 3;
/** Rows reserved below the body in the content height estimate */
export const FOOTER_ROWS = 2;
/** The help block's last line sits this many rows above the bottom */
export const FOOTER_ANCHOR_OFFSET = 1;

/**
 * Everything the renderer needs to know about the navigation state.
 */
export interface RenderView<TItem = unknown, TSection = unknown> {
  state: NavigationState;
  sections: ReadonlyArray<Section<TItem, TSection>>;
  sectionIndex: number;
  selectionIndex: number;
  page: number;
  totalPages: number;
  bounds: PageBounds;
  config: NavigationConfig;
}

export interface FrameGeometry {
  rows: number;
  cols: number;
  contentWidth: number;
  /** Columns left of the content block (0-based offset) */
  leftPadding: number;
  /** Row of the header title (1-indexed) */
  startRow: number;
}

/**
 * Content width for a terminal `cols` wide.
 */
export function computeContentWidth(cols: number, layout: LayoutConfig): number {
  if (!layout.autoResize) {
    return layout.maxContentWidth;
  }
  const available = cols - SIDE_MARGIN;
  return Math.min(Math.max(available, layout.minContentWidth), layout.maxContentWidth);
}

/**
 * Frame geometry for a body of `bodyRows` rows.
 */
export function computeGeometry(
  size: TerminalSize,
  layout: LayoutConfig,
  bodyRows: number
): FrameGeometry {
  const contentWidth = computeContentWidth(size.cols, layout);

  const leftPadding = layout.centerHorizontally
    ? Math.max(0, Math.floor((size.cols - contentWidth) / 2))
    : FIXED_LEFT_MARGIN;

  let startRow = 1 + layout.verticalPadding;
  if (layout.centerVertically) {
    const contentHeight = HEADER_ROWS + bodyRows + FOOTER_ROWS;
    startRow = Math.max(1, Math.floor((size.rows - contentHeight) / 2));
  }

  return { rows: size.rows, cols: size.cols, contentWidth, leftPadding, startRow };
}

export class RenderCoordinator {
  constructor(private readonly terminal: TerminalDriver) {}

  /**
   * Paint a full frame.
   */
  render<TItem, TSection>(view: RenderView<TItem, TSection>): FrameGeometry {
    this.terminal.clearScreen();

    const geometry = computeGeometry(
      this.terminal.getSize(),
      view.config.layout,
      this.bodyRowCount(view)
    );

    if (view.state === NavigationState.SECTION_SELECTION) {
      this.renderSectionList(view, geometry);
    } else {
      this.renderItemList(view, geometry);
    }

    this.renderFooter(view, geometry);
    this.terminal.flush();

    return geometry;
  }

  // ==========================================================================
  // Body
  // ==========================================================================

  private bodyRowCount<TItem, TSection>(view: RenderView<TItem, TSection>): number {
    if (view.state === NavigationState.SECTION_SELECTION) {
      return view.sections.length;
    }
    return pageLength(view.bounds);
  }

  private renderSectionList<TItem, TSection>(
    view: RenderView<TItem, TSection>,
    geometry: FrameGeometry
  ): void {
    const { text } = view.config;
    this.renderHeader(text.sectionTitle, view.config, geometry);

    view.sections.forEach((section, index) => {
      let label = `${index + 1}. ${section.name}`;
      if (text.showCounters && section.size > 0) {
        label += ` (${section.getSelectedCount()}/${section.size})`;
      }

      const highlighted = index === view.selectionIndex;
      const line = (highlighted ? '> ' : '  ') + label;
      this.writeLine(geometry.startRow + HEADER_ROWS + index, geometry, this.align(line, view.config, geometry), {
        highlight: highlighted,
        config: view.config,
      });
    });
  }

  private renderItemList<TItem, TSection>(
    view: RenderView<TItem, TSection>,
    geometry: FrameGeometry
  ): void {
    const section = view.sections[view.sectionIndex];
    if (!section) {
      return;
    }

    const { text, theme } = view.config;
    this.renderHeader(text.itemTitlePrefix + section.name, view.config, geometry);

    const bodyRow = geometry.startRow + HEADER_ROWS;

    if (section.isEmpty()) {
      this.writeLine(bodyRow, geometry, this.align(text.emptySectionMessage, view.config, geometry));
      return;
    }

    for (let index = view.bounds.start; index < view.bounds.end; index++) {
      const item = section.getItem(index);
      if (!item) continue;

      const offset = index - view.bounds.start;
      const highlighted = offset === view.selectionIndex;
      const line =
        (highlighted ? '> ' : '  ') +
        item.getDisplayString({ selected: theme.selectedPrefix, unselected: theme.unselectedPrefix });

      this.writeLine(bodyRow + offset, geometry, this.align(line, view.config, geometry), {
        highlight: highlighted,
        config: view.config,
      });
    }
  }

  private renderHeader(title: string, config: NavigationConfig, geometry: FrameGeometry): void {
    const heading = config.theme.useColors ? chalk.bold(this.align(title, config, geometry)) : this.align(title, config, geometry);
    this.writeLine(geometry.startRow, geometry, heading);
    this.writeLine(geometry.startRow + 1, geometry, this.align('='.repeat(title.length), config, geometry));
  }

  // ==========================================================================
  // Footer
  // ==========================================================================

  private renderFooter<TItem, TSection>(
    view: RenderView<TItem, TSection>,
    geometry: FrameGeometry
  ): void {
    let anchor = geometry.rows - FOOTER_ANCHOR_OFFSET;

    const help = this.helpText(view);
    if (help) {
      const top = this.renderBlock(help, anchor, view.config, geometry);
      anchor = top - 2;
    }

    if (view.config.text.showDescriptions) {
      const description = this.descriptionText(view);
      if (description) {
        this.renderBlock(description, anchor, view.config, geometry);
      }
    }
  }

  /**
   * Lay out `text` and paint it so its last line lands on `anchorRow`.
   *
   * @returns The row of the block's first line
   */
  private renderBlock(
    text: string,
    anchorRow: number,
    config: NavigationConfig,
    geometry: FrameGeometry
  ): number {
    const centered = config.layout.centerHorizontally;
    const result = layoutText(centered ? text : text.replace(/\n/g, ' '), geometry.contentWidth, centered);
    const top = anchorTopRow(anchorRow, result.lineCount);

    layoutLines(result).forEach((line, offset) => {
      this.writeLine(top + offset, geometry, config.theme.useColors ? chalk.dim(line) : line);
    });

    return top;
  }

  private helpText<TItem, TSection>(view: RenderView<TItem, TSection>): string {
    const { text, keys } = view.config;
    const parts: string[] = [];

    if (text.showHelp) {
      parts.push(view.state === NavigationState.SECTION_SELECTION ? text.helpSections : text.helpItems);
      for (const [key, description] of Object.entries(keys.customShortcuts)) {
        parts.push(`${key.toUpperCase()}: ${description}`);
      }
    }

    if (view.state === NavigationState.ITEM_SELECTION && text.showPageNumbers) {
      parts.push(`Page ${view.page + 1} of ${view.totalPages}`);
    }

    return parts.filter((part) => part.length > 0).join(' | ');
  }

  private descriptionText<TItem, TSection>(view: RenderView<TItem, TSection>): string {
    if (view.state === NavigationState.SECTION_SELECTION) {
      return view.sections[view.selectionIndex]?.description ?? '';
    }
    const item = view.sections[view.sectionIndex]?.getItem(view.bounds.start + view.selectionIndex);
    return item?.description ?? '';
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  private align(text: string, config: NavigationConfig, geometry: FrameGeometry): string {
    return config.layout.centerHorizontally ? centerLine(text, geometry.contentWidth) : text;
  }

  private writeLine(
    row: number,
    geometry: FrameGeometry,
    line: string,
    style?: { highlight: boolean; config: NavigationConfig }
  ): void {
    if (row < 1 || row > geometry.rows) {
      return;
    }

    const painted =
      style?.highlight && style.config.theme.useColors
        ? chalk[style.config.theme.accentColor](line)
        : line;

    this.terminal.moveCursor(row, geometry.leftPadding + 1);
    this.terminal.write(painted);
  }
}
