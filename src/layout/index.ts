/**
 * Text layout: wrapping, centering and bottom anchoring.
 */

export {
  layoutText,
  layoutLines,
  centerLine,
  anchorTopRow,
  type LayoutResult,
} from './text-layout.js';
