export {
  RenderCoordinator,
  computeContentWidth,
  computeGeometry,
  SIDE_MARGIN,
  FIXED_LEFT_MARGIN,
  HEADER_ROWS,
  FOOTER_ROWS,
  FOOTER_ANCHOR_OFFSET,
  type RenderView,
  type FrameGeometry,
} from './render-coordinator.js';
