export {
  GLYPH_STYLES,
  DEFAULT_EMPTY_MARKER,
  isGlyphStyle,
  isPerspective,
  render,
  renderDiagram,
} from './board-renderer.js';
export type {
  GlyphStyle,
  Perspective,
  RenderOptions,
  DiagramOptions,
  CellDecorator,
} from './board-renderer.js';
