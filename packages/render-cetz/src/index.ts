export { CetzCanvas } from "./cetz-canvas.js";
export {
  createContext,
  formatPoint,
  mapLength,
  mapPoint,
  roundInteger,
  roundNumber,
  unmapPoint,
  type ConversionContext,
  type ElementFrame,
  type MappedPoint,
} from "./coordinate-transform.js";
export {
  DEFAULT_MARKER,
  STOCK_MARKERS,
  resolveMark,
  serializeMarkers,
  type MarkStyle,
} from "./markers.js";
export {
  formatPaint,
  resolvePaint,
  type GradientStop,
  type PaintInput,
  type PaintValue,
} from "./paint.js";
export { assemblePath, formatGroup, type ShapeSegmentGroup } from "./path-assembler.js";
export { convertElement, convertSelection } from "./render-cetz.js";
export { renderCircle, renderEllipse } from "./renderers/circle-renderer.js";
export { renderPath } from "./renderers/path-renderer.js";
export { renderRect } from "./renderers/rect-renderer.js";
export { renderText, textAngle, typstBody } from "./renderers/text-renderer.js";
export {
  fontName,
  serializeStyle,
  strokeBeforeFill,
  type StyleOptions,
} from "./style-serializer.js";
export { escapeTypst, indent, typstString } from "./utils.js";
