export * from "./types/config.js";
export * from "./types/geometry.js";
export * from "./types/result.js";
export {
  parseConfig,
  resolveOptions,
  validateConfig,
} from "./parser/config-parser.js";
export { parseColor, toHexByte, type RgbColor } from "./parser/color.js";
export {
  parseLength,
  toDimensional,
  toUserUnit,
  type LengthUnit,
} from "./parser/length.js";
export { parseTransform } from "./parser/transform.js";
export {
  attr,
  childElements,
  findById,
  hrefReference,
  tagName,
  urlReference,
} from "./document/dom.js";
export {
  computeStopStyle,
  computeStyle,
  parseInlineStyle,
  type ComputedStyle,
  type PaintRef,
  type StopStyle,
} from "./document/style.js";
export {
  SceneElement,
  textContent,
  type SceneShape,
  type TextShape,
  type UnsupportedShape,
} from "./document/scene-element.js";
export { SceneDocument } from "./document/svg-document.js";
export {
  IDENTITY,
  applyToPoint,
  hasNonUniformScale,
  hasShearOrRotation,
  multiply,
  scale,
} from "./geometry/matrix.js";
export { normalizeElement, normalizePath } from "./geometry/normalize.js";
export { circleFrom3Points, sampleAnchors, type Circle } from "./geometry/circle-fit.js";
export { pathBounds, toBoundingBox, unionBoxes } from "./geometry/bounds.js";
export {
  GeometricBoundsQuery,
  querySelectionBoxes,
  type BoundingBoxQuery,
  type SelectionBoxes,
} from "./query/bounding-box-query.js";
