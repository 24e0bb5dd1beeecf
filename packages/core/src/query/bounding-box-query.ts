import type { SceneElement } from "../document/scene-element.js";
import type { SceneDocument } from "../document/svg-document.js";
import { attr, childElements } from "../document/dom.js";
import { pathBounds, toBoundingBox, unionBoxes } from "../geometry/bounds.js";
import { applyToPoint, multiply, scale } from "../geometry/matrix.js";
import { normalizeElement } from "../geometry/normalize.js";
import { parseNumberList } from "../parser/length.js";
import { fail, ok, type Result } from "../types/result.js";
import type { BoundingBox, BoxXYWH } from "../types/geometry.js";

/**
 * Collaborator answering one batched bounding-box question per run:
 * the box of each element id, in document pixels.
 */
export interface BoundingBoxQuery {
  queryBoundingBoxes(ids: readonly string[]): Result<Map<string, BoxXYWH>>;
}

export interface SelectionBoxes {
  /** Box around every selected element; its bottom-left is the origin. */
  global: BoundingBox;
  perElement: Map<string, BoundingBox>;
}

/**
 * Run the query once for the whole selection and derive the global and
 * per-element boxes. Elements must already carry ids.
 */
export function querySelectionBoxes(
  query: BoundingBoxQuery,
  elements: readonly SceneElement[],
): Result<SelectionBoxes> {
  const ids = elements.map((e) => e.id);
  const answer = query.queryBoundingBoxes(ids);
  if (!answer.ok) return answer;

  const boxes = [...answer.value].filter(([id]) => ids.includes(id));
  const global = unionBoxes(boxes.map(([, box]) => box));
  if (!global) {
    return fail(
      "bounding-box-unavailable",
      "Could not determine the bounding box of selected objects.",
      null,
      "Select at least one visible shape",
    );
  }

  const perElement = new Map<string, BoundingBox>();
  for (const [id, box] of boxes) perElement.set(id, toBoundingBox(box));
  return ok({ global, perElement });
}

// Rough metrics for text when no renderer is available
const AVERAGE_CHAR_WIDTH_EM = 0.55;
const LINE_HEIGHT_EM = 1.25;
const ASCENT_EM = 0.8;

/**
 * In-process query: exact bounds of each element's normalized geometry.
 * Text boxes are estimated from font size and character count. Stroke
 * width is not included. Unsupported elements get no box.
 */
export class GeometricBoundsQuery implements BoundingBoxQuery {
  constructor(private readonly document: SceneDocument) {}

  queryBoundingBoxes(ids: readonly string[]): Result<Map<string, BoxXYWH>> {
    const boxes = new Map<string, BoxXYWH>();
    for (const id of ids) {
      const node = this.document.getElementById(id);
      if (!node) continue;
      const element = this.document.wrap(node);

      if (element.tagName === "text") {
        boxes.set(id, this.textBounds(element));
        continue;
      }

      const path = normalizeElement(element, this.document.viewBoxScale);
      if (!path) continue;
      if (!path.ok) return path;
      const box = pathBounds(path.value);
      if (box) boxes.set(id, box);
    }
    return ok(boxes);
  }

  private textBounds(element: SceneElement): BoxXYWH {
    const style = element.style();
    const shape = element.shape();
    const lines = shape.kind === "text" ? shape.content.split("\n") : [""];
    const fontSize = style.fontSize;

    const anchor = textAnchorPoint(element.node);
    const width = Math.max(...lines.map((l) => l.length)) * fontSize * AVERAGE_CHAR_WIDTH_EM;
    const height = lines.length * fontSize * LINE_HEIGHT_EM;

    const left =
      style.textAnchor === "middle"
        ? anchor.x - width / 2
        : style.textAnchor === "end"
          ? anchor.x - width
          : anchor.x;
    const top = anchor.y - fontSize * ASCENT_EM;

    const m = multiply(scale(this.document.viewBoxScale), element.cumulativeTransform);
    const corners = [
      applyToPoint(m, left, top),
      applyToPoint(m, left + width, top),
      applyToPoint(m, left, top + height),
      applyToPoint(m, left + width, top + height),
    ];
    const xs = corners.map((p) => p.x);
    const ys = corners.map((p) => p.y);
    const x = Math.min(...xs);
    const y = Math.min(...ys);
    return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
  }
}

/** Position of the first glyph: the text's own x/y, else its first tspan's. */
function textAnchorPoint(node: Element): { x: number; y: number } {
  const own = {
    x: parseNumberList(attr(node, "x"))[0],
    y: parseNumberList(attr(node, "y"))[0],
  };
  const span = childElements(node)[0];
  const fallback = span
    ? {
        x: parseNumberList(attr(span, "x"))[0],
        y: parseNumberList(attr(span, "y"))[0],
      }
    : { x: undefined, y: undefined };
  return { x: own.x ?? fallback.x ?? 0, y: own.y ?? fallback.y ?? 0 };
}
