import {
  DEFAULT_OPTIONS,
  SceneDocument,
  ok,
  toBoundingBox,
  toUserUnit,
  type BoundingBoxQuery,
  type BoxXYWH,
  type ConversionOptions,
  type Result,
  type SceneElement,
} from "@svg2cetz/core";
import { createContext, type ConversionContext } from "../src/coordinate-transform.js";

/** Centimetres in document pixels. */
export function cm(value: number): number {
  return toUserUnit(value, "cm");
}

export function svg(body: string, rootAttrs = ""): SceneDocument {
  return SceneDocument.parse(
    `<svg xmlns="http://www.w3.org/2000/svg" xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape" ${rootAttrs}>${body}</svg>`,
  );
}

export function elementOf(doc: SceneDocument, id: string): SceneElement {
  const node = doc.getElementById(id);
  if (!node) throw new Error(`missing #${id}`);
  return doc.wrap(node);
}

/** Context whose selection box is the given box, in pixels. */
export function contextFor(
  box: BoxXYWH,
  options: Partial<ConversionOptions> = {},
  viewBoxScale = 1,
): ConversionContext {
  return createContext({ ...DEFAULT_OPTIONS, ...options }, toBoundingBox(box), viewBoxScale);
}

/** Returns fixed boxes, standing in for a renderer. */
export class FixedQuery implements BoundingBoxQuery {
  readonly calls: string[][] = [];

  constructor(private readonly boxes: Record<string, BoxXYWH>) {}

  queryBoundingBoxes(ids: readonly string[]): Result<Map<string, BoxXYWH>> {
    this.calls.push([...ids]);
    const found = new Map<string, BoxXYWH>();
    for (const id of ids) {
      const box = this.boxes[id];
      if (box) found.set(id, box);
    }
    return ok(found);
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`[${result.error.code}] ${result.error.message}`);
  return result.value;
}
