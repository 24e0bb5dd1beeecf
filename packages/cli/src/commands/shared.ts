import { readFileSync } from "node:fs";
import {
  GeometricBoundsQuery,
  SceneDocument,
  type BoundingBoxQuery,
  type ConversionError,
  type SceneElement,
} from "@svg2cetz/core";
import { InkscapeBoundsQuery } from "../query/inkscape-query.js";

export interface SelectionOptions {
  id?: string[];
  query?: string;
  inkscape?: string;
}

export function loadDocument(input: string): SceneDocument {
  return SceneDocument.parse(readFileSync(input, "utf-8"));
}

/** The elements named by `--id`, else every top-level shape. */
export function selectElements(
  document: SceneDocument,
  ids: string[] | undefined,
): SceneElement[] {
  return ids && ids.length > 0
    ? document.selectByIds(ids)
    : document.topLevelElements();
}

export function createQuery(
  document: SceneDocument,
  options: SelectionOptions,
): BoundingBoxQuery {
  switch (options.query ?? "geometry") {
    case "geometry":
      return new GeometricBoundsQuery(document);
    case "inkscape":
      return new InkscapeBoundsQuery(document, options.inkscape);
    default:
      throw new Error(
        `Unknown bounding-box query "${options.query}" (expected geometry or inkscape)`,
      );
  }
}

/**
 * Print a conversion error. Informational issues go to stdout and end the
 * run normally; anything else exits with status 1.
 */
export function reportError(error: ConversionError): void {
  if (error.severity === "info") {
    console.log(error.message);
    return;
  }
  const where = error.elementId ? ` (${error.elementId})` : "";
  console.error(`  ✗ [${error.code}] ${error.message}${where}`);
  if (error.suggestion) {
    console.error(`    → ${error.suggestion}`);
  }
  process.exit(1);
}
