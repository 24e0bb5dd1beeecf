import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { parseLength, parseNumberList } from "../parser/length.js";
import {
  attr,
  childElements,
  findById,
  isSvgElement,
  tagName,
} from "./dom.js";
import { SceneElement } from "./scene-element.js";

/**
 * Set of SVG elements that are definition containers (not visual content).
 * These are never selected and never descended into.
 */
const NON_VISUAL_ELEMENTS = new Set([
  "defs",
  "mask",
  "clippath",
  "filter",
  "symbol",
  "lineargradient",
  "radialgradient",
  "meshgradient",
  "pattern",
  "marker",
  "style",
  "script",
  "title",
  "desc",
  "metadata",
]);

const GROUP_ELEMENTS = new Set(["g", "a"]);

function isVisual(node: Element): boolean {
  return isSvgElement(node) && !NON_VISUAL_ELEMENTS.has(tagName(node).toLowerCase());
}

/**
 * Parsed SVG document: the host scene graph the converter reads from.
 */
export class SceneDocument {
  /** Document pixels per user unit, from `width` against the `viewBox`. */
  readonly viewBoxScale: number;
  private readonly wrappers = new Map<Element, SceneElement>();
  private order: Map<Element, number> | undefined;
  private generatedIds = 0;

  private constructor(
    private readonly doc: Document,
    readonly root: Element,
  ) {
    this.viewBoxScale = computeViewBoxScale(root);
  }

  /**
   * Parse SVG source. Throws a descriptive error if the input is not
   * well-formed XML or has no `<svg>` root.
   */
  static parse(source: string): SceneDocument {
    const problems: string[] = [];
    const parser = new DOMParser({
      errorHandler: {
        error: (msg: string) => problems.push(msg),
        fatalError: (msg: string) => problems.push(msg),
      },
    });
    const doc = parser.parseFromString(source, "image/svg+xml");
    if (problems.length > 0) {
      throw new Error(`Failed to parse SVG:\n  - ${problems.join("\n  - ")}`);
    }

    const root = doc.documentElement;
    if (!root || tagName(root) !== "svg") {
      throw new Error("Failed to parse SVG: the root element is not <svg>");
    }
    return new SceneDocument(doc, root);
  }

  /** Wrap a DOM element, reusing the wrapper (and its cached style). */
  wrap(node: Element): SceneElement {
    let element = this.wrappers.get(node);
    if (!element) {
      element = new SceneElement(node);
      this.wrappers.set(node, element);
    }
    return element;
  }

  getElementById(id: string): Element | undefined {
    return findById(this.root, id);
  }

  /** Every visual child of the root, in document order. */
  topLevelElements(): SceneElement[] {
    return childElements(this.root).filter(isVisual).map((n) => this.wrap(n));
  }

  /**
   * Look up elements by id. Throws on an unknown id.
   */
  selectByIds(ids: readonly string[]): SceneElement[] {
    return ids.map((id) => {
      const node = this.getElementById(id);
      if (!node) throw new Error(`No element with id "${id}"`);
      return this.wrap(node);
    });
  }

  /**
   * Replace groups by their visual descendants and order the result
   * bottom to top (document order), dropping duplicates.
   */
  flatten(selection: readonly SceneElement[]): SceneElement[] {
    const seen = new Set<Element>();
    const leaves: SceneElement[] = [];

    const visit = (node: Element) => {
      if (GROUP_ELEMENTS.has(tagName(node))) {
        for (const child of childElements(node)) {
          if (isVisual(child)) visit(child);
        }
      } else if (!seen.has(node)) {
        seen.add(node);
        leaves.push(this.wrap(node));
      }
    };

    for (const element of selection) visit(element.node);

    const order = this.documentOrder();
    return leaves.sort(
      (a, b) => (order.get(a.node) ?? 0) - (order.get(b.node) ?? 0),
    );
  }

  /**
   * Give every element without an `id` a fresh one, so that each can be
   * named in a bounding-box query.
   */
  ensureIds(elements: readonly SceneElement[]): void {
    for (const element of elements) {
      if (element.id !== "") continue;
      let id: string;
      do {
        this.generatedIds += 1;
        id = `${element.tagName}${this.generatedIds}`;
      } while (this.getElementById(id));
      element.node.setAttribute("id", id);
    }
  }

  toString(): string {
    return new XMLSerializer().serializeToString(this.doc);
  }

  private documentOrder(): Map<Element, number> {
    if (!this.order) {
      const order = new Map<Element, number>();
      const walk = (node: Element) => {
        order.set(node, order.size);
        for (const child of childElements(node)) walk(child);
      };
      walk(this.root);
      this.order = order;
    }
    return this.order;
  }
}

/**
 * Ratio of the root's physical width (in px) to its viewBox width; 1 when
 * either is missing or relative.
 */
function computeViewBoxScale(root: Element): number {
  const viewBox = parseNumberList(attr(root, "viewBox"));
  const width = parseLength(attr(root, "width"));
  if (viewBox.length !== 4 || width === undefined) return 1;
  const viewBoxWidth = viewBox[2];
  if (viewBoxWidth <= 0 || width <= 0) return 1;
  return width / viewBoxWidth;
}
