import { IDENTITY, multiply } from "../geometry/matrix.js";
import { parseLength, parseNumberList } from "../parser/length.js";
import { parseTransform } from "../parser/transform.js";
import type { Matrix, ShapeGeometry } from "../types/geometry.js";
import {
  attr,
  findById,
  isElement,
  isTextNode,
  parentElement,
  tagName,
} from "./dom.js";
import { computeStyle, type ComputedStyle } from "./style.js";

export interface TextShape {
  kind: "text";
  /** Text content, one line per `\n`; an empty line separates paragraphs. */
  content: string;
}

export interface UnsupportedShape {
  kind: "unsupported";
  tagName: string;
}

/**
 * Closed set of element kinds the converter understands, plus an explicit
 * fallback for everything else.
 */
export type SceneShape = ShapeGeometry | TextShape | UnsupportedShape;

/**
 * Handle on one element of a parsed SVG document.
 */
export class SceneElement {
  private cachedStyle: ComputedStyle | undefined;
  private cachedTransform: Matrix | undefined;

  constructor(readonly node: Element) {}

  get tagName(): string {
    return tagName(this.node);
  }

  get id(): string {
    return attr(this.node, "id") ?? "";
  }

  /** Inkscape object label (`inkscape:label`). */
  get label(): string | undefined {
    return attr(this.node, "inkscape:label");
  }

  attr(name: string): string | undefined {
    return attr(this.node, name);
  }

  /** Another element of the same document, by id. */
  lookup(id: string): Element | undefined {
    const root = this.node.ownerDocument.documentElement;
    return root ? findById(root, id) : undefined;
  }

  /** The element's own `transform` attribute. */
  get transform(): Matrix {
    return parseTransform(attr(this.node, "transform"));
  }

  /**
   * The element's transform composed with the transforms of all of its
   * ancestors, mapping its user space into document space.
   */
  get cumulativeTransform(): Matrix {
    if (!this.cachedTransform) {
      let result: Matrix = { ...IDENTITY };
      for (
        let node: Element | undefined = this.node;
        node;
        node = parentElement(node)
      ) {
        if (tagName(node) === "svg" && !parentElement(node)) break;
        result = multiply(parseTransform(attr(node, "transform")), result);
      }
      this.cachedTransform = result;
    }
    return this.cachedTransform;
  }

  /** Cascade-resolved style, computed on first use. */
  style(): ComputedStyle {
    if (!this.cachedStyle) {
      this.cachedStyle = computeStyle(this.node);
    }
    return this.cachedStyle;
  }

  /**
   * Classify the element into one of the supported shape kinds.
   */
  shape(): SceneShape {
    const fontSize = this.style().fontSize;
    const length = (name: string): number =>
      parseLength(this.attr(name), { fontSize }) ?? 0;

    switch (this.tagName) {
      case "rect": {
        const width = length("width");
        const height = length("height");
        let rx = parseLength(this.attr("rx"), { fontSize });
        let ry = parseLength(this.attr("ry"), { fontSize });
        // A missing radius takes the value of the other one
        rx ??= ry ?? 0;
        ry ??= rx;
        return {
          kind: "rect",
          x: length("x"),
          y: length("y"),
          width,
          height,
          rx: Math.min(Math.max(rx, 0), width / 2),
          ry: Math.min(Math.max(ry, 0), height / 2),
        };
      }
      case "circle":
        return { kind: "circle", cx: length("cx"), cy: length("cy"), r: length("r") };
      case "ellipse":
        return {
          kind: "ellipse",
          cx: length("cx"),
          cy: length("cy"),
          rx: length("rx"),
          ry: length("ry"),
        };
      case "path":
        return { kind: "path", source: "path", d: this.attr("d") ?? "" };
      case "line":
        return {
          kind: "path",
          source: "line",
          d: `M ${length("x1")} ${length("y1")} L ${length("x2")} ${length("y2")}`,
        };
      case "polyline":
      case "polygon": {
        const points = parseNumberList(this.attr("points"));
        const pairs: string[] = [];
        for (let i = 0; i + 1 < points.length; i += 2) {
          pairs.push(`${points[i]} ${points[i + 1]}`);
        }
        const closed = this.tagName === "polygon";
        const d =
          pairs.length === 0
            ? ""
            : `M ${pairs.join(" L ")}${closed ? " Z" : ""}`;
        return { kind: "path", source: closed ? "polygon" : "polyline", d };
      }
      case "text":
        return { kind: "text", content: textContent(this.node) };
      default:
        return { kind: "unsupported", tagName: this.tagName };
    }
  }
}

/**
 * Text of a `<text>` element. Every `<tspan sodipodi:role="line">` starts
 * a new line; other tspans continue the current one. Whitespace-only
 * text nodes that contain a line break are formatting and are dropped.
 */
export function textContent(node: Element): string {
  const lines: string[] = [""];
  let first = true;

  const nodes = node.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const child = nodes.item(i);
    if (isElement(child)) {
      const text = child.textContent ?? "";
      if (attr(child, "sodipodi:role") === "line") {
        if (first) {
          lines[lines.length - 1] += text;
        } else {
          lines.push(text);
        }
        first = false;
      } else {
        lines[lines.length - 1] += text;
      }
    } else if (isTextNode(child)) {
      const text = child.nodeValue ?? "";
      if (/^\s*$/.test(text) && text.includes("\n")) continue;
      lines[lines.length - 1] += text;
    }
  }
  return lines.join("\n");
}
