export const SVG_NS = "http://www.w3.org/2000/svg";
export const INKSCAPE_NS = "http://www.inkscape.org/namespaces/inkscape";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export function isTextNode(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

/** Element children in document order. */
export function childElements(node: Node): Element[] {
  const children: Element[] = [];
  const nodes = node.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const child = nodes.item(i);
    if (isElement(child)) children.push(child);
  }
  return children;
}

/** The parent when it is an element, `undefined` at the document root. */
export function parentElement(node: Element): Element | undefined {
  const parent = node.parentNode;
  return isElement(parent) ? parent : undefined;
}

/** Depth-first search for the element with the given id. */
export function findById(node: Element, id: string): Element | undefined {
  if (attr(node, "id") === id) return node;
  for (const child of childElements(node)) {
    const found = findById(child, id);
    if (found) return found;
  }
  return undefined;
}

/**
 * Read an attribute, treating a missing attribute and an empty value
 * alike (xmldom returns `""` for both).
 */
export function attr(node: Element, name: string): string | undefined {
  if (!node.hasAttribute(name)) return undefined;
  const value = node.getAttribute(name);
  return value === null || value === "" ? undefined : value;
}

/** Local tag name, e.g. `rect` for both `<rect>` and `<svg:rect>`. */
export function tagName(node: Element): string {
  return node.localName ?? node.nodeName;
}

/** True for elements in the SVG namespace, or in no namespace at all. */
export function isSvgElement(node: Element): boolean {
  return node.namespaceURI === null || node.namespaceURI === SVG_NS;
}

/** Target id of a `url(#id)` reference. */
export function urlReference(value: string): string | undefined {
  const match = value.trim().match(/^url\(\s*['"]?#([^'")\s]+)['"]?\s*\)/);
  return match ? match[1] : undefined;
}

/** Target id of an `href` / `xlink:href="#id"` attribute. */
export function hrefReference(node: Element): string | undefined {
  const href = attr(node, "href") ?? attr(node, "xlink:href");
  if (!href || !href.startsWith("#")) return undefined;
  return href.slice(1);
}
