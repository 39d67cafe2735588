import { DOMParser } from "@xmldom/xmldom";

export function parseXmlString(xml: string): Document {
  const problems: string[] = [];
  const record = (message: unknown) => {
    problems.push(String(message));
  };
  const doc = new DOMParser({
    errorHandler: { warning: () => undefined, error: record, fatalError: record },
  }).parseFromString(xml, "text/xml");

  if (problems.length > 0 || !doc || !doc.documentElement) {
    throw new Error(problems[0] ?? "empty XML document");
  }
  return doc;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

export function localNameOf(node: Element): string {
  return node.localName || node.nodeName.replace(/^.*:/, "");
}

/**
 * Descendant elements by local name, in document order. Prefixes vary between
 * producers, so matching ignores them.
 */
export function findAll(root: Document | Element, localName: string): Element[] {
  const out: Element[] = [];
  const all = root.getElementsByTagName("*");
  for (let i = 0; i < all.length; i += 1) {
    const el = all.item(i);
    if (el && localNameOf(el) === localName) {
      out.push(el);
    }
  }
  return out;
}

export function findFirst(root: Document | Element, localName: string): Element | undefined {
  return findAll(root, localName)[0];
}

export function childElements(parent: Element, localName?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i += 1) {
    const node = parent.childNodes.item(i);
    if (node && isElement(node) && (!localName || localNameOf(node) === localName)) {
      out.push(node);
    }
  }
  return out;
}

export const RELATIONSHIP_NS =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

/** Unprefixed attribute. */
export function attr(el: Element, name: string): string | undefined {
  return el.hasAttribute(name) ? el.getAttribute(name) ?? undefined : undefined;
}

/** Attribute in the officeDocument relationships namespace, such as `r:id` or `r:embed`. */
export function relAttr(el: Element, localName: string): string | undefined {
  for (let i = 0; i < el.attributes.length; i += 1) {
    const attribute = el.attributes.item(i);
    if (!attribute) {
      continue;
    }
    const matchesNs = attribute.namespaceURI === RELATIONSHIP_NS && attribute.localName === localName;
    if (matchesNs || attribute.name === `r:${localName}`) {
      return attribute.value;
    }
  }
  return undefined;
}

export function numericAttr(el: Element | undefined, localName: string): number | undefined {
  if (!el) {
    return undefined;
  }
  const raw = attr(el, localName);
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
