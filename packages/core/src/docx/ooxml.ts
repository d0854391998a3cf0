/**
 * WordprocessingML namespaces and DOM helpers shared by the document model.
 *
 * Only DOM Level 2 APIs are used here because @xmldom/xmldom implements
 * those and nothing newer (no `children`, `remove()` or `querySelector`).
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';

export const NS = {
  W: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
  R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  WP: 'http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing',
  A: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  PIC: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
  PKG_REL: 'http://schemas.openxmlformats.org/package/2006/relationships',
  CONTENT_TYPES: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

export const REL_TYPE = {
  OFFICE_DOCUMENT: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  HEADER: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/header',
  FOOTER: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/footer',
  IMAGE: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image',
} as const;

const ELEMENT_NODE = 1;

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

/**
 * Schema order of <w:pPr> children; Word rejects out-of-order properties
 */
export const PPR_ORDER = [
  'pStyle', 'keepNext', 'keepLines', 'pageBreakBefore', 'framePr', 'widowControl',
  'numPr', 'suppressLineNumbers', 'pBdr', 'shd', 'tabs', 'suppressAutoHyphens',
  'kinsoku', 'wordWrap', 'overflowPunct', 'topLinePunct', 'autoSpaceDE', 'autoSpaceDN',
  'bidi', 'adjustRightInd', 'snapToGrid', 'spacing', 'ind', 'contextualSpacing',
  'mirrorIndents', 'suppressOverlap', 'jc', 'textDirection', 'textAlignment',
  'textboxTightWrap', 'outlineLvl', 'divId', 'cnfStyle', 'rPr', 'sectPr', 'pPrChange',
];

/**
 * Schema order of <w:rPr> children
 */
export const RPR_ORDER = [
  'rStyle', 'rFonts', 'b', 'bCs', 'i', 'iCs', 'caps', 'smallCaps', 'strike', 'dstrike',
  'outline', 'shadow', 'emboss', 'imprint', 'noProof', 'snapToGrid', 'vanish', 'webHidden',
  'color', 'spacing', 'w', 'kern', 'position', 'sz', 'szCs', 'highlight', 'u', 'effect',
  'bdr', 'shd', 'fitText', 'vertAlign', 'rtl', 'cs', 'em', 'lang', 'eastAsianLayout',
  'specVanish', 'oMath',
];

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

/**
 * Parse an XML part, throwing on malformed input
 */
export function parseXml(xml: string, partName: string): Document {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => { errors.push(msg); },
      fatalError: (msg: string) => { errors.push(msg); },
    },
  });
  const doc = parser.parseFromString(xml, 'application/xml');
  if (errors.length > 0 || !doc || !doc.documentElement) {
    throw new Error(`Malformed XML in ${partName}: ${errors[0] ?? 'no root element'}`);
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  const xml = new XMLSerializer().serializeToString(doc);
  return xml.startsWith('<?xml') ? xml : `${XML_DECLARATION}\n${xml}`;
}

/**
 * Direct element children, optionally filtered by namespace and local name
 */
export function childElements(parent: Node, ns?: string, localName?: string): Element[] {
  const result: Element[] = [];
  for (let node = parent.firstChild; node !== null; node = node.nextSibling) {
    if (!isElement(node)) continue;
    if (ns !== undefined && node.namespaceURI !== ns) continue;
    if (localName !== undefined && node.localName !== localName) continue;
    result.push(node);
  }
  return result;
}

export function firstChildElement(parent: Node, ns: string, localName: string): Element | null {
  for (let node = parent.firstChild; node !== null; node = node.nextSibling) {
    if (isElement(node) && node.namespaceURI === ns && node.localName === localName) {
      return node;
    }
  }
  return null;
}

export function createW(doc: Document, localName: string): Element {
  return doc.createElementNS(NS.W, `w:${localName}`);
}

export function getWAttr(el: Element, localName: string): string | null {
  const value = el.getAttributeNS(NS.W, localName);
  if (value !== null && value !== '') return value;
  return el.getAttribute(`w:${localName}`) || null;
}

export function setWAttr(el: Element, localName: string, value: string): void {
  el.setAttributeNS(NS.W, `w:${localName}`, value);
}

/**
 * Get the w:* child named `localName`, creating it at its schema position
 */
export function ensureOrderedChild(parent: Element, localName: string, order: readonly string[]): Element {
  const existing = firstChildElement(parent, NS.W, localName);
  if (existing) return existing;

  const created = createW(parent.ownerDocument, localName);
  const rank = order.indexOf(localName);
  const before = childElements(parent).find(child => {
    const childRank = child.namespaceURI === NS.W ? order.indexOf(child.localName) : -1;
    return childRank > rank;
  });
  parent.insertBefore(created, before ?? null);
  return created;
}

/**
 * Get or create the properties element (w:pPr / w:rPr) that must be
 * the first child of its owner
 */
export function ensureLeadingChild(owner: Element, localName: string): Element {
  const existing = firstChildElement(owner, NS.W, localName);
  if (existing) return existing;
  const created = createW(owner.ownerDocument, localName);
  owner.insertBefore(created, owner.firstChild);
  return created;
}

export function removeChildElement(parent: Element, ns: string, localName: string): void {
  for (const child of childElements(parent, ns, localName)) {
    parent.removeChild(child);
  }
}

export function insertAfter(newNode: Node, reference: Node): void {
  const parent = reference.parentNode;
  if (!parent) {
    throw new Error('Cannot insert after a detached node');
  }
  parent.insertBefore(newNode, reference.nextSibling);
}

/**
 * Resolve a relationship target against the directory of its source part
 */
export function resolvePartName(sourcePart: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  const segments = sourcePart.split('/').slice(0, -1);
  for (const piece of target.split('/')) {
    if (piece === '..') segments.pop();
    else if (piece !== '.' && piece !== '') segments.push(piece);
  }
  return segments.join('/');
}

/**
 * Name of the .rels part that belongs to `partName`
 */
export function relsPartName(partName: string): string {
  const slash = partName.lastIndexOf('/');
  const dir = slash >= 0 ? partName.slice(0, slash + 1) : '';
  const base = partName.slice(slash + 1);
  return `${dir}_rels/${base}.rels`;
}
