/**
 * A <w:r> element: text plus character formatting, optionally carrying
 * an inline picture.
 */

import type { RunFormat, TextRun } from '../types/index.js';
import type { MediaFile, XmlPart } from './DocxPackage.js';
import {
  NS,
  RPR_ORDER,
  childElements,
  createW,
  ensureLeadingChild,
  ensureOrderedChild,
  firstChildElement,
  getWAttr,
  insertAfter,
  parseXml,
  setWAttr,
} from './ooxml.js';

const EMU_PER_INCH = 914400;

export class Run implements TextRun {
  readonly element: Element;
  readonly part: XmlPart;

  constructor(element: Element, part: XmlPart) {
    this.element = element;
    this.part = part;
  }

  /**
   * Run text: <w:t> content, <w:tab/> as "\t", <w:br/> and <w:cr/> as "\n"
   */
  get text(): string {
    return this.textElements().map(textOf).join('');
  }

  /**
   * Replace the run's text content. The new text takes the place of the
   * old text; properties and drawings keep their position.
   */
  set text(value: string) {
    const old = this.textElements();
    const anchor = old[0] ?? null;
    for (const node of createTextElements(this.element.ownerDocument, value)) {
      this.element.insertBefore(node, anchor);
    }
    for (const child of old) {
      this.element.removeChild(child);
    }
  }

  /**
   * Remove the characters in [start, end) without moving anything else
   */
  deleteText(start: number, end: number): void {
    let pos = 0;
    for (const child of this.textElements()) {
      const length = textOf(child).length;
      const from = Math.max(start - pos, 0);
      const to = Math.min(end - pos, length);
      pos += length;
      if (from >= to) continue;

      const kept = child.localName === 't' ? textOf(child).slice(0, from) + textOf(child).slice(to) : '';
      if (kept === '') {
        this.element.removeChild(child);
      } else {
        setTextContent(child, kept);
      }
    }
  }

  get format(): RunFormat {
    const rPr = firstChildElement(this.element, NS.W, 'rPr');
    if (!rPr) return {};

    const format: RunFormat = {};
    const fonts = firstChildElement(rPr, NS.W, 'rFonts');
    const family = fonts ? getWAttr(fonts, 'ascii') ?? getWAttr(fonts, 'hAnsi') : null;
    if (family) format.fontFamily = family;

    const sz = firstChildElement(rPr, NS.W, 'sz');
    const halfPoints = sz ? Number.parseInt(getWAttr(sz, 'val') ?? '', 10) : NaN;
    if (Number.isFinite(halfPoints)) format.sizePt = halfPoints / 2;

    const bold = readToggle(rPr, 'b');
    if (bold !== undefined) format.bold = bold;
    const italic = readToggle(rPr, 'i');
    if (italic !== undefined) format.italic = italic;
    return format;
  }

  setFontFamily(family: string): void {
    const fonts = ensureOrderedChild(this.properties(), 'rFonts', RPR_ORDER);
    for (const attr of ['ascii', 'hAnsi', 'cs', 'eastAsia']) {
      setWAttr(fonts, attr, family);
    }
    fonts.removeAttributeNS(NS.W, 'asciiTheme');
    fonts.removeAttributeNS(NS.W, 'hAnsiTheme');
  }

  setSize(sizePt: number): void {
    const halfPoints = String(Math.round(sizePt * 2));
    const rPr = this.properties();
    setWAttr(ensureOrderedChild(rPr, 'sz', RPR_ORDER), 'val', halfPoints);
    setWAttr(ensureOrderedChild(rPr, 'szCs', RPR_ORDER), 'val', halfPoints);
  }

  setBold(bold: boolean): void {
    writeToggle(this.properties(), 'b', bold);
  }

  setItalic(italic: boolean): void {
    writeToggle(this.properties(), 'i', italic);
  }

  hasPicture(): boolean {
    return firstChildElement(this.element, NS.W, 'drawing') !== null;
  }

  /**
   * Insert an inline picture sized in inches before the character at
   * `offset`, splitting a <w:t> when the offset falls inside it. Defaults
   * to the end of the run.
   */
  addPicture(media: MediaFile, widthInches: number, heightInches: number, offset: number = this.text.length): void {
    const rId = this.part.pkg.addImage(this.part, media);
    const id = this.part.pkg.allocateDrawingId();
    const cx = Math.round(widthInches * EMU_PER_INCH);
    const cy = Math.round(heightInches * EMU_PER_INCH);
    const name = `Picture ${id}`;

    const fragment = parseXml(
      `<w:drawing xmlns:w="${NS.W}" xmlns:wp="${NS.WP}" xmlns:a="${NS.A}" xmlns:pic="${NS.PIC}" xmlns:r="${NS.R}">` +
        '<wp:inline distT="0" distB="0" distL="0" distR="0">' +
          `<wp:extent cx="${cx}" cy="${cy}"/>` +
          '<wp:effectExtent l="0" t="0" r="0" b="0"/>' +
          `<wp:docPr id="${id}" name="${name}"/>` +
          '<wp:cNvGraphicFramePr><a:graphicFrameLocks noChangeAspect="1"/></wp:cNvGraphicFramePr>' +
          `<a:graphic><a:graphicData uri="${NS.PIC}">` +
            '<pic:pic>' +
              `<pic:nvPicPr><pic:cNvPr id="0" name="image${id}.${media.extension}"/><pic:cNvPicPr/></pic:nvPicPr>` +
              `<pic:blipFill><a:blip r:embed="${rId}"/><a:stretch><a:fillRect/></a:stretch></pic:blipFill>` +
              '<pic:spPr>' +
                `<a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm>` +
                '<a:prstGeom prst="rect"><a:avLst/></a:prstGeom>' +
              '</pic:spPr>' +
            '</pic:pic>' +
          '</a:graphicData></a:graphic>' +
        '</wp:inline>' +
      '</w:drawing>',
      `${this.part.name} drawing`,
    );

    const drawing = this.element.ownerDocument.importNode(fragment.documentElement, true);
    this.element.insertBefore(drawing, this.insertionPoint(offset));
  }

  /**
   * The child a node inserted at `offset` goes before. Drawings already at
   * that offset stay after the new node.
   */
  private insertionPoint(offset: number): Element | null {
    let pos = 0;
    for (const child of childElements(this.element)) {
      if (child.namespaceURI === NS.W && child.localName === 'rPr') continue;
      if (pos >= offset) return child;

      const length = isTextElement(child) ? textOf(child).length : 0;
      if (offset < pos + length) {
        const text = textOf(child);
        const suffix = createW(this.element.ownerDocument, 't');
        setTextContent(suffix, text.slice(offset - pos));
        setTextContent(child, text.slice(0, offset - pos));
        insertAfter(suffix, child);
        return suffix;
      }
      pos += length;
    }
    return null;
  }

  private textElements(): Element[] {
    return childElements(this.element, NS.W).filter(isTextElement);
  }

  private properties(): Element {
    return ensureLeadingChild(this.element, 'rPr');
  }
}

const TEXT_ELEMENTS = new Set(['t', 'tab', 'br', 'cr']);

function isTextElement(el: Element): boolean {
  return el.namespaceURI === NS.W && TEXT_ELEMENTS.has(el.localName);
}

function textOf(el: Element): string {
  switch (el.localName) {
    case 't':
      return el.textContent ?? '';
    case 'tab':
      return '\t';
    default:
      return '\n';
  }
}

function setTextContent(t: Element, value: string): void {
  while (t.firstChild) {
    t.removeChild(t.firstChild);
  }
  t.setAttribute('xml:space', 'preserve');
  t.appendChild(t.ownerDocument.createTextNode(value));
}

/**
 * <w:t>, <w:tab/> and <w:br/> elements spelling `value`
 */
function createTextElements(doc: Document, value: string): Element[] {
  const nodes: Element[] = [];
  for (const piece of value.split(/(\t|\n)/)) {
    if (piece === '') continue;
    if (piece === '\t') {
      nodes.push(createW(doc, 'tab'));
    } else if (piece === '\n') {
      nodes.push(createW(doc, 'br'));
    } else {
      const t = createW(doc, 't');
      setTextContent(t, piece);
      nodes.push(t);
    }
  }
  return nodes;
}

function readToggle(rPr: Element, localName: string): boolean | undefined {
  const el = firstChildElement(rPr, NS.W, localName);
  if (!el) return undefined;
  const val = getWAttr(el, 'val');
  return !(val === '0' || val === 'false' || val === 'off');
}

function writeToggle(rPr: Element, localName: string, on: boolean): void {
  const el = ensureOrderedChild(rPr, localName, RPR_ORDER);
  if (on) {
    el.removeAttributeNS(NS.W, 'val');
    el.removeAttribute('w:val');
  } else {
    setWAttr(el, 'val', '0');
  }
  const complex = firstChildElement(rPr, NS.W, `${localName}Cs`);
  if (complex) {
    rPr.removeChild(complex);
  }
}
