/**
 * A <w:p> element: ordered runs plus paragraph layout properties.
 */

import type { ParagraphFormat, RunFormat } from '../types/index.js';
import type { XmlPart } from './DocxPackage.js';
import { Run } from './Run.js';
import {
  NS,
  PPR_ORDER,
  childElements,
  createW,
  ensureLeadingChild,
  ensureOrderedChild,
  firstChildElement,
  getWAttr,
  insertAfter,
  isElement,
  removeChildElement,
  setWAttr,
} from './ooxml.js';

const SINGLE_LINE = 240;                 // w:spacing/@w:line for single spacing
const RUN_CONTAINERS = new Set(['hyperlink', 'smartTag']);

export class Paragraph {
  readonly element: Element;
  readonly part: XmlPart;

  constructor(element: Element, part: XmlPart) {
    this.element = element;
    this.part = part;
  }

  /**
   * Runs in document order: direct <w:r> children and runs nested in
   * hyperlinks or smart tags
   */
  get runs(): Run[] {
    const runs: Run[] = [];
    for (const child of childElements(this.element, NS.W)) {
      if (child.localName === 'r') {
        runs.push(new Run(child, this.part));
      } else if (RUN_CONTAINERS.has(child.localName)) {
        for (const nested of childElements(child, NS.W, 'r')) {
          runs.push(new Run(nested, this.part));
        }
      }
    }
    return runs;
  }

  /**
   * Logical text: the concatenation of all run texts
   */
  get text(): string {
    return this.runs.map(run => run.text).join('');
  }

  /**
   * Append a run with the given text and formatting
   */
  addRun(text: string = '', format: RunFormat = {}): Run {
    const element = createW(this.element.ownerDocument, 'r');
    this.element.appendChild(element);
    const run = new Run(element, this.part);
    if (format.fontFamily !== undefined) run.setFontFamily(format.fontFamily);
    if (format.sizePt !== undefined) run.setSize(format.sizePt);
    if (format.bold !== undefined) run.setBold(format.bold);
    if (format.italic !== undefined) run.setItalic(format.italic);
    run.text = text;
    return run;
  }

  /**
   * Remove all content except the paragraph properties
   */
  clearContent(): void {
    for (const child of childElements(this.element)) {
      if (child.namespaceURI === NS.W && child.localName === 'pPr') continue;
      this.element.removeChild(child);
    }
  }

  /**
   * Insert an empty sibling paragraph right after this one. It copies this
   * paragraph's properties, without section properties or revision marks.
   */
  insertParagraphAfter(): Paragraph {
    const element = createW(this.element.ownerDocument, 'p');
    const pPr = firstChildElement(this.element, NS.W, 'pPr');
    if (pPr) {
      const copy = pPr.cloneNode(true);
      if (isElement(copy)) {
        removeChildElement(copy, NS.W, 'sectPr');
        removeChildElement(copy, NS.W, 'pPrChange');
        element.appendChild(copy);
      }
    }
    insertAfter(element, this.element);
    return new Paragraph(element, this.part);
  }

  get format(): ParagraphFormat {
    const pPr = firstChildElement(this.element, NS.W, 'pPr');
    if (!pPr) return {};

    const format: ParagraphFormat = {};
    const spacing = firstChildElement(pPr, NS.W, 'spacing');
    if (spacing) {
      const line = readInt(spacing, 'line');
      const rule = getWAttr(spacing, 'lineRule');
      if (line !== undefined && (rule === null || rule === 'auto')) format.lineSpacing = line / SINGLE_LINE;
      const after = readInt(spacing, 'after');
      if (after !== undefined) format.spaceAfterPt = after / 20;
    }

    const ind = firstChildElement(pPr, NS.W, 'ind');
    if (ind) {
      const left = readInt(ind, 'left') ?? readInt(ind, 'start');
      if (left !== undefined) format.leftIndentTwips = left;
      const hanging = readInt(ind, 'hanging');
      if (hanging !== undefined) format.hangingIndentTwips = hanging;
    }

    const jc = firstChildElement(pPr, NS.W, 'jc');
    const justification = jc ? getWAttr(jc, 'val') : null;
    if (justification === 'left' || justification === 'center' || justification === 'right' || justification === 'both') {
      format.justification = justification;
    }
    return format;
  }

  /**
   * Write the given layout attributes; attributes left undefined are untouched
   */
  applyFormat(format: ParagraphFormat): void {
    const pPr = ensureLeadingChild(this.element, 'pPr');

    if (format.lineSpacing !== undefined || format.spaceAfterPt !== undefined) {
      const spacing = ensureOrderedChild(pPr, 'spacing', PPR_ORDER);
      if (format.lineSpacing !== undefined) {
        setWAttr(spacing, 'line', String(Math.round(format.lineSpacing * SINGLE_LINE)));
        setWAttr(spacing, 'lineRule', 'auto');
      }
      if (format.spaceAfterPt !== undefined) {
        setWAttr(spacing, 'after', String(Math.round(format.spaceAfterPt * 20)));
        spacing.removeAttributeNS(NS.W, 'afterAutospacing');
      }
    }

    if (format.leftIndentTwips !== undefined || format.hangingIndentTwips !== undefined) {
      const ind = ensureOrderedChild(pPr, 'ind', PPR_ORDER);
      if (format.leftIndentTwips !== undefined) {
        setWAttr(ind, 'left', String(format.leftIndentTwips));
        ind.removeAttributeNS(NS.W, 'start');
      }
      if (format.hangingIndentTwips !== undefined) {
        setWAttr(ind, 'hanging', String(format.hangingIndentTwips));
        ind.removeAttributeNS(NS.W, 'firstLine');
      }
    }

    if (format.justification !== undefined) {
      setWAttr(ensureOrderedChild(pPr, 'jc', PPR_ORDER), 'val', format.justification);
    }
  }
}

function readInt(el: Element, localName: string): number | undefined {
  const raw = getWAttr(el, localName);
  if (raw === null) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}
