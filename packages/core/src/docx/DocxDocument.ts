/**
 * Document-level view over a DOCX package: body content and sections
 * with their header and footer variants.
 */

import { InvalidTemplateError } from '../utils/errors.js';
import { DocxPackage, type XmlPart } from './DocxPackage.js';
import type { Paragraph } from './Paragraph.js';
import { type BlockContainer, type Table, paragraphsOf, tablesOf } from './Table.js';
import { NS, childElements, firstChildElement, getWAttr } from './ooxml.js';

export type HeaderFooterVariant = 'default' | 'first' | 'even';

export const HEADER_FOOTER_VARIANTS: readonly HeaderFooterVariant[] = ['default', 'first', 'even'];

/**
 * A header or footer part
 */
export class HeaderFooter implements BlockContainer {
  readonly part: XmlPart;
  readonly kind: 'header' | 'footer';
  readonly variant: HeaderFooterVariant;

  constructor(part: XmlPart, kind: 'header' | 'footer', variant: HeaderFooterVariant) {
    this.part = part;
    this.kind = kind;
    this.variant = variant;
  }

  get paragraphs(): Paragraph[] {
    return paragraphsOf(this.part.dom.documentElement, this.part);
  }

  get tables(): Table[] {
    return tablesOf(this.part.dom.documentElement, this.part);
  }
}

/**
 * A <w:sectPr> and the header/footer parts it references
 */
export class Section {
  readonly element: Element;
  private readonly owner: XmlPart;

  constructor(element: Element, owner: XmlPart) {
    this.element = element;
    this.owner = owner;
  }

  header(variant: HeaderFooterVariant): HeaderFooter | undefined {
    return this.reference('header', variant);
  }

  footer(variant: HeaderFooterVariant): HeaderFooter | undefined {
    return this.reference('footer', variant);
  }

  private reference(kind: 'header' | 'footer', variant: HeaderFooterVariant): HeaderFooter | undefined {
    const refName = kind === 'header' ? 'headerReference' : 'footerReference';
    const ref = childElements(this.element, NS.W, refName)
      .find(el => (getWAttr(el, 'type') ?? 'default') === variant);
    if (!ref) return undefined;

    const rId = ref.getAttributeNS(NS.R, 'id') || ref.getAttribute('r:id');
    if (!rId) return undefined;
    const partName = this.owner.resolveTarget(rId);
    const part = partName ? this.owner.pkg.getPart(partName) : undefined;
    return part ? new HeaderFooter(part, kind, variant) : undefined;
  }
}

export class DocxDocument implements BlockContainer {
  readonly pkg: DocxPackage;

  private constructor(pkg: DocxPackage) {
    this.pkg = pkg;
  }

  static async load(bytes: Uint8Array): Promise<DocxDocument> {
    return new DocxDocument(await DocxPackage.load(bytes));
  }

  save(): Promise<Buffer> {
    return this.pkg.save();
  }

  private get body(): Element {
    const body = firstChildElement(this.pkg.mainPart.dom.documentElement, NS.W, 'body');
    if (!body) {
      throw new InvalidTemplateError('document has no <w:body>');
    }
    return body;
  }

  get paragraphs(): Paragraph[] {
    return paragraphsOf(this.body, this.pkg.mainPart);
  }

  get tables(): Table[] {
    return tablesOf(this.body, this.pkg.mainPart);
  }

  /**
   * Sections in document order: every paragraph-level <w:sectPr> followed
   * by the body-level one
   */
  get sections(): Section[] {
    const main = this.pkg.mainPart;
    const sections: Section[] = [];
    for (const p of childElements(this.body, NS.W, 'p')) {
      const pPr = firstChildElement(p, NS.W, 'pPr');
      const sectPr = pPr ? firstChildElement(pPr, NS.W, 'sectPr') : null;
      if (sectPr) sections.push(new Section(sectPr, main));
    }
    const last = firstChildElement(this.body, NS.W, 'sectPr');
    if (last) sections.push(new Section(last, main));
    return sections;
  }
}
