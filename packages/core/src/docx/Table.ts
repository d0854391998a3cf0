import type { XmlPart } from './DocxPackage.js';
import { Paragraph } from './Paragraph.js';
import { NS, childElements } from './ooxml.js';

/**
 * Anything that holds block content: the body, a cell, a header or a footer
 */
export interface BlockContainer {
  readonly paragraphs: Paragraph[];
  readonly tables: Table[];
}

export function paragraphsOf(container: Element, part: XmlPart): Paragraph[] {
  return childElements(container, NS.W, 'p').map(el => new Paragraph(el, part));
}

export function tablesOf(container: Element, part: XmlPart): Table[] {
  return childElements(container, NS.W, 'tbl').map(el => new Table(el, part));
}

export class Table {
  readonly element: Element;
  readonly part: XmlPart;

  constructor(element: Element, part: XmlPart) {
    this.element = element;
    this.part = part;
  }

  get rows(): Row[] {
    return childElements(this.element, NS.W, 'tr').map(el => new Row(el, this.part));
  }
}

export class Row {
  readonly element: Element;
  readonly part: XmlPart;

  constructor(element: Element, part: XmlPart) {
    this.element = element;
    this.part = part;
  }

  /**
   * Cells of this row. A horizontally merged cell is a single <w:tc>, so
   * it is listed once.
   */
  get cells(): Cell[] {
    return childElements(this.element, NS.W, 'tc').map(el => new Cell(el, this.part));
  }
}

export class Cell implements BlockContainer {
  readonly element: Element;
  readonly part: XmlPart;

  constructor(element: Element, part: XmlPart) {
    this.element = element;
    this.part = part;
  }

  get paragraphs(): Paragraph[] {
    return paragraphsOf(this.element, this.part);
  }

  get tables(): Table[] {
    return tablesOf(this.element, this.part);
  }
}
