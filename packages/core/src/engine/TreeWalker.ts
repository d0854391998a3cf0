/**
 * Visits every paragraph of a document in a fixed order:
 * body paragraphs, body tables (row by row, cell by cell, recursing into
 * nested tables), then the header and footer variants of each section.
 */

import { HEADER_FOOTER_VARIANTS, type DocxDocument, type HeaderFooter } from '../docx/DocxDocument.js';
import type { Paragraph } from '../docx/Paragraph.js';
import type { BlockContainer, Table } from '../docx/Table.js';

export type ParagraphVisitor = (paragraph: Paragraph) => void;

/**
 * Walk the document and return the number of paragraphs visited.
 *
 * Each container's paragraph list is read once before its paragraphs are
 * visited, so paragraphs a visitor inserts are not visited themselves.
 */
export function walkDocument(doc: DocxDocument, visit: ParagraphVisitor): number {
  let visited = walkContainer(doc, visit);

  const seenParts = new Set<string>();
  const walkPart = (headerFooter: HeaderFooter | undefined): void => {
    if (!headerFooter || seenParts.has(headerFooter.part.name)) return;
    seenParts.add(headerFooter.part.name);
    visited += walkContainer(headerFooter, visit);
  };

  for (const section of doc.sections) {
    for (const variant of HEADER_FOOTER_VARIANTS) {
      walkPart(section.header(variant));
    }
    for (const variant of HEADER_FOOTER_VARIANTS) {
      walkPart(section.footer(variant));
    }
  }

  return visited;
}

/**
 * Paragraphs first, then tables
 */
export function walkContainer(container: BlockContainer, visit: ParagraphVisitor): number {
  const paragraphs = container.paragraphs;
  paragraphs.forEach(visit);

  let visited = paragraphs.length;
  for (const table of container.tables) {
    visited += walkTable(table, visit);
  }
  return visited;
}

export function walkTable(table: Table, visit: ParagraphVisitor): number {
  let visited = 0;
  for (const row of table.rows) {
    for (const cell of row.cells) {
      visited += walkContainer(cell, visit);
    }
  }
  return visited;
}
