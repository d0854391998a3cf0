/**
 * Builds small DOCX packages in memory for tests
 */

import JSZip from 'jszip';

import { DocxDocument } from '../../src/docx/DocxDocument.js';
import type { Paragraph } from '../../src/docx/Paragraph.js';
import { walkDocument } from '../../src/engine/TreeWalker.js';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export interface RunOptions {
  bold?: boolean;
  font?: string;
  sizePt?: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function run(text: string, options: RunOptions = {}): string {
  const props: string[] = [];
  if (options.font) props.push(`<w:rFonts w:ascii="${options.font}" w:hAnsi="${options.font}"/>`);
  if (options.bold) props.push('<w:b/>');
  if (options.sizePt) props.push(`<w:sz w:val="${options.sizePt * 2}"/>`);
  const rPr = props.length > 0 ? `<w:rPr>${props.join('')}</w:rPr>` : '';
  return `<w:r>${rPr}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

/**
 * A paragraph; plain strings become unformatted runs
 */
export function paragraph(...runs: string[]): string {
  const body = runs.map(r => (r.startsWith('<w:r>') || r.startsWith('<w:hyperlink') ? r : run(r))).join('');
  return `<w:p>${body}</w:p>`;
}

export function paragraphWithProps(pPr: string, ...runs: string[]): string {
  return paragraph(...runs).replace('<w:p>', `<w:p><w:pPr>${pPr}</w:pPr>`);
}

/**
 * A table; each cell is a list of block XML strings
 */
export function table(rows: string[][][]): string {
  const trs = rows
    .map(cells => `<w:tr>${cells.map(blocks => `<w:tc>${blocks.join('')}</w:tc>`).join('')}</w:tr>`)
    .join('');
  return `<w:tbl><w:tblPr/>${trs}</w:tbl>`;
}

export type Variant = 'default' | 'first' | 'even';

export interface DocxFixture {
  body: string;
  headers?: Partial<Record<Variant, string>>;
  footers?: Partial<Record<Variant, string>>;
}

/**
 * Assemble a DOCX with one section. Header and footer contents are block
 * XML for the part body.
 */
export async function buildDocx(fixture: DocxFixture): Promise<Buffer> {
  const zip = new JSZip();
  const overrides: string[] = [
    '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>',
  ];
  const rels: string[] = [];
  const refs: string[] = [];

  let n = 0;
  const addParts = (kind: 'header' | 'footer', parts: Partial<Record<Variant, string>> | undefined): void => {
    for (const variant of ['default', 'first', 'even'] as const) {
      const content = parts?.[variant];
      if (content === undefined) continue;
      n++;
      const name = `${kind}${n}.xml`;
      const root = kind === 'header' ? 'hdr' : 'ftr';
      zip.file(`word/${name}`, `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:${root} xmlns:w="${W_NS}" xmlns:r="${R_NS}">${content}</w:${root}>`);
      overrides.push(`<Override PartName="/word/${name}" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.${kind}+xml"/>`);
      rels.push(`<Relationship Id="rId${n}" Type="${REL}/${kind}" Target="${name}"/>`);
      refs.push(`<w:${kind}Reference w:type="${variant}" r:id="rId${n}"/>`);
    }
  };
  addParts('header', fixture.headers);
  addParts('footer', fixture.footers);

  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      overrides.join('') +
      '</Types>',
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      `<Relationship Id="rId1" Type="${REL}/officeDocument" Target="word/document.xml"/>` +
      '</Relationships>',
  );
  zip.file(
    'word/_rels/document.xml.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${rels.join('')}</Relationships>`,
  );
  zip.file(
    'word/document.xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      `<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${fixture.body}` +
      `<w:sectPr>${refs.join('')}<w:pgSz w:w="12240" w:h="15840"/></w:sectPr>` +
      '</w:body></w:document>',
  );

  return zip.generateAsync({ type: 'nodebuffer' });
}

/**
 * Logical text of every paragraph in walk order
 */
export async function paragraphTexts(bytes: Uint8Array): Promise<string[]> {
  const doc = await DocxDocument.load(bytes);
  const texts: string[] = [];
  walkDocument(doc, p => {
    texts.push(p.text);
  });
  return texts;
}

/**
 * Body paragraphs of a saved document
 */
export async function bodyParagraphs(bytes: Uint8Array): Promise<Paragraph[]> {
  return (await DocxDocument.load(bytes)).paragraphs;
}
