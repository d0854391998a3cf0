/**
 * DOCX package access: the ZIP container, XML parts, relationships,
 * content types and embedded media.
 *
 * All XML parts the document model needs are read eagerly in `load()` so
 * that the substitution pass itself runs synchronously over an in-memory
 * tree. `save()` writes back every part that was touched.
 */

import JSZip from 'jszip';

import { InvalidTemplateError } from '../utils/errors.js';
import {
  NS,
  REL_TYPE,
  childElements,
  parseXml,
  relsPartName,
  resolvePartName,
  serializeXml,
} from './ooxml.js';

export interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

const EMPTY_RELS =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
  `<Relationships xmlns="${NS.PKG_REL}"></Relationships>`;

/**
 * Relationships (.rels) of one source part
 */
export class Relationships {
  readonly partName: string;
  private readonly dom: Document;
  private dirty = false;

  constructor(partName: string, dom: Document) {
    this.partName = partName;
    this.dom = dom;
  }

  static empty(partName: string): Relationships {
    return new Relationships(partName, parseXml(EMPTY_RELS, partName));
  }

  list(): Relationship[] {
    return childElements(this.dom.documentElement, NS.PKG_REL, 'Relationship').map(el => ({
      id: el.getAttribute('Id') || '',
      type: el.getAttribute('Type') || '',
      target: el.getAttribute('Target') || '',
      external: el.getAttribute('TargetMode') === 'External',
    }));
  }

  get(id: string): Relationship | undefined {
    return this.list().find(rel => rel.id === id);
  }

  /**
   * Add a relationship and return its new rId
   */
  add(type: string, target: string): string {
    const used = new Set(this.list().map(rel => rel.id));
    let n = used.size + 1;
    while (used.has(`rId${n}`)) n++;
    const id = `rId${n}`;

    const el = this.dom.createElementNS(NS.PKG_REL, 'Relationship');
    el.setAttribute('Id', id);
    el.setAttribute('Type', type);
    el.setAttribute('Target', target);
    this.dom.documentElement.appendChild(el);
    this.dirty = true;
    return id;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  toXml(): string {
    return serializeXml(this.dom);
  }
}

/**
 * A parsed XML part together with its relationships
 */
export class XmlPart {
  readonly name: string;
  readonly dom: Document;
  readonly rels: Relationships;
  readonly pkg: DocxPackage;

  constructor(pkg: DocxPackage, name: string, dom: Document, rels: Relationships) {
    this.pkg = pkg;
    this.name = name;
    this.dom = dom;
    this.rels = rels;
  }

  /**
   * Relationship target of `rId`, resolved to a package part name
   */
  resolveTarget(rId: string): string | undefined {
    const rel = this.rels.get(rId);
    if (!rel || rel.external) return undefined;
    return resolvePartName(this.name, rel.target);
  }
}

/**
 * A media file to embed in the package
 */
export interface MediaFile {
  data: Buffer;
  extension: string;
  contentType: string;
}

/**
 * In-memory DOCX package
 */
export class DocxPackage {
  private readonly zip: JSZip;
  private readonly contentTypes: Document;
  private readonly parts = new Map<string, XmlPart>();
  private contentTypesDirty = false;
  private mainPartName = '';
  private nextDrawingId = 0;

  private constructor(zip: JSZip, contentTypes: Document) {
    this.zip = zip;
    this.contentTypes = contentTypes;
  }

  /**
   * Open a DOCX and read the main document part plus every header and
   * footer part it references
   */
  static async load(bytes: Uint8Array): Promise<DocxPackage> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (error) {
      throw new InvalidTemplateError('not a ZIP archive', error);
    }

    const contentTypesXml = await zip.file('[Content_Types].xml')?.async('string');
    if (!contentTypesXml) {
      throw new InvalidTemplateError('[Content_Types].xml is missing');
    }

    const pkg = new DocxPackage(zip, DocxPackage.parse(contentTypesXml, '[Content_Types].xml'));

    const rootRelsXml = await zip.file('_rels/.rels')?.async('string');
    const rootRels = rootRelsXml
      ? new Relationships('_rels/.rels', DocxPackage.parse(rootRelsXml, '_rels/.rels'))
      : Relationships.empty('_rels/.rels');
    const officeDocument = rootRels.list().find(rel => rel.type === REL_TYPE.OFFICE_DOCUMENT);
    pkg.mainPartName = officeDocument ? resolvePartName('', officeDocument.target) : 'word/document.xml';

    const main = await pkg.loadPart(pkg.mainPartName);
    if (!main) {
      throw new InvalidTemplateError(`main document part ${pkg.mainPartName} is missing`);
    }

    for (const rel of main.rels.list()) {
      if (rel.external || (rel.type !== REL_TYPE.HEADER && rel.type !== REL_TYPE.FOOTER)) continue;
      await pkg.loadPart(resolvePartName(main.name, rel.target));
    }

    pkg.nextDrawingId = pkg.maxDrawingId() + 1;
    return pkg;
  }

  private static parse(xml: string, partName: string): Document {
    try {
      return parseXml(xml, partName);
    } catch (error) {
      throw new InvalidTemplateError(error instanceof Error ? error.message : String(error), error);
    }
  }

  private async loadPart(name: string): Promise<XmlPart | undefined> {
    const cached = this.parts.get(name);
    if (cached) return cached;

    const xml = await this.zip.file(name)?.async('string');
    if (xml === undefined) return undefined;

    const relsName = relsPartName(name);
    const relsXml = await this.zip.file(relsName)?.async('string');
    const rels = relsXml
      ? new Relationships(relsName, DocxPackage.parse(relsXml, relsName))
      : Relationships.empty(relsName);

    const part = new XmlPart(this, name, DocxPackage.parse(xml, name), rels);
    this.parts.set(name, part);
    return part;
  }

  get mainPart(): XmlPart {
    const part = this.parts.get(this.mainPartName);
    if (!part) {
      throw new InvalidTemplateError(`main document part ${this.mainPartName} is not loaded`);
    }
    return part;
  }

  /**
   * A part loaded by `load()`, if any
   */
  getPart(name: string): XmlPart | undefined {
    return this.parts.get(name);
  }

  /**
   * Store a media file next to the main part and relate it from `source`.
   * Returns the relationship id to reference from a <a:blip>.
   */
  addImage(source: XmlPart, media: MediaFile): string {
    this.registerDefaultContentType(media.extension, media.contentType);

    let n = 1;
    while (this.zip.file(`word/media/image${n}.${media.extension}`)) n++;
    const partName = `word/media/image${n}.${media.extension}`;
    this.zip.file(partName, media.data);

    return source.rels.add(REL_TYPE.IMAGE, relativeTarget(source.name, partName));
  }

  /**
   * Allocate a document-wide unique id for <wp:docPr>
   */
  allocateDrawingId(): number {
    return this.nextDrawingId++;
  }

  private maxDrawingId(): number {
    let max = 0;
    for (const part of this.parts.values()) {
      const docPrs = part.dom.getElementsByTagNameNS(NS.WP, 'docPr');
      for (let i = 0; i < docPrs.length; i++) {
        const id = Number.parseInt(docPrs[i].getAttribute('id') || '0', 10);
        if (Number.isFinite(id) && id > max) max = id;
      }
    }
    return max;
  }

  private registerDefaultContentType(extension: string, contentType: string): void {
    const root = this.contentTypes.documentElement;
    const known = childElements(root, NS.CONTENT_TYPES, 'Default')
      .some(el => (el.getAttribute('Extension') || '').toLowerCase() === extension.toLowerCase());
    if (known) return;

    const el = this.contentTypes.createElementNS(NS.CONTENT_TYPES, 'Default');
    el.setAttribute('Extension', extension);
    el.setAttribute('ContentType', contentType);
    root.insertBefore(el, root.firstChild);
    this.contentTypesDirty = true;
  }

  /**
   * Serialize every loaded part back into the archive
   */
  async save(): Promise<Buffer> {
    for (const part of this.parts.values()) {
      this.zip.file(part.name, serializeXml(part.dom));
      if (part.rels.isDirty()) {
        this.zip.file(part.rels.partName, part.rels.toXml());
      }
    }
    if (this.contentTypesDirty) {
      this.zip.file('[Content_Types].xml', serializeXml(this.contentTypes));
    }

    return this.zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}

function relativeTarget(sourcePart: string, targetPart: string): string {
  const sourceDir = sourcePart.split('/').slice(0, -1);
  const target = targetPart.split('/');
  let common = 0;
  while (common < sourceDir.length && common < target.length - 1 && sourceDir[common] === target[common]) {
    common++;
  }
  const ups = sourceDir.slice(common).map(() => '..');
  return [...ups, ...target.slice(common)].join('/');
}
