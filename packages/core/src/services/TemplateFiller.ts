/**
 * Template Filler
 *
 * Orchestrates one fill: load the package, prepare images, walk every
 * paragraph applying value splices, structured expansions and image
 * insertions, then save. Everything between load and save is synchronous
 * over a tree owned by this call.
 */

import { BODY_FONT, CONTENT_BOX, DEFAULT_IMAGE_WIDTH, IMAGE_TOKEN_PREFIX, IMAGE_WIDTHS, STRUCTURED_TOKENS } from '../constants.js';
import { DocxDocument } from '../docx/DocxDocument.js';
import type { Paragraph } from '../docx/Paragraph.js';
import { normalizeTouchedRuns } from '../engine/FormattingApplier.js';
import { findPlaceholders, inApplicationOrder, scanPlaceholders } from '../engine/PlaceholderScanner.js';
import { buildCharMap } from '../engine/RunTextIndexer.js';
import { cutSpan, spliceRuns } from '../engine/SpliceEngine.js';
import { buildStructuredParagraphs, expandStructuredSection } from '../engine/StructuredSectionExpander.js';
import { walkDocument } from '../engine/TreeWalker.js';
import type {
  CanonicalFont,
  FillOptions,
  FillReport,
  FillResult,
  PlaceholderInventory,
  PlaceholderLookup,
  PreparedImage,
} from '../types/index.js';
import { ImageDecodeError } from '../utils/errors.js';
import { LoggingService, getLogger } from '../utils/logger.js';
import { prepareImages } from './ImagePreparer.js';

type PreparedImages = ReadonlyMap<string, PreparedImage | ImageDecodeError>;

/**
 * Mutable state of one fill pass
 */
interface FillPass {
  lookup: PlaceholderLookup;
  images: PreparedImages;
  font: CanonicalFont;
  report: FillReport;
  unresolved: Set<string>;
}

export class TemplateFiller {
  private readonly options: Required<FillOptions>;
  private readonly logger: LoggingService;

  constructor(options: FillOptions = {}, logger: LoggingService = getLogger()) {
    this.options = {
      bodyFont: options.bodyFont ?? BODY_FONT,
      contentBox: options.contentBox ?? CONTENT_BOX,
      imageWidths: options.imageWidths ?? IMAGE_WIDTHS,
      defaultImageWidth: options.defaultImageWidth ?? DEFAULT_IMAGE_WIDTH,
    };
    this.logger = logger;
  }

  /**
   * Fill a template. Placeholders nobody supplied are left verbatim and
   * listed in the report; an undecodable image leaves its token verbatim
   * and is listed under `imageFailures`.
   */
  async fill(
    templateBytes: Uint8Array,
    values: Readonly<Record<string, string>>,
    images: Readonly<Record<string, string>>,
  ): Promise<FillResult> {
    const doc = await DocxDocument.load(templateBytes);

    const imageEntries = Object.entries(images).filter(([token]) => {
      if (token.startsWith(IMAGE_TOKEN_PREFIX)) return true;
      this.logger.warn(`Ignoring image ${token}: image keys must start with ${IMAGE_TOKEN_PREFIX}`);
      return false;
    });
    const prepared = await prepareImages(Object.fromEntries(imageEntries), this.options);

    const pass: FillPass = {
      lookup: {
        values: new Map(Object.entries(values)),
        imageTokens: new Set(prepared.keys()),
        structuredTokens: STRUCTURED_TOKENS,
      },
      images: prepared,
      font: this.options.bodyFont,
      report: {
        paragraphsVisited: 0,
        valuesReplaced: 0,
        imagesInserted: [],
        sectionsExpanded: [],
        unresolved: [],
        imageFailures: [],
      },
      unresolved: new Set(),
    };

    pass.report.paragraphsVisited = walkDocument(doc, paragraph => {
      const first = this.fillText(paragraph, pass);
      this.fillImages(first, pass);
    });
    pass.report.unresolved = [...pass.unresolved];

    const bytes = await doc.save();

    const { report } = pass;
    this.logger.info(
      `Filled template: ${report.valuesReplaced} values, ${report.imagesInserted.length} images, ` +
        `${report.sectionsExpanded.length} sections, ${report.unresolved.length} unresolved`,
    );
    for (const failure of report.imageFailures) {
      this.logger.warn(`Image ${failure.token} left unfilled: ${failure.reason}`);
    }

    return { bytes, report };
  }

  /**
   * Placeholders a template contains, grouped by the class their name
   * implies. Image tokens are those with the IMAGE_ prefix.
   */
  async listPlaceholders(templateBytes: Uint8Array): Promise<PlaceholderInventory> {
    const doc = await DocxDocument.load(templateBytes);
    const names = new Set<string>();
    walkDocument(doc, paragraph => {
      for (const match of findPlaceholders(paragraph.text)) {
        names.add(match.name);
      }
    });

    const inventory: PlaceholderInventory = { values: [], images: [], structured: [] };
    for (const name of [...names].sort()) {
      if (STRUCTURED_TOKENS[name] !== undefined) {
        inventory.structured.push(name);
      } else if (name.startsWith(IMAGE_TOKEN_PREFIX)) {
        inventory.images.push(name);
      } else {
        inventory.values.push(name);
      }
    }
    return inventory;
  }

  /**
   * Value and structured pass. Returns the paragraph the image pass should
   * see: the paragraph itself, which is also the first paragraph of an
   * expansion.
   */
  private fillText(paragraph: Paragraph, pass: FillPass): Paragraph {
    const text = paragraph.text;
    if (!text.includes('{{')) return paragraph;

    const { resolved, unresolved } = scanPlaceholders(text, pass.lookup);
    for (const match of unresolved) {
      pass.unresolved.add(match.name);
    }

    // An expansion consumes the whole paragraph
    const structured = resolved.find(match => match.kind === 'structured');
    if (structured && structured.kind === 'structured') {
      const specs = buildStructuredParagraphs(structured.section, structured.value);
      expandStructuredSection(paragraph, specs, pass.font);
      pass.report.sectionsExpanded.push(structured.name);
      this.logger.debug(`Expanded ${structured.name} into ${Math.max(specs.length, 1)} paragraphs`);
      return paragraph;
    }

    for (const match of inApplicationOrder(resolved)) {
      if (match.kind !== 'value') continue;
      const runs = paragraph.runs;
      const touched = spliceRuns(runs, buildCharMap(runs), match, match.value);
      normalizeTouchedRuns(runs, touched, pass.font);
      pass.report.valuesReplaced++;
    }
    return paragraph;
  }

  /**
   * Image pass: each image token is cut out and its picture inserted where
   * the token started, inside the run that held its first character
   */
  private fillImages(paragraph: Paragraph, pass: FillPass): void {
    const text = paragraph.text;
    if (!text.includes(`{{${IMAGE_TOKEN_PREFIX}`)) return;

    const { resolved } = scanPlaceholders(text, pass.lookup);
    for (const match of inApplicationOrder(resolved)) {
      if (match.kind !== 'image') continue;

      const image = pass.images.get(match.name);
      if (image === undefined) continue;
      if (image instanceof ImageDecodeError) {
        pass.report.imageFailures.push({ token: image.token, reason: image.reason });
        continue;
      }

      const runs = paragraph.runs;
      const { runIndex, offset } = cutSpan(runs, buildCharMap(runs), match);
      runs[runIndex].addPicture(image, image.size.width, image.size.height, offset);
      pass.report.imagesInserted.push(match.name);

      if (image.size.kind === 'fallback') {
        this.logger.warn(`Image ${match.name} sized with fallback dimensions: ${image.size.reason}`);
      }
    }
  }
}

/**
 * Fill a template with the default options
 */
export function fillDocument(
  templateBytes: Uint8Array,
  values: Readonly<Record<string, string>>,
  images: Readonly<Record<string, string>>,
  options?: FillOptions,
): Promise<FillResult> {
  return new TemplateFiller(options).fill(templateBytes, values, images);
}

export function listPlaceholders(templateBytes: Uint8Array): Promise<PlaceholderInventory> {
  return new TemplateFiller().listPlaceholders(templateBytes);
}
