import type { BlobStore } from '../storage/BlobStore.js';
import type {
  FillAndStoreRequest,
  FillOptions,
  FillRequest,
  FillResult,
  PlaceholderInventory,
  StoredFillResult,
} from '../types/index.js';
import { ImageDecodeError, StoreFailureError, TemplateNotFoundError } from '../utils/errors.js';
import { LoggingService, getLogger } from '../utils/logger.js';
import { resolveAvailableKey } from './OutputKeyResolver.js';
import { TemplateFiller } from './TemplateFiller.js';

export interface TemplateFillServiceOptions extends FillOptions {
  /** Raise the first image failure instead of returning a partial fill */
  failOnImageError?: boolean;
}

/**
 * Fetch → fill → store around a blob store
 */
export class TemplateFillService {
  private readonly store: BlobStore;
  private readonly filler: TemplateFiller;
  private readonly failOnImageError: boolean;
  private readonly logger: LoggingService;

  constructor(store: BlobStore, options: TemplateFillServiceOptions = {}, logger: LoggingService = getLogger()) {
    this.store = store;
    this.filler = new TemplateFiller(options, logger);
    this.failOnImageError = options.failOnImageError ?? true;
    this.logger = logger;
  }

  /**
   * Fill a stored template. With `failOnImageError` set, the first image
   * failure is raised as an ImageDecodeError carrying the partial result.
   */
  async fill(request: FillRequest): Promise<FillResult> {
    const template = await this.fetchTemplate(request.templateKey);
    const result = await this.filler.fill(template, request.values, request.images);

    const failure = result.report.imageFailures[0];
    if (failure && this.failOnImageError) {
      throw new ImageDecodeError(failure.token, failure.reason, undefined, result);
    }
    return result;
  }

  /**
   * Fill and write the result under the first free key derived from
   * `outputKey`. A failed write raises StoreFailureError carrying the bytes.
   */
  async fillAndStore(request: FillAndStoreRequest): Promise<StoredFillResult> {
    const { bytes, report } = await this.fill(request);
    const outputKey = await resolveAvailableKey(this.store, request.outputKey);

    let outputUrl: string;
    try {
      outputUrl = await this.store.store(bytes, outputKey);
    } catch (error) {
      this.logger.error(`Failed to store ${outputKey}`, error);
      throw new StoreFailureError(outputKey, bytes, error);
    }

    this.logger.info(`Stored filled document at ${outputKey}`);
    return { outputKey, outputUrl, report };
  }

  async listPlaceholders(templateKey: string): Promise<PlaceholderInventory> {
    return this.filler.listPlaceholders(await this.fetchTemplate(templateKey));
  }

  private async fetchTemplate(templateKey: string): Promise<Buffer> {
    let template: Buffer | null;
    try {
      template = await this.store.fetch(templateKey);
    } catch (error) {
      throw new TemplateNotFoundError(templateKey, error);
    }
    if (!template) {
      throw new TemplateNotFoundError(templateKey);
    }
    this.logger.debug(`Fetched template ${templateKey} (${template.length} bytes)`);
    return template;
  }
}
