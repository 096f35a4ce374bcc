import { randomUUID } from 'crypto';
import { IEmbeddingClient } from '../../core/interfaces/IEmbeddingClient.js';
import { ISearchIndexClient } from '../../core/interfaces/IVectorSearchClient.js';
import { IPdfReader } from '../../core/interfaces/IPdfReader.js';
import { createLogger, describeError } from '../../utils/logger.js';

const log = createLogger('IngestionService');

export interface IngestionSettings {
  indexName: string;
  dimensions: number;
}

export interface PageUploadOutcome {
  pageNumber: string;
  id: string;
  succeeded: boolean;
  error?: string;
}

export interface IngestionReport {
  indexCreated: boolean;
  pages: PageUploadOutcome[];
  uploaded: number;
  failed: number;
}

export function pageLabel(index: number): string {
  return `Page_${index + 1}`;
}

/**
 * Loads a PDF manual into the vector index, one document per page.
 * A failed page is reported and the run continues; nothing is rolled back.
 */
export class IngestionService {
  constructor(
    private pdfReader: IPdfReader,
    private embeddingClient: IEmbeddingClient,
    private indexClient: ISearchIndexClient,
    private settings: IngestionSettings
  ) {}

  /**
   * Create the index when it does not exist yet. Returns true when created.
   */
  async ensureIndex(): Promise<boolean> {
    if (await this.indexClient.indexExists(this.settings.indexName)) {
      log.info('Index already exists', { index: this.settings.indexName });
      return false;
    }

    log.info('Index not found, creating', { index: this.settings.indexName });
    await this.indexClient.createIndex({
      name: this.settings.indexName,
      dimensions: this.settings.dimensions,
    });
    return true;
  }

  async ingest(pdfPath: string, onPage?: (outcome: PageUploadOutcome) => void): Promise<IngestionReport> {
    const indexCreated = await this.ensureIndex();
    const pageTexts = await this.pdfReader.readPages(pdfPath);
    log.info('PDF extracted', { path: pdfPath, pages: pageTexts.length });

    const pages: PageUploadOutcome[] = [];
    for (const [index, pageContent] of pageTexts.entries()) {
      const outcome = await this.uploadPage(pageLabel(index), pageContent);
      pages.push(outcome);
      onPage?.(outcome);
    }

    const uploaded = pages.filter((page) => page.succeeded).length;
    return { indexCreated, pages, uploaded, failed: pages.length - uploaded };
  }

  private async uploadPage(pageNumber: string, pageContent: string): Promise<PageUploadOutcome> {
    const id = randomUUID();
    try {
      const vector = await this.embeddingClient.embed(pageContent);
      const [result] = await this.indexClient.uploadDocuments([{ id, pageNumber, pageContent, vector }]);

      if (!result || !result.succeeded) {
        const error = result?.errorMessage ?? 'no upload result returned';
        log.warn('Page rejected by index', { pageNumber, error });
        return { pageNumber, id, succeeded: false, error };
      }
      log.debug('Page uploaded', { pageNumber, id });
      return { pageNumber, id, succeeded: true };
    } catch (error) {
      log.error('Page upload failed', { pageNumber, ...describeError(error) });
      return {
        pageNumber,
        id,
        succeeded: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
