import {
  IndexedPage,
  SearchDocument,
  SearchIndexDefinition,
  UploadResult,
} from '../entities/Search.js';

/**
 * Interface for vector queries against the page index
 */
export interface IVectorSearchClient {
  /**
   * Nearest pages to a vector, at most k, in the order the index ranks them
   */
  search(vector: number[], k: number): Promise<SearchDocument[]>;
}

/**
 * Interface for index management, used by ingestion
 */
export interface ISearchIndexClient {
  indexExists(name: string): Promise<boolean>;

  createIndex(definition: SearchIndexDefinition): Promise<void>;

  uploadDocuments(pages: IndexedPage[]): Promise<UploadResult[]>;
}
