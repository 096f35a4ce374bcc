/**
 * Knowledge index entities
 */

/**
 * One page of the manual as stored in the vector index
 */
export interface IndexedPage {
  id: string;
  pageNumber: string;
  pageContent: string;
  vector: number[];
}

/**
 * Raw document returned by a vector query, in index order
 */
export interface SearchDocument {
  pageNumber: string;
  pageContent: string;
  score: number;
}

/**
 * Search document enriched for prompting and presentation
 */
export interface SearchHit extends SearchDocument {
  /** "[doc1]", "[doc2]", ... following index order */
  docRef: string;
  imagePath: string;
}

export interface SearchIndexDefinition {
  name: string;
  dimensions: number;
}

export interface UploadResult {
  key: string;
  succeeded: boolean;
  errorMessage?: string;
}
