import path from 'path';
import { IEmbeddingClient } from '../../core/interfaces/IEmbeddingClient.js';
import { IVectorSearchClient } from '../../core/interfaces/IVectorSearchClient.js';
import { SearchHit } from '../../core/entities/Search.js';

/** Pages retrieved per question */
export const NEAREST_NEIGHBOUR_COUNT = 3;

export const IMAGE_EXTENSION = '.jpg';

/**
 * Image path for a page label, e.g. "Page_12" -> "output_images/page_12.jpg".
 * Naming convention only; the file is not checked.
 */
export function pageImagePath(imageDir: string, pageNumber: string): string {
  return path.posix.join(imageDir, `${pageNumber.toLowerCase()}${IMAGE_EXTENSION}`);
}

/**
 * URL path the image directory is served under, so that every path from
 * pageImagePath resolves against the server root.
 */
export function imageMountPath(imageDir: string): string {
  return `/${path.posix.normalize(imageDir).replace(/^\/+|\/+$/g, '')}`;
}

/**
 * Vector retrieval of manual pages for a question
 */
export class RetrievalService {
  constructor(
    private embeddingClient: IEmbeddingClient,
    private searchClient: IVectorSearchClient,
    private imageDir: string
  ) {}

  async embedQuery(question: string): Promise<number[]> {
    return this.embeddingClient.embed(question);
  }

  /**
   * Label hits in the order the index returned them
   */
  async searchByVector(vector: number[]): Promise<SearchHit[]> {
    const documents = await this.searchClient.search(vector, NEAREST_NEIGHBOUR_COUNT);

    return documents.slice(0, NEAREST_NEIGHBOUR_COUNT).map((doc, index) => ({
      docRef: `[doc${index + 1}]`,
      pageNumber: doc.pageNumber,
      pageContent: doc.pageContent,
      score: doc.score,
      imagePath: pageImagePath(this.imageDir, doc.pageNumber),
    }));
  }
}
