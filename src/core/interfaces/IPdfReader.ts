/**
 * Interface for PDF text extraction
 */
export interface IPdfReader {
  /**
   * Text of every page in document order, one entry per page
   */
  readPages(pdfPath: string): Promise<string[]>;
}
