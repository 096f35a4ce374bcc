/**
 * Interface for the embedding model
 */
export interface IEmbeddingClient {
  /**
   * Embed a text into a vector of the configured dimension
   */
  embed(text: string): Promise<number[]>;
}
