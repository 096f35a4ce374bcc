/**
 * Chat request/response entities
 */
export interface AskRequest {
  userId: string;
  threadId?: string;
  question: string;
}

export interface AskResult {
  response: string;
  images: string[];
}
