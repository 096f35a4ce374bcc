import { ChatMessage } from '../templates/types.js';

/**
 * Interface for the chat completion model
 */
export interface ICompletionClient {
  /**
   * Send role-tagged messages and return the generated text
   */
  complete(messages: ChatMessage[]): Promise<string>;
}
