import { ConversationTurn, ThreadSummary } from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 *
 * Turns are stored one record each. Lookups never fail for an unknown user;
 * they return an empty list.
 */
export interface IConversationRepository {
  saveTurn(turn: ConversationTurn): Promise<void>;

  /**
   * Turns of a user, most recent first. Without a threadId every turn of
   * the user is returned.
   */
  getHistory(userId: string, threadId?: string): Promise<ConversationTurn[]>;

  /**
   * Threads of a user, most recently active first
   */
  listThreads(userId: string): Promise<ThreadSummary[]>;

  close(): Promise<void>;
}
