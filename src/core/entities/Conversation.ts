/**
 * Conversation domain entities
 */

/**
 * One question/answer exchange, stored as its own record
 */
export interface ConversationTurn {
  id: string;
  userId: string;
  threadId: string | null;
  requestText: string;
  responseText: string;
  /** Epoch milliseconds, strictly increasing per user */
  timestamp: number;
  createdAt: string;
}

/**
 * Per-thread overview. The heading is the first request of the thread.
 */
export interface ThreadSummary {
  threadId: string;
  heading: string;
  turnCount: number;
  lastTimestamp: number;
}

/**
 * Legacy history entry returned by POST /getchathistory
 */
export interface ChatHistoryEntry {
  req: string;
  res: string;
}
