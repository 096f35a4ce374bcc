import { randomUUID } from 'crypto';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { ChatHistoryEntry, ConversationTurn, ThreadSummary } from '../../core/entities/Conversation.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('ConversationService');

/** Number of recent turns fed back to the model as memory */
export const MEMORY_TURNS = 5;

/**
 * Service for managing conversations
 */
export class ConversationService {
  private lastTimestamps: Map<string, number> = new Map();

  constructor(
    private conversationRepo: IConversationRepository,
    private now: () => number = Date.now
  ) {}

  /**
   * Persist one exchange as a new turn record
   */
  async saveTurn(
    userId: string,
    threadId: string | undefined,
    requestText: string,
    responseText: string
  ): Promise<ConversationTurn> {
    const timestamp = this.nextTimestamp(userId);
    const turn: ConversationTurn = {
      id: randomUUID(),
      userId,
      threadId: threadId ?? null,
      requestText,
      responseText,
      timestamp,
      createdAt: new Date(timestamp).toISOString(),
    };

    await this.conversationRepo.saveTurn(turn);
    log.debug('Turn saved', { userId, threadId: turn.threadId, turnId: turn.id });
    return turn;
  }

  /**
   * Turns of a user (optionally one thread), most recent first
   */
  getHistory(userId: string, threadId?: string): Promise<ConversationTurn[]> {
    return this.conversationRepo.getHistory(userId, threadId);
  }

  /**
   * Request/response pairs across all threads, most recent first
   */
  async getChatHistory(userId: string): Promise<ChatHistoryEntry[]> {
    const turns = await this.conversationRepo.getHistory(userId);
    return turns.map((turn) => ({ req: turn.requestText, res: turn.responseText }));
  }

  listThreads(userId: string): Promise<ThreadSummary[]> {
    return this.conversationRepo.listThreads(userId);
  }

  /**
   * Build the memory transcript from newest-first history: the five most
   * recent turns, oldest of them first.
   */
  formatMemory(history: ConversationTurn[]): string {
    return history
      .slice(0, MEMORY_TURNS)
      .reverse()
      .map((turn) => `User: ${turn.requestText}\nBot: ${turn.responseText}`)
      .join('\n');
  }

  /**
   * Timestamps are strictly increasing per user even when two turns land in
   * the same millisecond. Only users whose last timestamp is not behind the
   * clock are tracked.
   */
  private nextTimestamp(userId: string): number {
    const now = this.now();
    for (const [trackedUser, last] of this.lastTimestamps) {
      if (last < now) {
        this.lastTimestamps.delete(trackedUser);
      }
    }

    const last = this.lastTimestamps.get(userId);
    const timestamp = last === undefined ? now : Math.max(now, last + 1);
    this.lastTimestamps.set(userId, timestamp);
    return timestamp;
  }
}
