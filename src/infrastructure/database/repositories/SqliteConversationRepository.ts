import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import { ConversationTurn, ThreadSummary } from '../../../core/entities/Conversation.js';
import { DatabaseConnection } from '../DatabaseConnection.js';

interface TurnRow {
  id: string;
  user_id: string;
  thread_id: string | null;
  request_text: string;
  response_text: string;
  timestamp: number;
  created_at: string;
}

interface ThreadRow {
  thread_id: string;
  heading: string;
  turn_count: number;
  last_timestamp: number;
}

function toTurn(row: TurnRow): ConversationTurn {
  return {
    id: row.id,
    userId: row.user_id,
    threadId: row.thread_id,
    requestText: row.request_text,
    responseText: row.response_text,
    timestamp: row.timestamp,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of conversation repository
 */
export class SqliteConversationRepository implements IConversationRepository {
  constructor(private connection: DatabaseConnection) {}

  private get db() {
    return this.connection.getDatabase();
  }

  async saveTurn(turn: ConversationTurn): Promise<void> {
    this.db
      .prepare(`
      INSERT INTO conversation_turns (id, user_id, thread_id, request_text, response_text, timestamp, created_at)
      VALUES (@id, @userId, @threadId, @requestText, @responseText, @timestamp, @createdAt)
    `)
      .run(turn);
  }

  async getHistory(userId: string, threadId?: string): Promise<ConversationTurn[]> {
    const rows =
      threadId === undefined
        ? this.db
            .prepare<[string], TurnRow>(`
            SELECT * FROM conversation_turns
            WHERE user_id = ?
            ORDER BY timestamp DESC
          `)
            .all(userId)
        : this.db
            .prepare<[string, string], TurnRow>(`
            SELECT * FROM conversation_turns
            WHERE user_id = ? AND thread_id = ?
            ORDER BY timestamp DESC
          `)
            .all(userId, threadId);

    return rows.map(toTurn);
  }

  async listThreads(userId: string): Promise<ThreadSummary[]> {
    const rows = this.db
      .prepare<[string], ThreadRow>(`
      SELECT
        t.thread_id,
        (SELECT request_text FROM conversation_turns
          WHERE user_id = t.user_id AND thread_id = t.thread_id
          ORDER BY timestamp LIMIT 1) AS heading,
        COUNT(*) AS turn_count,
        MAX(t.timestamp) AS last_timestamp
      FROM conversation_turns t
      WHERE t.user_id = ? AND t.thread_id IS NOT NULL
      GROUP BY t.user_id, t.thread_id
      ORDER BY last_timestamp DESC
    `)
      .all(userId);

    return rows.map((row) => ({
      threadId: row.thread_id,
      heading: row.heading,
      turnCount: row.turn_count,
      lastTimestamp: row.last_timestamp,
    }));
  }

  async close(): Promise<void> {
    this.connection.close();
  }
}
