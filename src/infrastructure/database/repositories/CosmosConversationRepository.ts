import { CosmosClient, Container, SqlQuerySpec } from '@azure/cosmos';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import { ConversationTurn, ThreadSummary } from '../../../core/entities/Conversation.js';
import { UpstreamServiceError } from '../../../core/errors.js';
import { createLogger } from '../../../utils/logger.js';

const log = createLogger('CosmosConversationRepository');

export const PARTITION_KEY_PATH = '/userId';

export interface CosmosStoreOptions {
  uri: string;
  key: string;
  databaseId: string;
  containerId: string;
}

const TURN_FIELDS = 'c.id, c.userId, c.threadId, c.requestText, c.responseText, c.timestamp, c.createdAt';

/**
 * Parameterised history query, newest first
 */
export function buildHistoryQuery(userId: string, threadId?: string): SqlQuerySpec {
  if (threadId === undefined) {
    return {
      query: `SELECT ${TURN_FIELDS} FROM c WHERE c.userId = @userId ORDER BY c.timestamp DESC`,
      parameters: [{ name: '@userId', value: userId }],
    };
  }
  return {
    query: `SELECT ${TURN_FIELDS} FROM c WHERE c.userId = @userId AND c.threadId = @threadId ORDER BY c.timestamp DESC`,
    parameters: [
      { name: '@userId', value: userId },
      { name: '@threadId', value: threadId },
    ],
  };
}

/**
 * Collapse turns (any order) into one summary per thread, most recently active first.
 * The heading is the request of the earliest turn in the thread.
 */
export function summarizeThreads(turns: ConversationTurn[]): ThreadSummary[] {
  const byThread = new Map<string, { first: ConversationTurn; turnCount: number; lastTimestamp: number }>();

  for (const turn of turns) {
    if (turn.threadId === null) continue;
    const current = byThread.get(turn.threadId);
    if (!current) {
      byThread.set(turn.threadId, { first: turn, turnCount: 1, lastTimestamp: turn.timestamp });
      continue;
    }
    current.turnCount += 1;
    if (turn.timestamp < current.first.timestamp) current.first = turn;
    if (turn.timestamp > current.lastTimestamp) current.lastTimestamp = turn.timestamp;
  }

  return Array.from(byThread, ([threadId, entry]) => ({
    threadId,
    heading: entry.first.requestText,
    turnCount: entry.turnCount,
    lastTimestamp: entry.lastTimestamp,
  })).sort((a, b) => b.lastTimestamp - a.lastTimestamp);
}

function storeError(action: string, error: unknown): UpstreamServiceError {
  const reason = error instanceof Error ? error.message : String(error);
  const status =
    typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number'
      ? error.code
      : undefined;
  return new UpstreamServiceError('store', `${action} failed: ${reason}`, status, { cause: error });
}

/**
 * Cosmos DB implementation of conversation repository.
 * One document per turn, partitioned by user id.
 */
export class CosmosConversationRepository implements IConversationRepository {
  private constructor(
    private client: CosmosClient,
    private container: Container
  ) {}

  /**
   * Connect and make sure the database and container exist
   */
  static async connect(options: CosmosStoreOptions): Promise<CosmosConversationRepository> {
    const client = new CosmosClient({ endpoint: options.uri, key: options.key });
    try {
      const { database } = await client.databases.createIfNotExists({ id: options.databaseId });
      const { container } = await database.containers.createIfNotExists({
        id: options.containerId,
        partitionKey: { paths: [PARTITION_KEY_PATH] },
      });
      log.info('Connected to Cosmos DB', { database: options.databaseId, container: options.containerId });
      return new CosmosConversationRepository(client, container);
    } catch (error) {
      client.dispose();
      throw storeError('connect', error);
    }
  }

  async saveTurn(turn: ConversationTurn): Promise<void> {
    try {
      await this.container.items.create({ ...turn });
    } catch (error) {
      throw storeError('saveTurn', error);
    }
  }

  async getHistory(userId: string, threadId?: string): Promise<ConversationTurn[]> {
    try {
      const { resources } = await this.container.items
        .query<ConversationTurn>(buildHistoryQuery(userId, threadId), { partitionKey: userId })
        .fetchAll();
      return resources.map((item) => ({
        id: item.id,
        userId: item.userId,
        threadId: item.threadId ?? null,
        requestText: item.requestText,
        responseText: item.responseText,
        timestamp: item.timestamp,
        createdAt: item.createdAt,
      }));
    } catch (error) {
      throw storeError('getHistory', error);
    }
  }

  async listThreads(userId: string): Promise<ThreadSummary[]> {
    return summarizeThreads(await this.getHistory(userId));
  }

  async close(): Promise<void> {
    this.client.dispose();
  }
}
