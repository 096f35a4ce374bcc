import { Config } from '../config.js';
import { IConversationRepository } from '../core/interfaces/IConversationRepository.js';
import { IEmbeddingClient } from '../core/interfaces/IEmbeddingClient.js';
import { ICompletionClient } from '../core/interfaces/ICompletionClient.js';
import { IVectorSearchClient } from '../core/interfaces/IVectorSearchClient.js';
import { RagChatTemplate } from '../core/templates/RagChatTemplate.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { SqliteConversationRepository } from '../infrastructure/database/repositories/SqliteConversationRepository.js';
import { CosmosConversationRepository } from '../infrastructure/database/repositories/CosmosConversationRepository.js';
import { AzureOpenAIClient } from '../infrastructure/http/AzureOpenAIClient.js';
import { AzureSearchClient } from '../infrastructure/http/AzureSearchClient.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { ConversationService } from '../application/services/ConversationService.js';
import { RetrievalService } from '../application/services/RetrievalService.js';
import { ChatService } from '../application/services/ChatService.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ChatbotServer');

/**
 * External collaborators, built once per process
 */
export interface ChatbotDependencies {
  conversationRepo: IConversationRepository;
  embeddingClient: IEmbeddingClient;
  searchClient: IVectorSearchClient;
  completionClient: ICompletionClient;
}

/**
 * Build the conversation repository selected by configuration
 */
export async function createConversationRepository(store: Config['store']): Promise<IConversationRepository> {
  if (store.kind === 'sqlite') {
    log.info('Using SQLite conversation store', { path: store.path });
    return new SqliteConversationRepository(new DatabaseConnection(store.path));
  }
  return CosmosConversationRepository.connect(store);
}

/**
 * Build the managed-service clients from configuration
 */
export async function createDependencies(config: Config): Promise<ChatbotDependencies> {
  const openai = new AzureOpenAIClient(config.openai);
  return {
    conversationRepo: await createConversationRepository(config.store),
    embeddingClient: openai,
    completionClient: openai,
    searchClient: new AzureSearchClient(config.search),
  };
}

/**
 * Wires clients, services and the HTTP API. Lifecycle: create, start, shutdown.
 */
export class ChatbotServer {
  readonly conversationService: ConversationService;
  readonly chatService: ChatService;
  private webServer: WebServer;
  private stopped = false;

  constructor(
    private config: Config,
    private dependencies: ChatbotDependencies
  ) {
    const retrievalService = new RetrievalService(
      dependencies.embeddingClient,
      dependencies.searchClient,
      config.chat.imageDir
    );

    this.conversationService = new ConversationService(dependencies.conversationRepo);
    this.chatService = new ChatService(
      this.conversationService,
      retrievalService,
      dependencies.completionClient,
      new RagChatTemplate(),
      {
        systemPrompt: config.chat.systemPrompt,
        imageWordThreshold: config.chat.imageWordThreshold,
      }
    );

    this.webServer = new WebServer(this.chatService, this.conversationService, {
      port: config.server.port,
      imageDir: config.chat.imageDir,
    });
  }

  static async create(config: Config): Promise<ChatbotServer> {
    return new ChatbotServer(config, await createDependencies(config));
  }

  async start(): Promise<void> {
    await this.webServer.start();
  }

  getPort(): number {
    return this.webServer.getPort();
  }

  /**
   * Stop accepting requests, then release the store client
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    log.info('Shutting down');
    await this.webServer.stop();
    await this.dependencies.conversationRepo.close();
  }
}
