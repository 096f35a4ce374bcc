import { ICompletionClient } from '../../core/interfaces/ICompletionClient.js';
import { AskRequest, AskResult } from '../../core/entities/Chat.js';
import { PromptTemplate } from '../../core/templates/types.js';
import { formatSearchContent } from '../../core/templates/RagChatTemplate.js';
import { createLogger } from '../../utils/logger.js';
import { ConversationService } from './ConversationService.js';
import { RetrievalService } from './RetrievalService.js';

const log = createLogger('ChatService');

export interface ChatSettings {
  systemPrompt: string;
  imageWordThreshold: number;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Answers one question: history, retrieval, prompt, completion, persistence.
 * Any failing step aborts the request before anything is written.
 */
export class ChatService {
  constructor(
    private conversationService: ConversationService,
    private retrievalService: RetrievalService,
    private completionClient: ICompletionClient,
    private template: PromptTemplate,
    private settings: ChatSettings
  ) {}

  async ask(request: AskRequest): Promise<AskResult> {
    const { userId, threadId, question } = request;
    const startedAt = Date.now();

    const history = await this.conversationService.getHistory(userId, threadId);
    const memory = this.conversationService.formatMemory(history);
    log.debug('History fetched', { userId, threadId, turns: history.length });

    const vector = await this.retrievalService.embedQuery(question);
    log.debug('Question embedded', { userId, dimensions: vector.length });

    const hits = await this.retrievalService.searchByVector(vector);
    log.debug('Search complete', { userId, hits: hits.map((hit) => hit.pageNumber) });

    const messages = this.template.formatPrompt({
      systemPrompt: this.settings.systemPrompt,
      memory,
      question,
      searchContent: formatSearchContent(hits),
    });

    const response = await this.completionClient.complete(messages);
    log.debug('Completion received', { userId, words: countWords(response) });

    await this.conversationService.saveTurn(userId, threadId, question, response);

    const images =
      countWords(response) > this.settings.imageWordThreshold ? hits.map((hit) => hit.imagePath) : [];

    log.info('Question answered', {
      userId,
      threadId,
      hits: hits.length,
      images: images.length,
      durationMs: Date.now() - startedAt,
    });

    return { response, images };
  }
}
