import { ChatMessage, PromptInput, PromptTemplate } from './types.js';
import { SearchHit } from '../entities/Search.js';

/**
 * Retrieval-augmented chat template
 *
 * Message layout:
 * - system: persona instructions
 * - user: memory transcript (only when there is history)
 * - user: question followed by the search results
 */
export class RagChatTemplate implements PromptTemplate {
  formatPrompt(input: PromptInput): ChatMessage[] {
    const chatMessages: ChatMessage[] = [
      {
        role: 'system',
        content: input.systemPrompt,
      },
    ];

    if (input.memory) {
      chatMessages.push({
        role: 'user',
        content: input.memory,
      });
    }

    chatMessages.push({
      role: 'user',
      content: `${input.question}\n\nSearch results:\n${input.searchContent}`,
    });

    return chatMessages;
  }
}

/**
 * One line per hit: "<docRef> page <pageNumber>: <pageContent>", index order kept
 */
export function formatSearchContent(hits: Array<Pick<SearchHit, 'docRef' | 'pageNumber' | 'pageContent'>>): string {
  return hits.map((hit) => `${hit.docRef} page ${hit.pageNumber}: ${hit.pageContent}`).join('\n');
}
