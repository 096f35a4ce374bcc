/**
 * Chat message format for structured conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Everything a prompt template needs for one question
 */
export interface PromptInput {
  systemPrompt: string;
  /** Formatted transcript of recent turns, empty when there is none */
  memory: string;
  question: string;
  /** Formatted search results, see formatSearchContent */
  searchContent: string;
}

/**
 * Abstract interface for prompt templates
 */
export interface PromptTemplate {
  /**
   * Turn the prompt input into the message list sent to the chat model
   */
  formatPrompt(input: PromptInput): ChatMessage[];
}
