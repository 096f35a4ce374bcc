import { z } from 'zod';
import { IEmbeddingClient } from '../../core/interfaces/IEmbeddingClient.js';
import { ICompletionClient } from '../../core/interfaces/ICompletionClient.js';
import { ChatMessage } from '../../core/templates/types.js';
import { UpstreamServiceError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { HttpFetch, defaultFetch, requestJson } from './requestJson.js';

const log = createLogger('AzureOpenAIClient');

export interface AzureOpenAIOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  chatDeployment?: string;
  embeddingDeployment: string;
  embeddingDimensions: number;
}

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
      })
    )
    .min(1),
});

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

/**
 * Azure OpenAI REST client for embeddings and chat completions.
 * One request per call; no retries and no streaming.
 */
export class AzureOpenAIClient implements IEmbeddingClient, ICompletionClient {
  private baseUrl: string;

  constructor(
    private options: AzureOpenAIOptions,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    this.baseUrl = options.endpoint.replace(/\/+$/, '');
  }

  async embed(text: string): Promise<number[]> {
    const url = this.deploymentUrl(this.options.embeddingDeployment, 'embeddings');
    const data = await requestJson('embedding', this.httpFetch, url, this.post({ input: text }), EmbeddingResponseSchema);

    const vector = data.data[0].embedding;
    if (vector.length !== this.options.embeddingDimensions) {
      throw new UpstreamServiceError(
        'embedding',
        `expected ${this.options.embeddingDimensions} dimensions, got ${vector.length}`
      );
    }
    return vector;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    if (!this.options.chatDeployment) {
      throw new UpstreamServiceError('completion', 'no chat deployment configured');
    }

    const url = this.deploymentUrl(this.options.chatDeployment, 'chat/completions');
    const data = await requestJson('completion', this.httpFetch, url, this.post({ messages }), ChatCompletionResponseSchema);

    const content = data.choices[0].message.content;
    if (!content) {
      throw new UpstreamServiceError('completion', 'empty completion');
    }
    log.debug('Completion received', { deployment: this.options.chatDeployment, length: content.length });
    return content;
  }

  private deploymentUrl(deployment: string, operation: string): string {
    return `${this.baseUrl}/openai/deployments/${encodeURIComponent(deployment)}/${operation}?api-version=${this.options.apiVersion}`;
  }

  private post(body: unknown) {
    return {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-key': this.options.apiKey,
      },
      body: JSON.stringify(body),
    };
  }
}
