import { ChatService, countWords } from '../src/application/services/ChatService.js';
import { ConversationService } from '../src/application/services/ConversationService.js';
import { RetrievalService } from '../src/application/services/RetrievalService.js';
import { RagChatTemplate } from '../src/core/templates/RagChatTemplate.js';
import { UpstreamServiceError } from '../src/core/errors.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { SqliteConversationRepository } from '../src/infrastructure/database/repositories/SqliteConversationRepository.js';
import {
  FakeCompletionClient,
  FakeEmbeddingClient,
  FakeSearchClient,
  SAMPLE_PAGES,
  words,
} from './helpers/fakes.js';

describe('ChatService', () => {
  let repo: SqliteConversationRepository;
  let conversationService: ConversationService;
  let embedding: FakeEmbeddingClient;
  let search: FakeSearchClient;
  let completion: FakeCompletionClient;

  const buildService = (imageWordThreshold = 160) =>
    new ChatService(
      conversationService,
      new RetrievalService(embedding, search, 'output_images'),
      completion,
      new RagChatTemplate(),
      { systemPrompt: 'You are a repair assistant.', imageWordThreshold }
    );

  beforeEach(() => {
    repo = new SqliteConversationRepository(new DatabaseConnection(':memory:'));
    conversationService = new ConversationService(repo);
    embedding = new FakeEmbeddingClient();
    search = new FakeSearchClient(SAMPLE_PAGES);
    completion = new FakeCompletionClient();
  });

  afterEach(async () => {
    await repo.close();
  });

  test('should answer, persist the turn and return no images for short answers', async () => {
    const result = await buildService().ask({ userId: 'u1', question: "My 1975 engine won't start" });

    expect(result).toEqual({ response: 'Check the spark plug first.', images: [] });

    const history = await conversationService.getHistory('u1');
    expect(history).toHaveLength(1);
    expect(history[0].requestText).toBe("My 1975 engine won't start");
    expect(history[0].responseText).toBe('Check the spark plug first.');
  });

  test('should send system prompt and search results to the model', async () => {
    await buildService().ask({ userId: 'u1', question: 'Timing?' });

    expect(completion.calls).toHaveLength(1);
    expect(completion.calls[0]).toEqual([
      { role: 'system', content: 'You are a repair assistant.' },
      {
        role: 'user',
        content:
          'Timing?\n\nSearch results:\n[doc1] page Page_12: Ignition timing procedure.\n[doc2] page Page_40: Carburettor float level.',
      },
    ]);
  });

  test('should include memory from the same thread on later questions', async () => {
    const service = buildService();
    await service.ask({ userId: 'u1', threadId: 't1', question: 'Hello' });
    await service.ask({ userId: 'u1', threadId: 't2', question: 'Unrelated' });
    await service.ask({ userId: 'u1', threadId: 't1', question: 'Follow up' });

    const last = completion.calls[2];
    expect(last).toHaveLength(3);
    expect(last[1]).toEqual({ role: 'user', content: 'User: Hello\nBot: Check the spark plug first.' });
  });

  test('should attach one image per hit when the answer exceeds the threshold', async () => {
    completion.reply = words(161);

    const result = await buildService().ask({ userId: 'u1', question: 'Full rebuild steps?' });

    expect(result.images).toEqual(['output_images/page_12.jpg', 'output_images/page_40.jpg']);
  });

  test('should not attach images at exactly the threshold', async () => {
    completion.reply = words(160);

    const result = await buildService().ask({ userId: 'u1', question: 'q' });

    expect(result.images).toEqual([]);
  });

  test('should not persist anything when the completion fails', async () => {
    completion.reply = new UpstreamServiceError('completion', 'HTTP error! status: 429', 429);

    await expect(buildService().ask({ userId: 'u1', question: 'q' })).rejects.toThrow(UpstreamServiceError);
    expect(await conversationService.getHistory('u1')).toEqual([]);
  });

  test('should not call the model when embedding fails', async () => {
    jest.spyOn(embedding, 'embed').mockRejectedValue(new UpstreamServiceError('embedding', 'timeout'));

    await expect(buildService().ask({ userId: 'u1', question: 'q' })).rejects.toThrow('embedding: timeout');
    expect(completion.calls).toHaveLength(0);
    expect(search.calls).toHaveLength(0);
  });
});

describe('countWords', () => {
  test('should split on any whitespace', () => {
    expect(countWords('  one two\nthree\tfour  ')).toBe(4);
  });

  test('should count zero words in blank text', () => {
    expect(countWords('   ')).toBe(0);
  });
});
