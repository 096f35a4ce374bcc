import fs from 'fs';
import path from 'path';
import fetch from 'node-fetch';
import { ChatbotServer } from '../src/presentation/ChatbotServer.js';
import { UpstreamServiceError } from '../src/core/errors.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { SqliteConversationRepository } from '../src/infrastructure/database/repositories/SqliteConversationRepository.js';
import {
  FakeCompletionClient,
  FakeEmbeddingClient,
  FakeSearchClient,
  SAMPLE_PAGES,
  testConfig,
  words,
} from './helpers/fakes.js';

describe('HTTP API', () => {
  let server: ChatbotServer;
  let completion: FakeCompletionClient;
  let baseUrl: string;

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  beforeEach(async () => {
    completion = new FakeCompletionClient();
    server = new ChatbotServer(testConfig(), {
      conversationRepo: new SqliteConversationRepository(new DatabaseConnection(':memory:')),
      embeddingClient: new FakeEmbeddingClient(),
      searchClient: new FakeSearchClient(SAMPLE_PAGES),
      completionClient: completion,
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.shutdown();
  });

  test('GET / should return the welcome message', async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Hello, welcome to the API :)' });
  });

  test('POST /ask should answer and record the turn', async () => {
    const res = await post('/ask', { user_id: 'u1', question: "My 1975 engine won't start" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ response: 'Check the spark plug first.', images: [] });

    const history = await fetch(`${baseUrl}/history/u1`);
    const turns = await history.json();
    expect(Array.isArray(turns)).toBe(true);
    expect(turns).toHaveLength(1);
    expect(turns[0]).toMatchObject({
      userId: 'u1',
      threadId: null,
      requestText: "My 1975 engine won't start",
      responseText: 'Check the spark plug first.',
    });
  });

  test('POST /ask should return image paths for long answers', async () => {
    completion.reply = words(200);

    const res = await post('/ask', { user_id: 'u1', thread: 't1', question: 'Full rebuild?' });

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.images).toEqual(['output_images/page_12.jpg', 'output_images/page_40.jpg']);
  });

  test('POST /ask should reject a missing question with 400', async () => {
    const res = await post('/ask', { user_id: 'u1' });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('question is required');
  });

  test('POST /ask should reject a malformed JSON body with 400', async () => {
    const res = await fetch(`${baseUrl}/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"user_id":',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
    });
  });

  test('POST /ask should report upstream failures as 502 and store nothing', async () => {
    completion.reply = new UpstreamServiceError('completion', 'HTTP error! status: 401', 401);

    const res = await post('/ask', { user_id: 'u1', question: 'q' });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: {
        code: 'UPSTREAM_ERROR',
        message: 'The completion service is unavailable, please try again later',
      },
    });
    expect(await server.conversationService.getHistory('u1')).toEqual([]);
  });

  test('GET /history/:userId/:threadId should filter by thread', async () => {
    await post('/ask', { user_id: 'u1', thread: 'brakes', question: 'Pad wear?' });
    await post('/ask', { user_id: 'u1', thread: 'engine', question: 'Oil grade?' });

    const res = await fetch(`${baseUrl}/history/u1/brakes`);
    const turns = await res.json();

    expect(turns).toHaveLength(1);
    expect(turns[0].requestText).toBe('Pad wear?');
  });

  test('POST /getchathistory should return request and response pairs', async () => {
    await post('/ask', { user_id: 'u2', question: 'First' });
    await post('/ask', { user_id: 'u2', question: 'Second' });

    const res = await post('/getchathistory', { user_id: 'u2' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([
      { req: 'Second', res: 'Check the spark plug first.' },
      { req: 'First', res: 'Check the spark plug first.' },
    ]);
  });

  test('POST /getchathistory should require user_id', async () => {
    const res = await post('/getchathistory', {});

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe('user_id is required');
  });

  test('GET /threads/:userId should list thread headings', async () => {
    await post('/ask', { user_id: 'u3', thread: 'wheels', question: 'Spoke tension?' });

    const res = await fetch(`${baseUrl}/threads/u3`);
    const threads = await res.json();

    expect(threads).toHaveLength(1);
    expect(threads[0]).toMatchObject({ threadId: 'wheels', heading: 'Spoke tension?', turnCount: 1 });
  });
});

describe('HTTP API page images', () => {
  let server: ChatbotServer;
  let baseUrl: string;
  let rootDir: string;
  let imageDir: string;

  const ask = () =>
    fetch(`${baseUrl}/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ user_id: 'u1', question: 'Full rebuild?' }),
    });

  beforeAll(() => {
    rootDir = fs.mkdtempSync(path.join(process.cwd(), 'tmp-images-'));
    imageDir = `${path.relative(process.cwd(), rootDir)}/static/pages`;
    fs.mkdirSync(imageDir, { recursive: true });
    fs.writeFileSync(path.join(imageDir, 'page_12.jpg'), 'jpeg-12');
    fs.writeFileSync(path.join(imageDir, 'page_40.jpg'), 'jpeg-40');
  });

  afterAll(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    server = new ChatbotServer(testConfig({ imageDir }), {
      conversationRepo: new SqliteConversationRepository(new DatabaseConnection(':memory:')),
      embeddingClient: new FakeEmbeddingClient(),
      searchClient: new FakeSearchClient(SAMPLE_PAGES),
      completionClient: new FakeCompletionClient(words(200)),
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.shutdown();
  });

  test('should serve every image path returned by /ask from a nested image directory', async () => {
    const res = await ask();
    const { images } = await res.json();

    expect(images).toEqual([`${imageDir}/page_12.jpg`, `${imageDir}/page_40.jpg`]);

    const first = await fetch(`${baseUrl}/${images[0]}`);
    expect(first.status).toBe(200);
    expect(await first.text()).toBe('jpeg-12');

    const second = await fetch(`${baseUrl}/${images[1]}`);
    expect(second.status).toBe(200);
    expect(await second.text()).toBe('jpeg-40');
  });

  test('should return 404 for a page image that does not exist', async () => {
    const res = await fetch(`${baseUrl}/${imageDir}/page_99.jpg`);

    expect(res.status).toBe(404);
  });
});
