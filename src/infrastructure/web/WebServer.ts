import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import path from 'path';
import type { ChatService } from '../../application/services/ChatService.js';
import type { ConversationService } from '../../application/services/ConversationService.js';
import { imageMountPath } from '../../application/services/RetrievalService.js';
import { createLogger } from '../../utils/logger.js';
import { asyncHandler, errorHandler, validate } from './errorHandler.js';
import { AskBodySchema, ChatHistoryBodySchema, ThreadParamsSchema, UserParamsSchema } from './schemas.js';

const log = createLogger('WebServer');

export const WELCOME_MESSAGE = 'Hello, welcome to the API :)';

export interface WebServerOptions {
  port: number;
  /** Served under the same path the /ask image paths use */
  imageDir: string;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private chatService: ChatService,
    private conversationService: ConversationService,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.app.use(errorHandler);
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
    this.app.use(
      imageMountPath(this.options.imageDir),
      express.static(path.resolve(this.options.imageDir))
    );
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ message: WELCOME_MESSAGE });
    });

    // Ask a question about the manual
    this.app.post(
      '/ask',
      asyncHandler(async (req, res) => {
        const body = validate(AskBodySchema, req.body);
        const result = await this.chatService.ask({
          userId: body.user_id,
          threadId: body.thread ?? undefined,
          question: body.question,
        });
        res.json(result);
      })
    );

    // Every turn of a user, newest first
    this.app.get(
      '/history/:userId',
      asyncHandler(async (req, res) => {
        const { userId } = validate(UserParamsSchema, req.params);
        res.json(await this.conversationService.getHistory(userId));
      })
    );

    // Turns of one thread, newest first
    this.app.get(
      '/history/:userId/:threadId',
      asyncHandler(async (req, res) => {
        const { userId, threadId } = validate(ThreadParamsSchema, req.params);
        res.json(await this.conversationService.getHistory(userId, threadId));
      })
    );

    // Request/response pairs for a user
    this.app.post(
      '/getchathistory',
      asyncHandler(async (req, res) => {
        const { user_id } = validate(ChatHistoryBodySchema, req.body);
        res.json(await this.conversationService.getChatHistory(user_id));
      })
    );

    // Thread headings for a user
    this.app.get(
      '/threads/:userId',
      asyncHandler(async (req, res) => {
        const { userId } = validate(UserParamsSchema, req.params);
        res.json(await this.conversationService.listThreads(userId));
      })
    );
  }

  /**
   * Port actually bound, useful when started on port 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Web server is not listening');
    }
    return address.port;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, () => {
        log.info('HTTP API listening', { port: this.getPort() });
        resolve();
      });
      this.httpServer = server;

      server.on('error', (error) => {
        log.error('Server error', { error: error.message });
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        this.httpServer = null;
        if (error) {
          reject(error);
          return;
        }
        log.info('HTTP server closed');
        resolve();
      });
    });
  }
}
