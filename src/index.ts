#!/usr/bin/env node

/**
 * Manual Assistant RAG Backend - Entry Point
 */

import { getConfig, loadEnvFile, printConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { ChatbotServer } from './presentation/ChatbotServer.js';
import { createLogger, describeError, setLogLevel } from './utils/logger.js';

const log = createLogger('main');

async function main() {
  let server: ChatbotServer | null = null;

  try {
    loadEnvFile(true);
    const config = getConfig();
    setLogLevel(config.server.logLevel);
    printConfigInfo(config);

    server = await ChatbotServer.create(config);
    await server.start();

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      log.info('Received signal, shutting down gracefully', { signal });
      try {
        if (server) {
          await server.shutdown();
        }
        process.exit(0);
      } catch (error) {
        log.error('Shutdown failed', describeError(error));
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
      log.error('Unhandled rejection', describeError(reason));
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\nConfiguration validation failed:\n');
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
      console.error('\nCheck your .env file (see .env.example) and CLI arguments.\n');
    } else {
      log.error('Fatal error during startup', describeError(error));
    }

    if (server) {
      await server.shutdown();
    }
    process.exit(1);
  }
}

void main();
