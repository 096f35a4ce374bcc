#!/usr/bin/env node

/**
 * Load a PDF manual into the search index, one document per page.
 * Usage: npm run ingest -- data/manual.pdf [--debug]
 */

import { getIngestionConfig, loadEnvFile } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { AzureOpenAIClient } from './infrastructure/http/AzureOpenAIClient.js';
import { AzureSearchClient } from './infrastructure/http/AzureSearchClient.js';
import { PdfJsReader } from './infrastructure/pdf/PdfJsReader.js';
import { IngestionService } from './application/services/IngestionService.js';
import { createLogger, describeError, setLogLevel } from './utils/logger.js';

const log = createLogger('ingest');

async function main(): Promise<number> {
  loadEnvFile(true);
  const config = getIngestionConfig();
  setLogLevel(config.logLevel);

  if (!config.pdfPath) {
    console.error('Usage: npm run ingest -- <path/to/manual.pdf>');
    return 2;
  }

  const service = new IngestionService(
    new PdfJsReader(),
    new AzureOpenAIClient(config.openai),
    new AzureSearchClient(config.search),
    { indexName: config.search.indexName, dimensions: config.openai.embeddingDimensions }
  );

  const report = await service.ingest(config.pdfPath, (outcome) => {
    console.log(`Uploaded ${outcome.pageNumber}: ${outcome.succeeded}${outcome.error ? ` (${outcome.error})` : ''}`);
  });

  console.log(
    `\nIndex ${config.search.indexName}${report.indexCreated ? ' (created)' : ''}: ${report.uploaded} pages uploaded, ${report.failed} failed`
  );
  return report.failed > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error('\nConfiguration validation failed:\n');
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
    } else {
      log.error('Ingestion aborted', describeError(error));
    }
    process.exit(1);
  });
