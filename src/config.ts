import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import type { LogLevel } from './utils/logger.js';

export interface Config {
  server: {
    port: number;
    logLevel: LogLevel;
  };
  search: {
    endpoint: string;
    adminKey: string;
    indexName: string;
    apiVersion: string;
  };
  openai: {
    endpoint: string;
    apiKey: string;
    chatDeployment: string;
    embeddingDeployment: string;
    embeddingDimensions: number;
    apiVersion: string;
  };
  store:
    | {
        kind: 'cosmos';
        uri: string;
        key: string;
        databaseId: string;
        containerId: string;
      }
    | {
        kind: 'sqlite';
        path: string;
      };
  chat: {
    systemPrompt: string;
    systemPromptPath: string;
    imageDir: string;
    /** Images are attached only when the answer has more words than this */
    imageWordThreshold: number;
  };
}

const requiredString = (name: string) => z.string({ required_error: `${name} is required` }).min(1, `${name} must not be empty`);

const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
  search: z.object({
    endpoint: requiredString('AZURE_SEARCH_SERVICE_ENDPOINT').url('AZURE_SEARCH_SERVICE_ENDPOINT must be a URL'),
    adminKey: requiredString('AZURE_SEARCH_SERVICE_ADMIN_KEY'),
    indexName: requiredString('SEARCH_INDEX_NAME'),
    apiVersion: requiredString('AZURE_SEARCH_API_VERSION'),
  }),
  openai: z.object({
    endpoint: requiredString('AZURE_OPENAI_ENDPOINT').url('AZURE_OPENAI_ENDPOINT must be a URL'),
    apiKey: requiredString('AZURE_OPENAI_API_KEY'),
    chatDeployment: requiredString('AZURE_OPENAI_CHAT_COMPLETIONS_DEPLOYMENT_NAME'),
    embeddingDeployment: requiredString('AZURE_OPENAI_EMBEDDING_MODEL'),
    embeddingDimensions: z.number().int().min(1, 'EMBEDDING_VECTOR_DIMENSIONS must be positive'),
    apiVersion: requiredString('AZURE_OPENAI_API_VERSION'),
  }),
  store: z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('cosmos'),
      uri: requiredString('COSMOS_DB_URI').url('COSMOS_DB_URI must be a URL'),
      key: requiredString('COSMOS_DB_PRIMARY_KEY'),
      databaseId: requiredString('COSMOS_DB_DATABASE_ID'),
      containerId: requiredString('COSMOS_DB_CONTAINER_ID'),
    }),
    z.object({
      kind: z.literal('sqlite'),
      path: requiredString('SQLITE_DB_PATH'),
    }),
  ]),
  chat: z.object({
    systemPrompt: z.string(),
    systemPromptPath: z.string().min(1),
    imageDir: z.string().min(1),
    imageWordThreshold: z.number().int().min(0),
  }),
});

export const DEFAULT_PORT = 5000;
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;
export const DEFAULT_IMAGE_WORD_THRESHOLD = 160;
export const DEFAULT_IMAGE_DIR = 'output_images';
export const DEFAULT_SYSTEM_PROMPT_PATH = 'prompts/system-prompt.txt';

type Env = Record<string, string | undefined>;

/** Flags that never take a value, so `--debug manual.pdf` keeps the path positional */
const BOOLEAN_FLAGS = new Set(['debug']);

interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positional: string[];
}

function scanArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (!BOOLEAN_FLAGS.has(key) && i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        flags[key] = argv[++i];
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --store sqlite --db data/dev.db --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  return scanArgs(argv).flags;
}

/**
 * Load .env from the working directory into process.env.
 * Existing variables win unless override is set.
 */
export function loadEnvFile(override = false): void {
  dotenv.config({ override });
}

function readSystemPrompt(promptPath: string): string {
  let text: string;
  try {
    text = fs.readFileSync(promptPath, 'utf-8').trim();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`chat.systemPrompt: cannot read ${promptPath} (${reason})`]);
  }
  if (!text) {
    throw new ConfigurationError([`chat.systemPrompt: ${promptPath} is empty`]);
  }
  return text;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
}

/**
 * Collect raw settings from environment variables and CLI arguments
 */
function readRawSettings(env: Env, argv: string[]) {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string | null, envKey: string, defaultValue = ''): string => {
    if (cliKey && typeof cliArgs[cliKey] === 'string') return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string | null, envKey: string, defaultValue: number): number => {
    if (cliKey && typeof cliArgs[cliKey] === 'string') return Number(cliArgs[cliKey]);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const debug = getBoolean('debug', 'DEBUG', false);
  const storeKind = getString('store', 'CONVERSATION_STORE', 'cosmos');

  return {
    server: {
      port: getNumber('port', 'PORT', DEFAULT_PORT),
      logLevel: getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info'),
    },
    search: {
      endpoint: getString(null, 'AZURE_SEARCH_SERVICE_ENDPOINT'),
      adminKey: getString(null, 'AZURE_SEARCH_SERVICE_ADMIN_KEY'),
      indexName: getString(null, 'SEARCH_INDEX_NAME'),
      apiVersion: getString(null, 'AZURE_SEARCH_API_VERSION', '2024-07-01'),
    },
    openai: {
      endpoint: getString(null, 'AZURE_OPENAI_ENDPOINT'),
      apiKey: getString(null, 'AZURE_OPENAI_API_KEY'),
      chatDeployment: getString(null, 'AZURE_OPENAI_CHAT_COMPLETIONS_DEPLOYMENT_NAME'),
      embeddingDeployment: getString(null, 'AZURE_OPENAI_EMBEDDING_MODEL'),
      embeddingDimensions: getNumber(null, 'EMBEDDING_VECTOR_DIMENSIONS', DEFAULT_EMBEDDING_DIMENSIONS),
      apiVersion: getString(null, 'AZURE_OPENAI_API_VERSION', '2024-06-01'),
    },
    store:
      storeKind === 'sqlite'
        ? { kind: storeKind, path: getString('db', 'SQLITE_DB_PATH', 'data/conversations.db') }
        : {
            kind: storeKind,
            uri: getString(null, 'COSMOS_DB_URI'),
            key: getString(null, 'COSMOS_DB_PRIMARY_KEY'),
            databaseId: getString(null, 'COSMOS_DB_DATABASE_ID'),
            containerId: getString(null, 'COSMOS_DB_CONTAINER_ID'),
          },
    chat: {
      systemPrompt: '',
      systemPromptPath: path.resolve(getString(null, 'SYSTEM_PROMPT_PATH', DEFAULT_SYSTEM_PROMPT_PATH)),
      imageDir: getString(null, 'IMAGE_DIR', DEFAULT_IMAGE_DIR),
      imageWordThreshold: getNumber(null, 'IMAGE_WORD_THRESHOLD', DEFAULT_IMAGE_WORD_THRESHOLD),
    },
  };
}

/**
 * Build the server configuration from environment variables and CLI arguments.
 * Throws ConfigurationError listing every invalid setting.
 */
export function getConfig(env: Env = process.env, argv: string[] = process.argv): Config {
  const rawConfig = readRawSettings(env, argv);

  // Variables are validated before the prompt file is read, so one run reports all of them
  const structural = ConfigSchema.safeParse(rawConfig);
  if (!structural.success) {
    throw new ConfigurationError(formatIssues(structural.error));
  }

  return {
    ...structural.data,
    chat: {
      ...structural.data.chat,
      systemPrompt: readSystemPrompt(structural.data.chat.systemPromptPath),
    },
  };
}

const IngestionConfigSchema = z.object({
  logLevel: ConfigSchema.shape.server.shape.logLevel,
  search: ConfigSchema.shape.search,
  openai: ConfigSchema.shape.openai.omit({ chatDeployment: true }),
});

export type IngestionConfig = z.infer<typeof IngestionConfigSchema> & {
  pdfPath: string | null;
};

/**
 * Configuration for the ingestion CLI: only search and embedding settings
 * are required. The PDF path is the first positional argument.
 */
export function getIngestionConfig(env: Env = process.env, argv: string[] = process.argv): IngestionConfig {
  const raw = readRawSettings(env, argv);
  const parsed = IngestionConfigSchema.safeParse({
    logLevel: raw.server.logLevel,
    search: raw.search,
    openai: raw.openai,
  });
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const [pdfPath] = scanArgs(argv).positional;
  return { ...parsed.data, pdfPath: pdfPath ?? null };
}

/**
 * Print a short configuration summary (secrets omitted)
 */
export function printConfigInfo(config: Config): void {
  console.error('Manual Assistant RAG Backend - Configuration');
  console.error(`  Port:        ${config.server.port} (log level: ${config.server.logLevel})`);
  console.error(`  Search:      ${config.search.endpoint} index=${config.search.indexName}`);
  console.error(
    `  OpenAI:      ${config.openai.endpoint} chat=${config.openai.chatDeployment} embedding=${config.openai.embeddingDeployment} (${config.openai.embeddingDimensions} dims)`
  );
  if (config.store.kind === 'cosmos') {
    console.error(`  Store:       cosmos ${config.store.databaseId}/${config.store.containerId}`);
  } else {
    console.error(`  Store:       sqlite ${config.store.path}`);
  }
  console.error(`  Prompt:      ${config.chat.systemPromptPath}`);
  console.error(`  Images:      ${config.chat.imageDir} (attached above ${config.chat.imageWordThreshold} words)`);
}
