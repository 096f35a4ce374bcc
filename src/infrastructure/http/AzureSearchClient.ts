import { z } from 'zod';
import { IVectorSearchClient, ISearchIndexClient } from '../../core/interfaces/IVectorSearchClient.js';
import {
  IndexedPage,
  SearchDocument,
  SearchIndexDefinition,
  UploadResult,
} from '../../core/entities/Search.js';
import { UpstreamServiceError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { HttpFetch, defaultFetch, requestJson } from './requestJson.js';

const log = createLogger('AzureSearchClient');

export interface AzureSearchOptions {
  endpoint: string;
  adminKey: string;
  indexName: string;
  apiVersion: string;
}

export const VECTOR_FIELD = 'vector';
export const HNSW_ALGORITHM = 'pageHnsw';
export const HNSW_PROFILE = 'pageHnswProfile';
export const SEMANTIC_CONFIGURATION = 'page-semantic-config';

const SearchResponseSchema = z.object({
  value: z.array(
    z.object({
      '@search.score': z.number(),
      pageNumber: z.string().nullable().optional(),
      pageContent: z.string().nullable().optional(),
    })
  ),
});

const IndexResponseSchema = z.object({
  value: z.array(
    z.object({
      key: z.string(),
      status: z.boolean(),
      errorMessage: z.string().nullable().optional(),
    })
  ),
});

const IndexDefinitionSchema = z.object({ name: z.string() });

/**
 * Index schema for manual pages: key, two searchable text fields, one HNSW
 * vector field and a semantic configuration with the page label as title.
 */
export function buildIndexSchema(definition: SearchIndexDefinition) {
  return {
    name: definition.name,
    fields: [
      {
        name: 'id',
        type: 'Edm.String',
        key: true,
        sortable: true,
        filterable: true,
        facetable: true,
      },
      { name: 'pageNumber', type: 'Edm.String', searchable: true },
      { name: 'pageContent', type: 'Edm.String', searchable: true },
      {
        name: VECTOR_FIELD,
        type: 'Collection(Edm.Single)',
        searchable: true,
        dimensions: definition.dimensions,
        vectorSearchProfile: HNSW_PROFILE,
      },
    ],
    vectorSearch: {
      algorithms: [{ name: HNSW_ALGORITHM, kind: 'hnsw' }],
      profiles: [{ name: HNSW_PROFILE, algorithm: HNSW_ALGORITHM }],
    },
    semantic: {
      configurations: [
        {
          name: SEMANTIC_CONFIGURATION,
          prioritizedFields: {
            titleField: { fieldName: 'pageNumber' },
            prioritizedContentFields: [{ fieldName: 'pageContent' }],
          },
        },
      ],
    },
  };
}

/**
 * Azure AI Search REST client for the page index
 */
export class AzureSearchClient implements IVectorSearchClient, ISearchIndexClient {
  private baseUrl: string;

  constructor(
    private options: AzureSearchOptions,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    this.baseUrl = options.endpoint.replace(/\/+$/, '');
  }

  async search(vector: number[], k: number): Promise<SearchDocument[]> {
    const url = this.url(`/indexes/${encodeURIComponent(this.options.indexName)}/docs/search`);
    const data = await requestJson(
      'search',
      this.httpFetch,
      url,
      this.request('POST', {
        vectorQueries: [{ kind: 'vector', vector, k, fields: VECTOR_FIELD }],
        select: 'pageNumber,pageContent',
        top: k,
      }),
      SearchResponseSchema
    );

    // Index order is kept as returned
    return data.value.slice(0, k).map((doc) => ({
      pageNumber: doc.pageNumber ?? '',
      pageContent: doc.pageContent ?? '',
      score: doc['@search.score'],
    }));
  }

  async indexExists(name: string): Promise<boolean> {
    const url = this.url(`/indexes/${encodeURIComponent(name)}`);
    try {
      await requestJson('search', this.httpFetch, url, this.request('GET'), IndexDefinitionSchema);
      return true;
    } catch (error) {
      if (error instanceof UpstreamServiceError && error.upstreamStatus === 404) {
        return false;
      }
      throw error;
    }
  }

  async createIndex(definition: SearchIndexDefinition): Promise<void> {
    const url = this.url(`/indexes/${encodeURIComponent(definition.name)}`);
    const created = await requestJson(
      'search',
      this.httpFetch,
      url,
      this.request('PUT', buildIndexSchema(definition)),
      IndexDefinitionSchema
    );
    log.info('Index created', { index: created.name, dimensions: definition.dimensions });
  }

  async uploadDocuments(pages: IndexedPage[]): Promise<UploadResult[]> {
    const url = this.url(`/indexes/${encodeURIComponent(this.options.indexName)}/docs/index`);
    const data = await requestJson(
      'search',
      this.httpFetch,
      url,
      this.request('POST', {
        value: pages.map((page) => ({ '@search.action': 'upload', ...page })),
      }),
      IndexResponseSchema
    );

    return data.value.map((result) => ({
      key: result.key,
      succeeded: result.status,
      errorMessage: result.errorMessage ?? undefined,
    }));
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}?api-version=${this.options.apiVersion}`;
  }

  private request(method: 'GET' | 'POST' | 'PUT', body?: unknown) {
    return {
      method,
      headers: {
        'Content-Type': 'application/json',
        'api-key': this.options.adminKey,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    };
  }
}
