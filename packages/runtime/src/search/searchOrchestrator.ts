import {
  QueryEmbeddingResultSchema,
  SEARCH_DEFAULTS,
  SUBJECTS,
  SearchResultSchema,
  generateId,
  type ApiSearchRequest,
  type ApiSearchResponse,
  type Logger,
  type QueryForEmbeddingTask,
  type SearchTask,
} from '@synapse/core';

import type { QueryError, ReplyCorrelator } from '../request/replyCorrelator';

export type SearchState = 'Start' | 'EmbeddingRequested' | 'VectorSearchRequested' | 'Done' | 'Failed';

export type SearchHop = 'input' | 'embedding' | 'search';

export type SearchFailureKind = QueryError['kind'] | 'validation' | 'missing_embedding';

export interface SearchFailure {
  hop: SearchHop;
  kind: SearchFailureKind;
}

export interface SearchOutcome {
  state: 'Done' | 'Failed';
  /** Every state visited, in order, starting with `Start`. */
  trail: SearchState[];
  response: ApiSearchResponse;
  failure?: SearchFailure;
}

export interface SearchOrchestratorOptions {
  correlator: ReplyCorrelator;
  logger: Logger;
  embeddingTimeoutMs?: number;
  searchTimeoutMs?: number;
  generateId?: () => string;
}

const HOP_LABEL = {
  embedding: { service: 'preprocessing service', noun: 'embedding' },
  search: { service: 'vector memory service', noun: 'search results' },
} as const;

function describeFailure(hop: 'embedding' | 'search', error: QueryError): string {
  const { service, noun } = HOP_LABEL[hop];
  switch (error.kind) {
    case 'timeout':
      return `Timeout: Failed to get ${noun} from ${service} within ${error.timeoutMs / 1000} seconds`;
    case 'transport':
      return `Failed to get ${noun} from ${service}: ${error.message}`;
    case 'decode':
      return `Internal error: Failed to parse ${hop} service response`;
    case 'remote':
      return `Error from ${service}: ${error.message}`;
  }
}

/**
 * Two-hop semantic search: query text -> embedding (preprocessing) ->
 * ranked points (vector memory). Runs as a linear state machine
 *
 *   Start -> EmbeddingRequested -> VectorSearchRequested -> Done
 *                  |                        |
 *                  +--------> Failed <------+
 *
 * and always produces an `ApiSearchResponse`; a failed hop never starts the
 * next one.
 */
export class SearchOrchestrator {
  private readonly correlator: ReplyCorrelator;
  private readonly logger: Logger;
  private readonly embeddingTimeoutMs: number;
  private readonly searchTimeoutMs: number;
  private readonly nextId: () => string;

  constructor(options: SearchOrchestratorOptions) {
    this.correlator = options.correlator;
    this.logger = options.logger.child({ component: 'search-orchestrator' });
    this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? SEARCH_DEFAULTS.EMBEDDING_TIMEOUT_MS;
    this.searchTimeoutMs = options.searchTimeoutMs ?? SEARCH_DEFAULTS.SEARCH_TIMEOUT_MS;
    this.nextId = options.generateId ?? generateId;
  }

  public async search(request: ApiSearchRequest): Promise<SearchOutcome> {
    const requestId = this.nextId();
    const trail: SearchState[] = ['Start'];
    const logger = this.logger.child({ requestId });

    const fail = (hop: SearchHop, kind: SearchFailureKind, message: string): SearchOutcome => {
      trail.push('Failed');
      logger.warn({ hop, kind, trail }, message);
      return {
        state: 'Failed',
        trail,
        response: { search_request_id: requestId, results: [], error_message: message },
        failure: { hop, kind },
      };
    };

    if (!Number.isInteger(request.top_k) || request.top_k <= 0) {
      return fail('input', 'validation', 'top_k must be a positive integer');
    }
    if (request.query_text.trim() === '') {
      return fail('input', 'validation', 'query_text cannot be empty');
    }

    trail.push('EmbeddingRequested');
    logger.debug({ topK: request.top_k }, 'Requesting query embedding');
    const embeddingTask: QueryForEmbeddingTask = { request_id: requestId, text_to_embed: request.query_text };
    const embedded = await this.correlator.requestWithTimeout({
      subject: SUBJECTS.embeddingForQuery,
      payload: embeddingTask,
      schema: QueryEmbeddingResultSchema,
      envelopeName: 'QueryEmbeddingResult',
      timeoutMs: this.embeddingTimeoutMs,
    });
    if (!embedded.ok) {
      return fail('embedding', embedded.error.kind, describeFailure('embedding', embedded.error));
    }

    const embedding = embedded.value.embedding;
    if (embedding === null || embedding === undefined) {
      return fail('embedding', 'missing_embedding', 'Preprocessing service did not return an embedding.');
    }

    trail.push('VectorSearchRequested');
    logger.debug({ dimension: embedding.length }, 'Requesting vector search');
    const searchTask: SearchTask = { request_id: requestId, query_embedding: embedding, top_k: request.top_k };
    const searched = await this.correlator.requestWithTimeout({
      subject: SUBJECTS.semanticSearch,
      payload: searchTask,
      schema: SearchResultSchema,
      envelopeName: 'SearchResult',
      timeoutMs: this.searchTimeoutMs,
    });
    if (!searched.ok) {
      return fail('search', searched.error.kind, describeFailure('search', searched.error));
    }

    trail.push('Done');
    logger.info({ results: searched.value.results.length }, 'Semantic search completed');
    return {
      state: 'Done',
      trail,
      response: { search_request_id: requestId, results: searched.value.results, error_message: null },
    };
  }
}
