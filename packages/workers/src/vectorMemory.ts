import {
  SUBJECTS,
  SearchTaskSchema,
  TextWithEmbeddingsSchema,
  VECTOR_STORE_DEFAULTS,
  errorMessage,
  generateId,
  retryWithBackoff,
  type BusMessage,
  type SearchResult,
  type SearchTask,
  type TextWithEmbeddings,
  type VectorPoint,
  type VectorStore,
} from '@synapse/core';
import { replyWith, runDispatchLoop } from '@synapse/runtime';

import { defineWorker, type Worker, type WorkerDeps } from './worker';

export interface VectorMemoryWorkerDeps extends WorkerDeps {
  store: VectorStore;
  dimension: number;
  connectAttempts?: number;
  connectRetryDelayMs?: number;
}

export function toVectorPoints(message: TextWithEmbeddings): VectorPoint[] {
  return message.embeddings_data.map((sentence, index) => ({
    id: generateId(),
    vector: sentence.embedding,
    payload: {
      original_document_id: message.original_id,
      source_url: message.source_url,
      sentence_text: sentence.sentence_text,
      sentence_order: index,
      model_name: message.model_name,
      processed_at_ms: message.timestamp_ms,
    },
  }));
}

/**
 * Stores sentence embeddings and answers semantic search requests. The
 * collection is checked (with fixed-delay retries) before anything is
 * consumed; `start()` rejects when every attempt fails.
 */
export function createVectorMemoryWorker(deps: VectorMemoryWorkerDeps): Worker {
  const { bus, store } = deps;
  const logger = deps.logger.child({ worker: 'vector-memory' });

  const storeEmbeddings = async (message: TextWithEmbeddings): Promise<void> => {
    if (message.embeddings_data.length === 0) {
      logger.warn({ id: message.original_id }, 'No embeddings in message, skipping');
      return;
    }

    const points = toVectorPoints(message);
    await store.upsert(points);
    logger.info({ id: message.original_id, points: points.length }, 'Upserted sentence vectors');
  };

  const search = async (task: SearchTask): Promise<SearchResult> => {
    try {
      const points = await store.search(task.query_embedding, task.top_k);
      logger.info({ requestId: task.request_id, found: points.length }, 'Vector search completed');
      return {
        request_id: task.request_id,
        results: points.map((point) => ({ qdrant_point_id: point.id, score: point.score, payload: point.payload })),
        error_message: null,
      };
    } catch (error) {
      const message = `Vector search failed for request_id ${task.request_id}: ${errorMessage(error)}`;
      logger.error({ requestId: task.request_id }, message);
      return { request_id: task.request_id, results: [], error_message: message };
    }
  };

  const answerSearch = async (task: SearchTask, message: BusMessage): Promise<void> => {
    await replyWith(bus, message, await search(task), logger);
  };

  return defineWorker({
    name: 'vector-memory',
    logger,
    prepare: async () => {
      await retryWithBackoff({
        run: () => store.ensureCollection(deps.dimension),
        maxAttempts: deps.connectAttempts ?? VECTOR_STORE_DEFAULTS.CONNECT_ATTEMPTS,
        delayMs: deps.connectRetryDelayMs ?? VECTOR_STORE_DEFAULTS.CONNECT_RETRY_DELAY_MS,
        multiplier: 1,
        onRetry: (error, attempt, delayMs) => {
          logger.warn({ err: errorMessage(error), attempt, delayMs }, 'Vector store not ready, retrying');
        },
      });
      logger.info({ dimension: deps.dimension }, 'Vector collection ready');
    },
    loops: () => [
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.textWithEmbeddings,
        schema: TextWithEmbeddingsSchema,
        envelopeName: 'TextWithEmbeddings',
        maxConcurrent: deps.maxConcurrent,
        handle: storeEmbeddings,
      }),
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.semanticSearch,
        schema: SearchTaskSchema,
        envelopeName: 'SearchTask',
        maxConcurrent: deps.maxConcurrent,
        handle: answerSearch,
        onDecodeError: async (error, message) => {
          if (!message.replyTo) return;
          const result: SearchResult = { request_id: 'unknown', results: [], error_message: error.message };
          await replyWith(bus, message, result, logger);
        },
      }),
    ],
  });
}
