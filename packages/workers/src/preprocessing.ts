import {
  QueryForEmbeddingTaskSchema,
  RawTextSchema,
  SUBJECTS,
  currentTimestampMs,
  encodeEnvelope,
  errorMessage,
  type BusMessage,
  type EmbeddingModel,
  type QueryEmbeddingResult,
  type QueryForEmbeddingTask,
  type RawText,
  type TextWithEmbeddings,
  type TokenizedText,
} from '@synapse/core';
import { replyWith, runDispatchLoop } from '@synapse/runtime';

import { cleanText, splitSentences, tokenize } from './segmentation';
import { defineWorker, type Worker, type WorkerDeps } from './worker';

export interface PreprocessingWorkerDeps extends WorkerDeps {
  model: EmbeddingModel;
}

/**
 * Two duties:
 *  - data.raw_text.discovered -> data.processed_text.tokenized + data.text.with_embeddings
 *  - replies to tasks.embedding.for_query with one query vector
 */
export function createPreprocessingWorker(deps: PreprocessingWorkerDeps): Worker {
  const { bus, model } = deps;
  const logger = deps.logger.child({ worker: 'preprocessing' });

  const processRawText = async (raw: RawText): Promise<void> => {
    const cleaned = cleanText(raw.raw_text);
    if (cleaned === '') {
      logger.error({ id: raw.id }, 'Cleaned text is empty, nothing to publish');
      return;
    }

    const sentences = splitSentences(cleaned);
    const tokenized: TokenizedText = {
      original_id: raw.id,
      source_url: raw.source_url,
      tokens: tokenize(cleaned),
      sentences,
      timestamp_ms: currentTimestampMs(),
    };
    await bus.publish(SUBJECTS.textTokenized, encodeEnvelope(tokenized));
    logger.debug({ id: raw.id, sentences: sentences.length }, 'Published tokenized text');

    const embeddings = await model.embed(sentences);
    if (embeddings.length !== sentences.length) {
      logger.error(
        { id: raw.id, sentences: sentences.length, embeddings: embeddings.length },
        'Sentence and embedding counts differ, nothing to publish',
      );
      return;
    }

    const withEmbeddings: TextWithEmbeddings = {
      original_id: raw.id,
      source_url: raw.source_url,
      embeddings_data: sentences.map((sentence_text, index) => ({
        sentence_text,
        embedding: embeddings[index] ?? [],
      })),
      model_name: model.modelName,
      timestamp_ms: currentTimestampMs(),
    };
    await bus.publish(SUBJECTS.textWithEmbeddings, encodeEnvelope(withEmbeddings));
    logger.info({ id: raw.id, embeddings: embeddings.length }, 'Published text with embeddings');
  };

  const embedQuery = async (task: QueryForEmbeddingTask): Promise<QueryEmbeddingResult> => {
    const failure = (message: string): QueryEmbeddingResult => {
      logger.error({ requestId: task.request_id }, message);
      return { request_id: task.request_id, embedding: null, model_name: model.modelName, error_message: message };
    };

    let vectors: number[][];
    try {
      vectors = await model.embed([task.text_to_embed]);
    } catch (error) {
      return failure(`Failed to generate embedding for request_id ${task.request_id}: ${errorMessage(error)}`);
    }

    const [embedding] = vectors;
    if (vectors.length !== 1 || embedding === undefined) {
      return failure(
        `Embedding generation for a single sentence returned ${vectors.length} embeddings for request_id ${task.request_id}`,
      );
    }
    return { request_id: task.request_id, embedding, model_name: model.modelName, error_message: null };
  };

  const answerQuery = async (task: QueryForEmbeddingTask, message: BusMessage): Promise<void> => {
    const result = await embedQuery(task);
    await replyWith(bus, message, result, logger);
  };

  return defineWorker({
    name: 'preprocessing',
    logger,
    loops: () => [
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.rawTextDiscovered,
        schema: RawTextSchema,
        envelopeName: 'RawText',
        maxConcurrent: deps.maxConcurrent,
        handle: processRawText,
      }),
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.embeddingForQuery,
        schema: QueryForEmbeddingTaskSchema,
        envelopeName: 'QueryForEmbeddingTask',
        maxConcurrent: deps.maxConcurrent,
        handle: answerQuery,
        onDecodeError: async (error, message) => {
          if (!message.replyTo) return;
          const result: QueryEmbeddingResult = {
            request_id: 'unknown',
            embedding: null,
            model_name: null,
            error_message: error.message,
          };
          await replyWith(bus, message, result, logger);
        },
      }),
    ],
  });
}
