import { SUBJECTS, TokenizedTextSchema, type GraphStore } from '@synapse/core';
import { runDispatchLoop } from '@synapse/runtime';

import { defineWorker, type Worker, type WorkerDeps } from './worker';

export interface KnowledgeGraphWorkerDeps extends WorkerDeps {
  graph: GraphStore;
}

export function createKnowledgeGraphWorker(deps: KnowledgeGraphWorkerDeps): Worker {
  const { bus, graph } = deps;
  const logger = deps.logger.child({ worker: 'knowledge-graph' });

  return defineWorker({
    name: 'knowledge-graph',
    logger,
    loops: () => [
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.textTokenized,
        schema: TokenizedTextSchema,
        envelopeName: 'TokenizedText',
        maxConcurrent: deps.maxConcurrent,
        handle: async (document) => {
          await graph.saveDocument(document);
          logger.info(
            { id: document.original_id, sentences: document.sentences.length, tokens: document.tokens.length },
            'Saved document to graph',
          );
        },
      }),
    ],
  });
}
