import {
  SUBJECTS,
  UrlTaskSchema,
  currentTimestampMs,
  encodeEnvelope,
  generateId,
  type PageExtractor,
  type RawText,
} from '@synapse/core';
import { runDispatchLoop } from '@synapse/runtime';

import { defineWorker, type Worker, type WorkerDeps } from './worker';

export interface PerceptionWorkerDeps extends WorkerDeps {
  extractor: PageExtractor;
}

/** tasks.perceive.url -> data.raw_text.discovered */
export function createPerceptionWorker(deps: PerceptionWorkerDeps): Worker {
  const { bus, extractor } = deps;
  const logger = deps.logger.child({ worker: 'perception' });

  return defineWorker({
    name: 'perception',
    logger,
    loops: () => [
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.perceiveUrl,
        schema: UrlTaskSchema,
        envelopeName: 'UrlTask',
        maxConcurrent: deps.maxConcurrent,
        handle: async (task) => {
          const text = await extractor.extract(task.url);
          if (text === '') {
            logger.warn({ url: task.url }, 'Page yielded no text, not publishing');
            return;
          }

          const raw: RawText = {
            id: generateId(),
            source_url: task.url,
            raw_text: text,
            timestamp_ms: currentTimestampMs(),
          };
          await bus.publish(SUBJECTS.rawTextDiscovered, encodeEnvelope(raw));
          logger.info({ id: raw.id, url: task.url, length: text.length }, 'Published raw text');
        },
      }),
    ],
  });
}
