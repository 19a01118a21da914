import {
  GenerateTextTaskSchema,
  SUBJECTS,
  currentTimestampMs,
  encodeEnvelope,
  type GeneratedText,
  type TextGenerator,
} from '@synapse/core';
import { runDispatchLoop } from '@synapse/runtime';

import { defineWorker, type Worker, type WorkerDeps } from './worker';

export interface TextGenerationWorkerDeps extends WorkerDeps {
  generator: TextGenerator;
}

/** tasks.generation.text -> events.text.generated */
export function createTextGenerationWorker(deps: TextGenerationWorkerDeps): Worker {
  const { bus, generator } = deps;
  const logger = deps.logger.child({ worker: 'text-generation' });

  return defineWorker({
    name: 'text-generation',
    logger,
    loops: () => [
      runDispatchLoop({
        bus,
        logger,
        subject: SUBJECTS.generateText,
        schema: GenerateTextTaskSchema,
        envelopeName: 'GenerateTextTask',
        maxConcurrent: deps.maxConcurrent,
        handle: async (task) => {
          const text = await generator.generate(task.prompt ?? null, task.max_length);
          const event: GeneratedText = {
            original_task_id: task.task_id,
            generated_text: text,
            timestamp_ms: currentTimestampMs(),
          };
          await bus.publish(SUBJECTS.textGenerated, encodeEnvelope(event));
          logger.info({ taskId: task.task_id, length: text.length }, 'Published generated text');
        },
      }),
    ],
  });
}
