import type { Logger, MessageBus, RuntimeResource } from '@synapse/core';
import type { DispatchLoopHandle } from '@synapse/runtime';

export interface Worker extends RuntimeResource {
  readonly name: string;
  start(): Promise<void>;
  close(): Promise<void>;
}

/** Dependencies every worker takes. */
export interface WorkerDeps {
  bus: MessageBus;
  logger: Logger;
  /** Per-subject handler cap passed to each dispatch loop. */
  maxConcurrent?: number | undefined;
}

interface DefineWorkerInput {
  name: string;
  logger: Logger;
  /** Runs once before any subscription is made. A rejection fails `start()`. */
  prepare?: () => Promise<void>;
  loops: () => DispatchLoopHandle[];
}

export function defineWorker(input: DefineWorkerInput): Worker {
  let running: DispatchLoopHandle[] = [];

  return {
    name: input.name,

    async start() {
      if (running.length > 0) return;

      await input.prepare?.();
      running = input.loops();
      input.logger.info({ subjects: running.map((loop) => loop.subject) }, 'Worker started');
    },

    async close() {
      const loops = running;
      running = [];
      for (const loop of loops) {
        loop.stop();
      }
      await Promise.all(loops.map((loop) => loop.done));
      await Promise.all(loops.map((loop) => loop.drain()));
      if (loops.length > 0) {
        input.logger.info('Worker stopped');
      }
    },
  };
}
