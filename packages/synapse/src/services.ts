import { EventStreamBridge, ReplyCorrelator, SearchOrchestrator } from '@synapse/runtime';
import { GatewayServer, SseEventStream, createGatewayApp } from '@synapse/api';
import {
  createKnowledgeGraphWorker,
  createPerceptionWorker,
  createPreprocessingWorker,
  createTextGenerationWorker,
  createVectorMemoryWorker,
  type Worker,
} from '@synapse/workers';
import type { Logger, MessageBus, RuntimeResource, ServiceConfig, ServiceName } from '@synapse/core';

import type { Integrations } from './integrations';

export interface ServiceDeps extends Integrations {
  bus: MessageBus;
  logger: Logger;
}

export interface BuiltService {
  name: ServiceName;
  /** Start order; close in reverse. */
  resources: RuntimeResource[];
  /** Present when the service serves HTTP. */
  gateway?: GatewayServer;
}

type WorkerName = Exclude<ServiceName, 'api' | 'all'>;

const WORKER_NAMES: WorkerName[] = ['perception', 'preprocessing', 'knowledge-graph', 'vector-memory', 'text-generation'];

function buildWorker(name: WorkerName, config: ServiceConfig, deps: ServiceDeps): { worker: Worker; needs: RuntimeResource[] } {
  const base = {
    bus: deps.bus,
    logger: deps.logger.child({ worker: name }),
    maxConcurrent: config.maxConcurrentHandlers,
  };

  switch (name) {
    case 'perception':
      return { worker: createPerceptionWorker({ ...base, extractor: deps.extractor }), needs: [deps.extractor] };
    case 'preprocessing':
      return { worker: createPreprocessingWorker({ ...base, model: deps.embeddings }), needs: [deps.embeddings] };
    case 'knowledge-graph':
      return { worker: createKnowledgeGraphWorker({ ...base, graph: deps.graph }), needs: [deps.graph] };
    case 'vector-memory':
      return {
        worker: createVectorMemoryWorker({ ...base, store: deps.vectors, dimension: deps.embeddings.dimension }),
        needs: [deps.vectors],
      };
    case 'text-generation':
      return { worker: createTextGenerationWorker({ ...base, generator: deps.generator }), needs: [deps.generator] };
  }
}

function buildApi(config: ServiceConfig, deps: ServiceDeps): { resources: RuntimeResource[]; gateway: GatewayServer } {
  const logger = deps.logger.child({ service: 'api' });
  const bridge = new EventStreamBridge({ bus: deps.bus, logger, capacity: config.stream.broadcastCapacity });
  const events = new SseEventStream({ source: bridge, logger, keepAliveMs: config.stream.keepAliveMs });
  const search = new SearchOrchestrator({
    correlator: new ReplyCorrelator(deps.bus, logger),
    logger,
    embeddingTimeoutMs: config.search.embeddingTimeoutMs,
    searchTimeoutMs: config.search.searchTimeoutMs,
  });
  const app = createGatewayApp({
    bus: deps.bus,
    logger,
    search,
    events,
    serviceName: 'api',
    corsOrigins: config.api.corsOrigins,
  });
  const gateway = new GatewayServer({ app, events, host: config.api.host, port: config.api.port, logger });

  return { resources: [bridge, gateway], gateway };
}

/**
 * Wires the components of one service around a shared bus. The bus comes
 * first in `resources` so it is connected before anything subscribes and
 * closed after everything else.
 */
export function buildService(config: ServiceConfig, deps: ServiceDeps): BuiltService {
  const collaborators: RuntimeResource[] = [];
  const workers: RuntimeResource[] = [];

  const names = config.service === 'all' ? WORKER_NAMES : WORKER_NAMES.filter((name) => name === config.service);
  for (const name of names) {
    const { worker, needs } = buildWorker(name, config, deps);
    for (const resource of needs) {
      if (!collaborators.includes(resource)) collaborators.push(resource);
    }
    workers.push(worker);
  }

  const resources: RuntimeResource[] = [deps.bus, ...collaborators, ...workers];

  if (config.service === 'api' || config.service === 'all') {
    const api = buildApi(config, deps);
    resources.push(...api.resources);
    return { name: config.service, resources, gateway: api.gateway };
  }

  return { name: config.service, resources };
}
