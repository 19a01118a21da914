import {
  EchoTextGenerator,
  HashingEmbeddingModel,
  InMemoryGraphStore,
  InMemoryMessageBus,
  InMemoryVectorStore,
  NatsMessageBus,
  StaticPageExtractor,
} from '@synapse/adapters';
import type {
  EmbeddingModel,
  GraphStore,
  Logger,
  MessageBus,
  PageExtractor,
  ServiceConfig,
  TextGenerator,
  VectorStore,
} from '@synapse/core';

export interface Integrations {
  extractor: PageExtractor;
  embeddings: EmbeddingModel;
  generator: TextGenerator;
  graph: GraphStore;
  vectors: VectorStore;
}

/**
 * In-process stand-ins for every external collaborator. The page extractor
 * starts empty, so a perception worker wired with it publishes nothing until
 * pages are registered; production deployments pass their own
 * `Integrations` to `buildService`.
 */
export function createLocalIntegrations(config: ServiceConfig, logger: Logger): Integrations {
  if (config.bus === 'nats') {
    logger.warn({ service: config.service }, 'Using in-process stand-ins for external collaborators');
  }

  return {
    extractor: new StaticPageExtractor(),
    embeddings: new HashingEmbeddingModel(),
    generator: new EchoTextGenerator(),
    graph: new InMemoryGraphStore(),
    vectors: new InMemoryVectorStore(),
  };
}

export function createBus(config: ServiceConfig, logger: Logger): MessageBus {
  if (config.bus === 'memory') {
    if (config.service !== 'all') {
      logger.warn({ service: config.service }, 'In-memory bus only reaches components in this process');
    }
    return new InMemoryMessageBus();
  }

  return new NatsMessageBus({ servers: config.natsUrl, name: `synapse-${config.service}`, logger });
}
