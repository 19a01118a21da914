import { PinoLogger } from '@synapse/adapters';
import { serializeError, type Logger } from '@synapse/core';
import { closeResources, startResources } from '@synapse/runtime';
import { config as loadDotenv } from 'dotenv';

import { loadConfig } from './config/env';
import { createBus, createLocalIntegrations } from './integrations';
import { buildService } from './services';

loadDotenv();

async function bootstrap(): Promise<void> {
  let logger: Logger = new PinoLogger({ name: 'synapse' });

  try {
    const config = loadConfig();
    logger = new PinoLogger({
      level: config.logging.level,
      prettyPrint: config.logging.prettyPrint,
      name: `synapse-${config.service}`,
    });

    const service = buildService(config, {
      bus: createBus(config, logger),
      logger,
      ...createLocalIntegrations(config, logger),
    });

    await startResources(service.resources, logger);
    logger.info({ service: service.name, bus: config.bus }, 'Service started');

    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      logger.info({ signal }, 'Shutting down');

      try {
        await closeResources(service.resources, logger);
        logger.info('Service stopped');
        process.exit(0);
      } catch (error) {
        logger.error({ err: serializeError(error) }, 'Shutdown did not complete cleanly');
        process.exit(1);
      }
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    logger.fatal({ err: serializeError(error) }, 'Failed to start service');
    process.exit(1);
  }
}

await bootstrap();
