import { errorMessage, type Logger, type RuntimeResource } from '@synapse/core';

/**
 * Starts resources in order. When one fails, those already started are
 * closed again before the error is rethrown.
 */
export async function startResources(resources: RuntimeResource[], logger?: Logger): Promise<void> {
  const started: RuntimeResource[] = [];
  for (const resource of resources) {
    try {
      await resource.start?.();
    } catch (error) {
      logger?.error({ err: errorMessage(error) }, 'Failed to start resource, closing started resources');
      await closeResources(started, logger);
      throw error;
    }
    started.push(resource);
  }
}

/** Closes resources in reverse start order. Every resource gets its close call even if an earlier one fails. */
export async function closeResources(resources: RuntimeResource[], logger?: Logger): Promise<void> {
  const errors: unknown[] = [];
  for (const resource of [...resources].reverse()) {
    try {
      await resource.close?.();
    } catch (error) {
      logger?.error({ err: errorMessage(error) }, 'Failed to close resource');
      errors.push(error);
    }
  }

  if (errors.length > 0) {
    throw new AggregateError(errors, `Failed to close ${errors.length} resource(s)`);
  }
}
