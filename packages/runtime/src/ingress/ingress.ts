import {
  GENERATION_MAX_LENGTH,
  SUBJECTS,
  ValidationError,
  encodeEnvelope,
  type GenerateTextTask,
  type Logger,
  type MessageBus,
  type UrlTask,
} from '@synapse/core';

/**
 * Queues a page for perception. The url is trimmed before publishing.
 * Throws `ValidationError` before touching the bus when it is empty.
 */
export async function submitUrl(bus: MessageBus, request: { url: string }, logger: Logger): Promise<UrlTask> {
  const url = request.url.trim();
  if (url === '') {
    throw new ValidationError('url', 'URL cannot be empty');
  }

  const task: UrlTask = { url };
  await bus.publish(SUBJECTS.perceiveUrl, encodeEnvelope(task));
  logger.info({ url }, 'Submitted url for perception');
  return task;
}

/** Queues a text generation task unchanged once its fields check out. */
export async function submitGeneration(
  bus: MessageBus,
  task: GenerateTextTask,
  logger: Logger,
): Promise<GenerateTextTask> {
  if (task.task_id.trim() === '') {
    throw new ValidationError('task_id', 'task_id cannot be empty');
  }
  if (
    !Number.isInteger(task.max_length) ||
    task.max_length < GENERATION_MAX_LENGTH.MIN ||
    task.max_length > GENERATION_MAX_LENGTH.MAX
  ) {
    throw new ValidationError(
      'max_length',
      `max_length must be between ${GENERATION_MAX_LENGTH.MIN} and ${GENERATION_MAX_LENGTH.MAX}`,
    );
  }

  await bus.publish(SUBJECTS.generateText, encodeEnvelope(task));
  logger.info({ taskId: task.task_id, maxLength: task.max_length }, 'Submitted text generation task');
  return task;
}
