import {
  GeneratedTextSchema,
  STREAM_DEFAULTS,
  SUBJECTS,
  type Logger,
  type MessageBus,
  type RuntimeResource,
} from '@synapse/core';

import { runDispatchLoop, type DispatchLoopHandle } from '../dispatch/dispatchLoop';
import { BroadcastChannel, type BroadcastReceiver } from './broadcastChannel';

export interface EventStreamBridgeOptions {
  bus: MessageBus;
  logger: Logger;
  capacity?: number;
}

/**
 * Fans `events.text.generated` out to any number of stream clients. Each
 * event is serialized once and shared by every receiver.
 */
export class EventStreamBridge implements RuntimeResource {
  public readonly channel: BroadcastChannel<string>;
  private readonly bus: MessageBus;
  private readonly logger: Logger;
  private loop: DispatchLoopHandle | null = null;

  constructor(options: EventStreamBridgeOptions) {
    this.bus = options.bus;
    this.logger = options.logger.child({ component: 'event-stream-bridge' });
    this.channel = new BroadcastChannel<string>(options.capacity ?? STREAM_DEFAULTS.BROADCAST_CAPACITY);
  }

  public async start(): Promise<void> {
    if (this.loop) return;

    this.loop = runDispatchLoop({
      bus: this.bus,
      subject: SUBJECTS.textGenerated,
      schema: GeneratedTextSchema,
      envelopeName: 'GeneratedText',
      logger: this.logger,
      handle: async (event) => {
        const receivers = this.channel.send(JSON.stringify(event));
        this.logger.debug({ taskId: event.original_task_id, receivers }, 'Broadcast generated text');
      },
    });
  }

  public async close(): Promise<void> {
    const loop = this.loop;
    this.loop = null;
    if (loop) {
      loop.stop();
      await loop.done;
      await loop.drain();
    }
    this.channel.close();
  }

  public subscribe(): BroadcastReceiver<string> {
    return this.channel.subscribe();
  }
}
