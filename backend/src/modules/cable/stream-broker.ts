/**
 * backend/src/modules/cable/stream-broker.ts
 *
 * WHY:
 * - Fan-out of persisted messages to every connection bound to a stream key.
 * - In-process: one broker per server process.
 *
 * RULES:
 * - subscribe() returns the release function. Releasing twice is a no-op.
 * - A throwing listener does not stop delivery to the others.
 */

import type { Logger } from '../../shared/logger/logger';
import type { BroadcastMessage, StreamKey } from './cable.types';

export type StreamListener = (message: BroadcastMessage) => void;

export class StreamBroker {
  private readonly streams = new Map<StreamKey, Set<StreamListener>>();

  constructor(private readonly logger: Logger) {}

  subscribe(streamKey: StreamKey, listener: StreamListener): () => void {
    let listeners = this.streams.get(streamKey);
    if (!listeners) {
      listeners = new Set();
      this.streams.set(streamKey, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.streams.get(streamKey);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.streams.delete(streamKey);
    };
  }

  /** Returns the number of listeners the message was handed to. */
  publish(streamKey: StreamKey, message: BroadcastMessage): number {
    const listeners = this.streams.get(streamKey);
    if (!listeners) return 0;

    let delivered = 0;
    for (const listener of [...listeners]) {
      try {
        listener(message);
        delivered += 1;
      } catch (err) {
        this.logger.error('cable.broadcast.listener_failed', { streamKey, err });
      }
    }
    return delivered;
  }

  listenerCount(streamKey: StreamKey): number {
    return this.streams.get(streamKey)?.size ?? 0;
  }
}
