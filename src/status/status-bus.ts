import { EventEmitter } from 'eventemitter3';
import { describeError } from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import type { StatusEvent } from '../common/types/status.js';

type StatusListener = (event: StatusEvent) => void;

/**
 * Status Bus: fan-out of lifecycle transitions and config events.
 *
 * Delivery is at-most-once with no replay: a subscriber that joins late, or
 * whose handler throws, misses events. Subscribers are expected to reconcile
 * against `list()` rather than rely on the stream alone.
 */
export class StatusBus {
  private readonly emitter = new EventEmitter<{ event: StatusListener }>();

  constructor(private readonly logger: Logger) {}

  publish(event: StatusEvent): void {
    if (event.type === 'transition') {
      this.logger.info(
        { instanceId: event.instanceId, from: event.oldState, to: event.newState, reason: event.reason },
        'Instance state changed',
      );
    } else {
      this.logger.debug({ entity: event.entity, action: event.action, id: event.id }, 'Config changed');
    }

    for (const listener of this.emitter.listeners('event')) {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn({ err: describeError(err), eventType: event.type }, 'Status subscriber threw, event dropped for it');
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: StatusListener): () => void {
    this.emitter.on('event', listener);
    return () => {
      this.emitter.off('event', listener);
    };
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount('event');
  }
}

// ─── Wire format ───────────────────────────────────────────────

interface TransitionFrame {
  type: 'transition';
  instance_id: string;
  old_state: string;
  new_state: string;
  timestamp: string;
  reason?: string;
}

interface ConfigFrame {
  type: 'config';
  entity: string;
  action: string;
  id: string;
  timestamp: string;
}

export type StatusFrame = TransitionFrame | ConfigFrame;

/** Snake-case frame sent over the websocket feed and the Redis channel. */
export function toStatusFrame(event: StatusEvent): StatusFrame {
  if (event.type === 'transition') {
    const frame: TransitionFrame = {
      type: 'transition',
      instance_id: event.instanceId,
      old_state: event.oldState,
      new_state: event.newState,
      timestamp: event.timestamp,
    };
    if (event.reason !== undefined) frame.reason = event.reason;
    return frame;
  }
  return { type: 'config', entity: event.entity, action: event.action, id: event.id, timestamp: event.timestamp };
}
