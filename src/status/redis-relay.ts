import { Redis } from 'ioredis';
import { describeError } from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import { toStatusFrame, type StatusBus } from './status-bus.js';

export const STATUS_CHANNEL = 'kennel:status';

/** The slice of ioredis the relay needs. Tests hand in a stub. */
export interface StatusPublisher {
  publish(channel: string, message: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function createRedisPublisher(redisUrl: string, logger: Logger): Redis {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    connectTimeout: 5_000,
    retryStrategy(times) {
      // Exponential-ish backoff: 100ms, 200ms, 300ms... max 3s
      return Math.min(times * 100, 3_000);
    },
  });

  redis.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });

  return redis;
}

/**
 * Mirrors the status bus onto a Redis pub/sub channel so dashboards running
 * in other processes can follow transitions. Same at-most-once contract as
 * the bus: a failed publish is logged and the frame is gone.
 */
export class RedisStatusRelay {
  private unsubscribe: (() => void) | null = null;
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly publisher: StatusPublisher,
    private readonly logger: Logger,
    private readonly channel: string = STATUS_CHANNEL,
  ) {}

  attach(bus: StatusBus): void {
    if (this.unsubscribe) return;
    this.unsubscribe = bus.subscribe((event) => {
      const publish = this.publisher
        .publish(this.channel, JSON.stringify(toStatusFrame(event)))
        .then(
          () => undefined,
          (err: unknown) => {
            this.logger.warn({ err: describeError(err), channel: this.channel }, 'Status relay publish failed');
          },
        );
      this.inFlight.add(publish);
      void publish.finally(() => this.inFlight.delete(publish));
    });
  }

  /** Stop relaying, wait for frames already handed to Redis, then close the connection. */
  async close(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await Promise.all(this.inFlight);
    await this.publisher.quit();
  }
}
