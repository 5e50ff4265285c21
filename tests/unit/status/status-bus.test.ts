import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../../../src/common/logger.js';
import { instanceId } from '../../../src/common/types/ids.js';
import type { StatusEvent } from '../../../src/common/types/status.js';
import { RedisStatusRelay, STATUS_CHANNEL, type StatusPublisher } from '../../../src/status/redis-relay.js';
import { StatusBus, toStatusFrame } from '../../../src/status/status-bus.js';

const transition: StatusEvent = {
  type: 'transition',
  instanceId: instanceId('a'),
  oldState: 'starting',
  newState: 'error',
  timestamp: '2026-01-01T00:00:00.000Z',
  reason: 'bad token',
};

describe('StatusBus', () => {
  it('delivers events to every subscriber', () => {
    const bus = new StatusBus(silentLogger());
    const first: StatusEvent[] = [];
    const second: StatusEvent[] = [];
    bus.subscribe((e) => first.push(e));
    bus.subscribe((e) => second.push(e));

    bus.publish(transition);

    expect(first).toEqual([transition]);
    expect(second).toEqual([transition]);
  });

  it('keeps delivering when a subscriber throws', () => {
    const bus = new StatusBus(silentLogger());
    const seen: StatusEvent[] = [];
    bus.subscribe(() => {
      throw new Error('bad subscriber');
    });
    bus.subscribe((e) => seen.push(e));

    expect(() => bus.publish(transition)).not.toThrow();
    expect(seen).toHaveLength(1);
  });

  it('stops delivering after unsubscribe and does not replay', () => {
    const bus = new StatusBus(silentLogger());
    const seen: StatusEvent[] = [];
    bus.publish(transition);
    const unsubscribe = bus.subscribe((e) => seen.push(e));
    expect(bus.subscriberCount).toBe(1);

    unsubscribe();
    bus.publish(transition);

    expect(seen).toEqual([]);
    expect(bus.subscriberCount).toBe(0);
  });
});

describe('toStatusFrame', () => {
  it('uses snake case for transitions', () => {
    expect(toStatusFrame(transition)).toEqual({
      type: 'transition',
      instance_id: 'a',
      old_state: 'starting',
      new_state: 'error',
      timestamp: '2026-01-01T00:00:00.000Z',
      reason: 'bad token',
    });
  });

  it('omits an absent reason', () => {
    const frame = toStatusFrame({ ...transition, oldState: 'stopped', newState: 'starting', reason: undefined });
    expect(frame).not.toHaveProperty('reason');
  });

  it('passes config events through', () => {
    expect(
      toStatusFrame({ type: 'config', entity: 'template', action: 'deleted', id: 't1', timestamp: 'ts' }),
    ).toEqual({ type: 'config', entity: 'template', action: 'deleted', id: 't1', timestamp: 'ts' });
  });
});

describe('RedisStatusRelay', () => {
  function stubPublisher(publish: StatusPublisher['publish']) {
    const quit = vi.fn(async () => 'OK');
    const publisher: StatusPublisher = { publish, quit };
    return { publisher, quit };
  }

  it('publishes each event as a JSON frame on the status channel', async () => {
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    const { publisher, quit } = stubPublisher(publish);
    const bus = new StatusBus(silentLogger());
    const relay = new RedisStatusRelay(publisher, silentLogger());
    relay.attach(bus);

    bus.publish(transition);
    await relay.close();

    expect(publish).toHaveBeenCalledWith(STATUS_CHANNEL, JSON.stringify(toStatusFrame(transition)));
    expect(quit).toHaveBeenCalledOnce();
  });

  it('drops frames that fail to publish', async () => {
    const publish = vi.fn(async (_channel: string, _message: string): Promise<number> => {
      throw new Error('connection refused');
    });
    const { publisher } = stubPublisher(publish);
    const bus = new StatusBus(silentLogger());
    const relay = new RedisStatusRelay(publisher, silentLogger());
    relay.attach(bus);

    bus.publish(transition);
    await expect(relay.close()).resolves.toBeUndefined();
    expect(publish).toHaveBeenCalledOnce();
  });

  it('stops relaying once closed', async () => {
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    const { publisher } = stubPublisher(publish);
    const bus = new StatusBus(silentLogger());
    const relay = new RedisStatusRelay(publisher, silentLogger());
    relay.attach(bus);

    await relay.close();
    bus.publish(transition);

    expect(publish).not.toHaveBeenCalled();
  });
});
