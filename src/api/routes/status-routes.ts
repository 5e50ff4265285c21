import type { FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import { describeError } from '../../common/errors/index.js';
import type { InstanceOrchestrator } from '../../orchestrator/instance-orchestrator.js';
import { toStatusFrame, type StatusBus } from '../../status/status-bus.js';

/**
 * Health, aggregate stats, and the live status feed.
 *
 * A socket gets a `snapshot` frame on connect and then every bus event.
 * Frames published while a client is disconnected are not replayed.
 */
export async function statusRoutes(
  app: FastifyInstance,
  opts: { orchestrator: InstanceOrchestrator; bus: StatusBus },
): Promise<void> {
  const { orchestrator, bus } = opts;

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/api/system/stats', async () => {
    return { stats: orchestrator.stats() };
  });

  app.get('/ws', { websocket: true }, (socket: WebSocket, request) => {
    const send = (frame: unknown) => {
      if (socket.readyState !== socket.OPEN) return;
      socket.send(JSON.stringify(frame), (err) => {
        if (err) request.log.debug({ err: describeError(err) }, 'Status frame not delivered');
      });
    };

    send({ type: 'snapshot', instances: orchestrator.list(), timestamp: new Date().toISOString() });
    const unsubscribe = bus.subscribe((event) => send(toStatusFrame(event)));
    request.log.debug({ subscribers: bus.subscriberCount }, 'Status client connected');

    socket.on('close', () => {
      unsubscribe();
      request.log.debug({ subscribers: bus.subscriberCount }, 'Status client disconnected');
    });
    socket.on('error', (err) => {
      request.log.warn({ err: err.message }, 'Status socket error');
    });
  });
}
