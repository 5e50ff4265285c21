import type { FastifyInstance } from 'fastify';
import { instanceId } from '../../common/types/ids.js';
import type { InstanceOrchestrator } from '../../orchestrator/instance-orchestrator.js';
import { instanceCreateSchema, instanceUpdateSchema, parseBody } from '../schemas.js';

interface InstanceParams {
  instanceId: string;
}

/**
 * Instance management routes.
 * Every response reports observed state from the orchestrator, never the
 * persisted intent alone.
 */
export async function instanceRoutes(
  app: FastifyInstance,
  opts: { orchestrator: InstanceOrchestrator },
): Promise<void> {
  const { orchestrator } = opts;

  app.get('/api/instances', async () => {
    return { instances: orchestrator.list() };
  });

  app.get<{ Params: InstanceParams }>('/api/instances/:instanceId', async (request) => {
    return { instance: orchestrator.status(instanceId(request.params.instanceId)) };
  });

  // Created stopped; a separate start call brings it up
  app.post('/api/instances', async (request, reply) => {
    const instance = await orchestrator.create(parseBody(instanceCreateSchema, request.body));
    reply.code(201);
    return { instance };
  });

  app.patch<{ Params: InstanceParams }>('/api/instances/:instanceId', async (request) => {
    const patch = parseBody(instanceUpdateSchema, request.body);
    return { instance: await orchestrator.update(instanceId(request.params.instanceId), patch) };
  });

  app.delete<{ Params: InstanceParams }>('/api/instances/:instanceId', async (request, reply) => {
    await orchestrator.delete(instanceId(request.params.instanceId));
    reply.code(204);
  });

  app.post<{ Params: InstanceParams }>('/api/instances/:instanceId/start', async (request) => {
    return { instance: await orchestrator.start(instanceId(request.params.instanceId)) };
  });

  app.post<{ Params: InstanceParams }>('/api/instances/:instanceId/stop', async (request) => {
    return { instance: await orchestrator.stop(instanceId(request.params.instanceId)) };
  });

  app.post<{ Params: InstanceParams }>('/api/instances/:instanceId/restart', async (request) => {
    return { instance: await orchestrator.restart(instanceId(request.params.instanceId)) };
  });
}
