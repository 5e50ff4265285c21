import type { FastifyInstance } from 'fastify';
import type { StatusBus } from '../../status/status-bus.js';
import type { TokenVault } from '../../store/token-vault.js';
import { credentialCreateSchema, parseBody } from '../schemas.js';

/** Credential routes. Secrets go in, summaries come out. */
export async function credentialRoutes(
  app: FastifyInstance,
  opts: { vault: TokenVault; bus: StatusBus },
): Promise<void> {
  const { vault, bus } = opts;

  app.get('/api/credentials', async () => {
    return { credentials: vault.list() };
  });

  app.post('/api/credentials', async (request, reply) => {
    const credential = await vault.create(parseBody(credentialCreateSchema, request.body));
    bus.publish({
      type: 'config',
      entity: 'credential',
      action: 'created',
      id: credential.credentialId,
      timestamp: new Date().toISOString(),
    });
    reply.code(201);
    return { credential };
  });

  app.post<{ Params: { credentialId: string } }>('/api/credentials/:credentialId/deactivate', async (request) => {
    const credential = await vault.deactivate(request.params.credentialId);
    bus.publish({
      type: 'config',
      entity: 'credential',
      action: 'deactivated',
      id: credential.credentialId,
      timestamp: new Date().toISOString(),
    });
    return { credential };
  });
}
