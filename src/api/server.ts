import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import websocket from '@fastify/websocket';
import { registerErrorHandler } from './middleware/error-handler.js';
import { credentialRoutes } from './routes/credential-routes.js';
import { instanceRoutes } from './routes/instance-routes.js';
import { statusRoutes } from './routes/status-routes.js';
import { templateRoutes } from './routes/template-routes.js';
import type { InstanceOrchestrator } from '../orchestrator/instance-orchestrator.js';
import type { StatusBus } from '../status/status-bus.js';
import type { TemplateStore } from '../store/template-store.js';
import type { TokenVault } from '../store/token-vault.js';

export interface ServerDeps {
  orchestrator: InstanceOrchestrator;
  templates: TemplateStore;
  vault: TokenVault;
  bus: StatusBus;
  /** The process's root pino logger; request logs go through it. */
  logger: FastifyBaseLogger;
}

/** Build the control API. The caller owns `listen()` and `close()`. */
export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger });

  // Plugins
  await app.register(cors, { origin: true });
  await app.register(helmet);
  await app.register(websocket);

  // Error handler
  registerErrorHandler(app);

  // Routes
  await app.register(statusRoutes, { orchestrator: deps.orchestrator, bus: deps.bus });
  await app.register(instanceRoutes, { orchestrator: deps.orchestrator });
  await app.register(templateRoutes, { templates: deps.templates, bus: deps.bus });
  await app.register(credentialRoutes, { vault: deps.vault, bus: deps.bus });

  return app;
}
