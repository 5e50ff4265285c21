import dotenv from 'dotenv';
import { createServer } from './api/server.js';
import { DiscordGatewayClient } from './collaborators/discord-gateway.js';
import { FileKnowledgeStore } from './collaborators/file-knowledge-store.js';
import { PersonaCatalogEngine } from './collaborators/persona-engine.js';
import { describeError } from './common/errors/index.js';
import { createLogger } from './common/logger.js';
import { loadConfig } from './config.js';
import { InstanceOrchestrator } from './orchestrator/instance-orchestrator.js';
import { RedisStatusRelay, createRedisPublisher } from './status/redis-relay.js';
import { StatusBus } from './status/status-bus.js';
import { InstanceConfigStore } from './store/instance-config-store.js';
import { StateDocumentStore } from './store/state-document.js';
import { TemplateStore } from './store/template-store.js';
import { TokenVault } from './store/token-vault.js';

dotenv.config();

async function main() {
  const { config, warnings } = loadConfig();
  const logger = createLogger(config.logLevel);
  for (const warning of warnings) logger.warn(`[startup] ${warning}`);

  // State document and the stores over it
  const document = new StateDocumentStore(config.stateFile, logger.child({ component: 'state-document' }));
  await document.load();
  const vault = new TokenVault(document, config.credentialKey);
  const templates = new TemplateStore(document);
  const configs = new InstanceConfigStore(document);

  // Status fan-out
  const bus = new StatusBus(logger.child({ component: 'status-bus' }));
  let relay: RedisStatusRelay | null = null;
  if (config.redisUrl) {
    relay = new RedisStatusRelay(createRedisPublisher(config.redisUrl, logger), logger.child({ component: 'redis-relay' }));
    relay.attach(bus);
  }

  const orchestrator = new InstanceOrchestrator(
    {
      configs,
      templates,
      vault,
      knowledge: new FileKnowledgeStore(logger.child({ component: 'knowledge-store' })),
      personalities: await PersonaCatalogEngine.fromFile(),
      gateway: new DiscordGatewayClient(logger.child({ component: 'gateway' })),
      bus,
      logger,
    },
    {
      dataDir: config.dataDir,
      stopTimeoutMs: config.stopTimeoutMs,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      heartbeatStaleMs: config.heartbeatStaleMs,
    },
  );

  // Hand edits to the document are applied to live instances
  document.onChange((previous, next) => {
    void orchestrator.applyReload(previous, next).catch((err: unknown) => {
      logger.error({ err: describeError(err) }, 'State document reload failed');
    });
  });
  document.watch();

  const server = await createServer({ orchestrator, templates, vault, bus, logger });
  await server.listen({ port: config.port, host: config.host });

  if (config.autoStart) {
    await orchestrator.boot();
  } else {
    logger.info('[startup] Auto-start disabled, no instances started');
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    await server.close();
    await orchestrator.shutdown();
    await document.close();
    await relay?.close();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err: describeError(err) }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }
}

main().catch((err) => {
  console.error('Failed to start Kennel:', err);
  process.exit(1);
});
