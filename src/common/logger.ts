import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Root logger. Components take a child (`logger.child({ component })`) so
 * every line carries where it came from; the orchestrator adds `instanceId`.
 * The same instance is handed to Fastify so request logs share the stream.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { service: 'kennel' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['secret', '*.secret', 'token', '*.token'],
      censor: '***REDACTED***',
    },
  });
}

/** Logger that drops everything. Used by tests and throwaway tooling. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
