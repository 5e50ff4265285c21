import path from 'node:path';

export interface AppConfig {
  port: number;
  host: string;
  stateFile: string;
  dataDir: string;
  /** 32-byte AES key, or null when secrets are kept in plaintext. */
  credentialKey: Buffer | null;
  redisUrl: string | null;
  stopTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatStaleMs: number;
  logLevel: string;
  autoStart: boolean;
}

/**
 * Build the process configuration from environment variables and argv.
 * Throws on values that would make the process misbehave later
 * (a non-numeric port, a malformed key); warnings are returned to the
 * caller so they go through the real logger.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
): { config: AppConfig; warnings: string[] } {
  const warnings: string[] = [];

  const dataDir = path.resolve(env.KENNEL_DATA_DIR ?? './data');
  const stateFile = path.resolve(env.KENNEL_STATE_FILE ?? path.join(dataDir, 'kennel.json'));

  let credentialKey: Buffer | null = null;
  const keyHex = env.KENNEL_CREDENTIAL_KEY;
  if (!keyHex) {
    warnings.push('KENNEL_CREDENTIAL_KEY not set: credential secrets will be stored unencrypted.');
  } else if (!/^[a-fA-F0-9]{64}$/.test(keyHex)) {
    throw new Error('Invalid KENNEL_CREDENTIAL_KEY: expected a 64-character hex string.');
  } else {
    credentialKey = Buffer.from(keyHex, 'hex');
  }

  const heartbeatIntervalMs = positiveInt(env, 'HEARTBEAT_INTERVAL_MS', 30_000);
  const heartbeatStaleMs = positiveInt(env, 'HEARTBEAT_STALE_MS', heartbeatIntervalMs * 3);
  if (heartbeatStaleMs <= heartbeatIntervalMs) {
    warnings.push('HEARTBEAT_STALE_MS is not larger than HEARTBEAT_INTERVAL_MS: every heartbeat will look stale.');
  }

  const autoStart = !argv.includes('--no-auto-start') && env.KENNEL_AUTO_START !== 'false';

  return {
    config: {
      port: positiveInt(env, 'PORT', 8080),
      host: env.HOST ?? '0.0.0.0',
      stateFile,
      dataDir,
      credentialKey,
      redisUrl: env.REDIS_URL || null,
      stopTimeoutMs: positiveInt(env, 'STOP_TIMEOUT_MS', 10_000),
      heartbeatIntervalMs,
      heartbeatStaleMs,
      logLevel: env.LOG_LEVEL ?? 'info',
      autoStart,
    },
    warnings,
  };
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}. Provide a positive integer value.`);
  }
  return parsed;
}
