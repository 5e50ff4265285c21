import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config.js';

const KEY = '11'.repeat(32);

describe('loadConfig', () => {
  it('applies defaults', () => {
    const { config, warnings } = loadConfig({}, []);

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.dataDir).toBe(path.resolve('./data'));
    expect(config.stateFile).toBe(path.join(path.resolve('./data'), 'kennel.json'));
    expect(config.stopTimeoutMs).toBe(10_000);
    expect(config.heartbeatIntervalMs).toBe(30_000);
    expect(config.heartbeatStaleMs).toBe(90_000);
    expect(config.redisUrl).toBeNull();
    expect(config.autoStart).toBe(true);
    expect(config.credentialKey).toBeNull();
    expect(warnings).toEqual(['KENNEL_CREDENTIAL_KEY not set: credential secrets will be stored unencrypted.']);
  });

  it('reads overrides from the environment', () => {
    const { config, warnings } = loadConfig(
      {
        PORT: '9000',
        KENNEL_DATA_DIR: '/srv/kennel',
        KENNEL_CREDENTIAL_KEY: KEY,
        REDIS_URL: 'redis://localhost:6379',
        HEARTBEAT_INTERVAL_MS: '1000',
        LOG_LEVEL: 'debug',
      },
      [],
    );

    expect(config.port).toBe(9000);
    expect(config.stateFile).toBe(path.join('/srv/kennel', 'kennel.json'));
    expect(config.credentialKey?.length).toBe(32);
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.heartbeatStaleMs).toBe(3_000);
    expect(config.logLevel).toBe('debug');
    expect(warnings).toEqual([]);
  });

  it('turns auto-start off from the flag or the environment', () => {
    expect(loadConfig({}, ['--no-auto-start']).config.autoStart).toBe(false);
    expect(loadConfig({ KENNEL_AUTO_START: 'false' }, []).config.autoStart).toBe(false);
  });

  it('rejects non-positive numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' }, [])).toThrow('Invalid PORT. Provide a positive integer value.');
    expect(() => loadConfig({ STOP_TIMEOUT_MS: '0' }, [])).toThrow('Invalid STOP_TIMEOUT_MS');
  });

  it('rejects a malformed credential key', () => {
    expect(() => loadConfig({ KENNEL_CREDENTIAL_KEY: 'short' }, [])).toThrow('Invalid KENNEL_CREDENTIAL_KEY');
  });

  it('warns when the stale threshold is not above the interval', () => {
    const { warnings } = loadConfig(
      { KENNEL_CREDENTIAL_KEY: KEY, HEARTBEAT_INTERVAL_MS: '1000', HEARTBEAT_STALE_MS: '1000' },
      [],
    );
    expect(warnings).toEqual([
      'HEARTBEAT_STALE_MS is not larger than HEARTBEAT_INTERVAL_MS: every heartbeat will look stale.',
    ]);
  });
});
