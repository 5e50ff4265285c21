import { describe, expect, it } from 'vitest';
import { credentialId, instanceId, templateId } from '../../../src/common/types/ids.js';
import type { InstanceConfig } from '../../../src/common/types/instance.js';
import { planBoot, planReload } from '../../../src/orchestrator/reconciler.js';
import { resolveProfile, sameProfile, seedFromTemplate } from '../../../src/orchestrator/profile.js';
import type { StateDocument } from '../../../src/store/state-document.js';
import { seedDocument } from '../../helpers/fakes.js';

function config(id: string, overrides: Partial<InstanceConfig> = {}): InstanceConfig {
  return {
    instanceId: instanceId(id),
    name: id,
    templateId: templateId('t1'),
    credentialId: credentialId('cred-a'),
    personalityOverride: null,
    personality: 'caveman',
    features: { semanticSearch: true, webSearch: false, localModel: false },
    settings: {},
    autoStart: false,
    desiredState: 'running',
    lastObservedState: 'running',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function doc(instances: InstanceConfig[], edit: (d: StateDocument) => void = () => undefined): StateDocument {
  const d = { ...seedDocument(), instances };
  edit(d);
  return d;
}

describe('planReload', () => {
  it('plans nothing for an identical document', () => {
    expect(planReload(doc([config('a')]), doc([config('a')]))).toEqual([]);
  });

  it('ignores bookkeeping fields', () => {
    const next = config('a', { lastObservedState: 'error', updatedAt: '2026-02-02T00:00:00.000Z' });
    expect(planReload(doc([config('a')]), doc([next]))).toEqual([]);
  });

  it('removes instances that disappeared', () => {
    expect(planReload(doc([config('a')]), doc([]))).toEqual([{ kind: 'remove', instanceId: 'a' }]);
  });

  it('starts added instances only when they should run', () => {
    const added = [config('up'), config('down', { desiredState: 'stopped' })];
    expect(planReload(doc([]), doc(added))).toEqual([{ kind: 'start', instanceId: 'up' }]);
  });

  it('restarts on a credential reference change', () => {
    const next = config('a', { credentialId: credentialId('cred-b') });
    expect(planReload(doc([config('a')]), doc([next]))).toEqual([
      { kind: 'restart', instanceId: 'a', reason: 'credential reference changed' },
    ]);
  });

  it('restarts on a rotated secret', () => {
    const next = doc([config('a')], (d) => {
      const record = d.credentials.find((c) => c.credentialId === 'cred-a');
      if (record) record.secret = 'test-secret-rotated';
    });
    expect(planReload(doc([config('a')]), next)).toEqual([
      { kind: 'restart', instanceId: 'a', reason: 'credential secret changed' },
    ]);
  });

  it('stops before anything else when desired state flips to stopped', () => {
    const next = config('a', { desiredState: 'stopped', credentialId: credentialId('cred-b') });
    expect(planReload(doc([config('a')]), doc([next]))).toEqual([{ kind: 'stop', instanceId: 'a' }]);
  });

  it('starts when desired state flips to running', () => {
    const prev = config('a', { desiredState: 'stopped' });
    expect(planReload(doc([prev]), doc([config('a')]))).toEqual([{ kind: 'start', instanceId: 'a' }]);
  });

  it('applies other field changes in place', () => {
    const next = config('a', { name: 'Renamed', settings: { MODE: 'loud' } });
    expect(planReload(doc([config('a')]), doc([next]))).toEqual([
      { kind: 'apply', instanceId: 'a', fields: ['name', 'settings'] },
    ]);
  });
});

describe('planBoot', () => {
  it('picks autoStart instances regardless of recorded state', () => {
    const instances = [
      config('auto', { autoStart: true, lastObservedState: 'running' }),
      config('manual', { autoStart: false, desiredState: 'running' }),
      config('auto-stopped', { autoStart: true, desiredState: 'stopped', lastObservedState: 'stopped' }),
    ];
    expect(planBoot(instances)).toEqual(['auto', 'auto-stopped']);
  });
});

describe('profile', () => {
  it('lets instance settings override the template seed', () => {
    const template = seedDocument().templates[0];
    if (!template) throw new Error('seed has no template');

    expect(seedFromTemplate(template, { LANGUAGE: 'fr', EXTRA: '1' })).toEqual({
      personality: 'caveman',
      features: { semanticSearch: true, webSearch: false, localModel: false },
      settings: { LANGUAGE: 'fr', EXTRA: '1' },
    });
  });

  it('prefers the personality override', () => {
    expect(resolveProfile(config('a', { personalityOverride: 'football_lad' })).personality).toBe('football_lad');
    expect(resolveProfile(config('a')).personality).toBe('caveman');
  });

  it('compares profiles by value', () => {
    expect(sameProfile(resolveProfile(config('a')), resolveProfile(config('b', { name: 'Other' })))).toBe(true);
    expect(
      sameProfile(resolveProfile(config('a')), resolveProfile(config('a', { settings: { MODE: 'loud' } }))),
    ).toBe(false);
  });
});
