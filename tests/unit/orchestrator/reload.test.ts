import { writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { credentialId, instanceId, templateId } from '../../../src/common/types/ids.js';
import type { InstanceConfig } from '../../../src/common/types/instance.js';
import { serializeStateDocument, type StateDocument } from '../../../src/store/state-document.js';
import { createHarness, seedDocument, transitionsOf, type Harness } from '../../helpers/fakes.js';

const A = instanceId('a');

function instanceRecord(id: string, cred: string, overrides: Partial<InstanceConfig> = {}): InstanceConfig {
  return {
    instanceId: instanceId(id),
    name: `Bot ${id}`,
    templateId: templateId('t1'),
    credentialId: credentialId(cred),
    personalityOverride: null,
    personality: 'caveman',
    features: { semanticSearch: true, webSearch: false, localModel: false },
    settings: {},
    autoStart: false,
    desiredState: 'stopped',
    lastObservedState: 'stopped',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('state document reload', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.orchestrator.create({ instanceId: 'a', name: 'Alpha', templateId: 't1', credentialId: 'cred-a' });
    await h.orchestrator.start(A);
  });

  afterEach(async () => {
    await h.cleanup();
  });

  /** Hand-edit the file, let the store pick it up, then reconcile. */
  async function editOnDisk(edit: (doc: StateDocument) => void): Promise<void> {
    const previous = h.document.snapshot();
    const next = h.document.snapshot();
    edit(next);
    await writeFile(h.stateFile, serializeStateDocument(next));
    expect(await h.document.reload()).toBe(true);
    await h.orchestrator.applyReload(previous, h.document.snapshot());
  }

  function instanceIn(doc: StateDocument, id: string): InstanceConfig {
    const config = doc.instances.find((i) => i.instanceId === id);
    if (!config) throw new Error(`no instance ${id} in document`);
    return config;
  }

  it('keeps the same task when only the display name changes', async () => {
    const connection = h.gateway.last();

    await editOnDisk((doc) => {
      instanceIn(doc, 'a').name = 'Renamed';
    });

    expect(h.gateway.connections).toHaveLength(1);
    expect(connection.ready).toBe(true);
    expect(h.orchestrator.status(A).state).toBe('running');
    expect(h.orchestrator.status(A).name).toBe('Renamed');
    expect(connection.behaviors.map((b) => b.displayName)).toEqual(['Alpha', 'Renamed']);
    expect(transitionsOf(h.events, 'a')).toEqual(['stopped→starting', 'starting→running']);
  });

  it('reconfigures the running connection on a personality change', async () => {
    await editOnDisk((doc) => {
      instanceIn(doc, 'a').personalityOverride = 'football_lad';
    });

    expect(h.gateway.connections).toHaveLength(1);
    expect(h.gateway.last().behaviors.map((b) => b.personaId)).toEqual(['caveman', 'football_lad']);
  });

  it('restarts when the credential reference changes', async () => {
    const old = h.gateway.last();

    await editOnDisk((doc) => {
      instanceIn(doc, 'a').credentialId = credentialId('cred-b');
    });

    expect(old.disconnectCalls).toBe(1);
    expect(h.gateway.connections).toHaveLength(2);
    expect(h.gateway.last().request.secret).toBe('test-secret-b');
    expect(h.orchestrator.status(A).state).toBe('running');
  });

  it('restarts when the credential secret is rotated', async () => {
    await editOnDisk((doc) => {
      const record = doc.credentials.find((c) => c.credentialId === 'cred-a');
      if (record) record.secret = 'test-secret-rotated';
    });

    expect(h.gateway.connections).toHaveLength(2);
    expect(h.gateway.last().request.secret).toBe('test-secret-rotated');
  });

  it('stops an instance whose config was removed', async () => {
    await editOnDisk((doc) => {
      doc.instances = doc.instances.filter((i) => i.instanceId !== 'a');
    });

    expect(h.orchestrator.connectedInstanceIds()).toEqual([]);
    expect(h.gateway.openConnections()).toHaveLength(0);
    expect(h.orchestrator.list()).toEqual([]);
  });

  it('stops an instance whose desired state was set to stopped', async () => {
    await editOnDisk((doc) => {
      instanceIn(doc, 'a').desiredState = 'stopped';
    });

    expect(h.orchestrator.status(A).state).toBe('stopped');
    expect(h.orchestrator.connectedInstanceIds()).toEqual([]);
  });

  it('starts a newly added instance that should be running', async () => {
    await editOnDisk((doc) => {
      doc.instances.push(instanceRecord('fresh', 'cred-b', { desiredState: 'running' }));
    });

    expect(h.orchestrator.status(instanceId('fresh')).state).toBe('running');
    expect(h.gateway.connections).toHaveLength(2);
  });

  it('hands a credential from a removed instance to its replacement', async () => {
    const old = h.gateway.last();

    await editOnDisk((doc) => {
      doc.instances = [instanceRecord('a2', 'cred-a', { desiredState: 'running' })];
    });

    expect(old.disconnectCalls).toBe(1);
    expect(h.orchestrator.status(instanceId('a2'))).toMatchObject({ state: 'running', lastError: null });
    expect(h.gateway.last().request.secret).toBe('test-secret-a');
    expect(transitionsOf(h.events, 'a2')).toEqual(['stopped→starting', 'starting→running']);
  });

  it('records a start the reload could not make as an error', async () => {
    await editOnDisk((doc) => {
      doc.instances.push(instanceRecord('retired', 'cred-off', { desiredState: 'running' }));
    });

    const status = h.orchestrator.status(instanceId('retired'));
    expect(status.state).toBe('error');
    expect(status.lastError).toBe('Credential cred-off is inactive');
    expect(transitionsOf(h.events, 'retired')).toEqual(['stopped→error']);
    expect(h.configs.get(instanceId('retired')).lastObservedState).toBe('error');
  });

  it('leaves a newly added stopped instance alone', async () => {
    await editOnDisk((doc) => {
      doc.instances.push(instanceRecord('idle', 'cred-b'));
    });

    expect(h.orchestrator.status(instanceId('idle')).state).toBe('stopped');
    expect(h.gateway.connections).toHaveLength(1);
  });

  it('ignores an edit that fails validation', async () => {
    await writeFile(h.stateFile, '{ "version": 1, "instances": [ { "instanceId": "" } ] }');

    expect(await h.document.reload()).toBe(false);
    expect(h.configs.get(A).name).toBe('Alpha');
    expect(h.orchestrator.status(A).state).toBe('running');
  });

  it('does not treat its own writes as edits', async () => {
    await h.orchestrator.update(A, { name: 'Self-written' });

    expect(await h.document.reload()).toBe(false);
  });
});

describe('boot', () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  it('starts autoStart instances even when the document says they were running', async () => {
    h = await createHarness({}, () => ({
      ...seedDocument(),
      instances: [
        instanceRecord('auto', 'cred-a', { autoStart: true, desiredState: 'running', lastObservedState: 'running' }),
        instanceRecord('manual', 'cred-b', { autoStart: false, desiredState: 'running', lastObservedState: 'running' }),
      ],
    }));

    const report = await h.orchestrator.boot();

    expect(report).toEqual({ started: ['auto'], failed: [] });
    expect(h.gateway.connections).toHaveLength(1);
    expect(h.orchestrator.status(instanceId('auto')).state).toBe('running');
    expect(h.orchestrator.status(instanceId('manual')).state).toBe('stopped');
  });

  it('reports failures and keeps going', async () => {
    h = await createHarness({}, () => ({
      ...seedDocument(),
      instances: [
        instanceRecord('broken', 'cred-off', { autoStart: true }),
        instanceRecord('fine', 'cred-a', { autoStart: true }),
      ],
    }));

    const report = await h.orchestrator.boot();

    expect(report.started).toEqual(['fine']);
    expect(report.failed).toEqual([{ instanceId: 'broken', reason: 'Credential cred-off is inactive' }]);
    expect(h.orchestrator.status(instanceId('broken')).state).toBe('stopped');
  });
});
