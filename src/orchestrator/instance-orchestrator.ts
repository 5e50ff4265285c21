import { v4 as uuidv4 } from 'uuid';
import { settlesWithin, KeyedSerializer } from '../common/async.js';
import {
  ConfigError,
  ConnectError,
  CredentialInUseError,
  KennelError,
  describeError,
} from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import type {
  ChatGatewayClient,
  GatewayConnection,
  InstanceIdentity,
  KnowledgeStore,
  PersonalityEngine,
  StorageHandle,
} from '../common/types/collaborators.js';
import { credentialId, instanceId, type CredentialId, type InstanceId } from '../common/types/ids.js';
import type {
  DesiredState,
  GatewayStats,
  InstanceConfig,
  InstanceCreateInput,
  InstanceStatus,
  InstanceUpdateInput,
  LifecycleState,
  SystemStats,
} from '../common/types/instance.js';
import type { ConfigEvent } from '../common/types/status.js';
import type { InstanceConfigPatch, InstanceConfigStore } from '../store/instance-config-store.js';
import type { StateDocument } from '../store/state-document.js';
import type { TemplateStore } from '../store/template-store.js';
import type { TokenVault } from '../store/token-vault.js';
import type { StatusBus } from '../status/status-bus.js';
import { deriveIsolationPath } from './isolation.js';
import { assertTransition } from './lifecycle.js';
import { resolveProfile, sameProfile, seedFromTemplate } from './profile.js';
import { planBoot, planReload, type ReloadAction } from './reconciler.js';
import { Supervisor } from './supervisor.js';

export interface OrchestratorDeps {
  configs: InstanceConfigStore;
  templates: TemplateStore;
  vault: TokenVault;
  knowledge: KnowledgeStore;
  personalities: PersonalityEngine;
  gateway: ChatGatewayClient;
  bus: StatusBus;
  logger: Logger;
}

export interface OrchestratorOptions {
  dataDir: string;
  stopTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatStaleMs: number;
  now?: () => number;
}

export interface BootReport {
  started: InstanceId[];
  failed: { instanceId: InstanceId; reason: string }[];
}

/** One entry per instance that currently has a worker task. */
interface LiveInstance {
  config: InstanceConfig;
  state: LifecycleState;
  generation: number;
  isolationPath: string;
  abort: AbortController;
  storage: StorageHandle | null;
  connection: GatewayConnection | null;
  supervisor: Supervisor | null;
  startedAt: number;
}

interface StopOptions {
  /** Record `desiredState: stopped` on the config. Off for shutdown and for configs removed on disk. */
  persist: boolean;
}

/**
 * InstanceOrchestrator: owns every running worker in the process.
 *
 * Observed state lives in the live registry and the fault table, never in the
 * config store: an instance is `running` only while a connection exists for
 * it. Every lifecycle operation for one instance is serialized, so start,
 * stop, restart, delete, update, crash handling and reload actions never
 * interleave on the same id. Different instances proceed concurrently.
 */
export class InstanceOrchestrator {
  private readonly live = new Map<InstanceId, LiveInstance>();
  private readonly faults = new Map<InstanceId, string>();
  private readonly serial = new KeyedSerializer<InstanceId>();
  private readonly now: () => number;
  private readonly bootedAt: number;
  private readonly logger: Logger;
  private generation = 0;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.bootedAt = this.now();
    this.logger = deps.logger.child({ component: 'orchestrator' });
  }

  // ─── Queries ───────────────────────────────────────────────────

  status(id: InstanceId): InstanceStatus {
    return this.describe(this.deps.configs.get(id));
  }

  list(): InstanceStatus[] {
    return this.deps.configs.list().map((config) => this.describe(config));
  }

  /** Ids with an open gateway connection. */
  connectedInstanceIds(): InstanceId[] {
    return [...this.live.values()].filter((i) => i.connection !== null).map((i) => i.config.instanceId);
  }

  stats(): SystemStats {
    const statuses = this.list();
    let totalGuilds = 0;
    let totalUsers = 0;
    for (const status of statuses) {
      totalGuilds += status.gateway?.guildCount ?? 0;
      totalUsers += status.gateway?.userCount ?? 0;
    }
    return {
      totalInstances: statuses.length,
      runningInstances: statuses.filter((s) => s.state === 'running').length,
      erroredInstances: statuses.filter((s) => s.state === 'error').length,
      totalGuilds,
      totalUsers,
      uptimeSeconds: Math.floor((this.now() - this.bootedAt) / 1000),
    };
  }

  // ─── Config operations ─────────────────────────────────────────

  /**
   * Persist a new instance config seeded from its template. Never starts it.
   * @throws {ConfigError} for an unknown template or unusable credential
   */
  async create(input: InstanceCreateInput): Promise<InstanceStatus> {
    const template = this.deps.templates.find(input.templateId);
    if (!template) {
      throw new ConfigError(`Unknown template reference: ${input.templateId}`);
    }
    const credential = credentialId(input.credentialId);
    this.deps.vault.assertUsable(credential);

    const createdAt = this.timestamp();
    const config: InstanceConfig = {
      instanceId: instanceId(input.instanceId ?? uuidv4()),
      name: input.name,
      templateId: template.templateId,
      credentialId: credential,
      personalityOverride: input.personalityOverride ?? null,
      ...seedFromTemplate(template, input.settings),
      autoStart: input.autoStart ?? false,
      desiredState: 'stopped',
      lastObservedState: 'stopped',
      createdAt,
      updatedAt: createdAt,
    };

    await this.deps.configs.insert(config);
    this.publishConfig('created', config.instanceId);
    this.logger.info({ instanceId: config.instanceId, templateId: template.templateId }, 'Instance created');
    return this.describe(config);
  }

  /**
   * Change an instance's config. A running instance picks up name,
   * personality, feature and setting changes in place; a new credential
   * reference restarts it. Feature flags are merged into the current ones,
   * while `settings` replaces the whole map so keys can be dropped.
   */
  update(id: InstanceId, input: InstanceUpdateInput): Promise<InstanceStatus> {
    return this.serial.run(id, async () => {
      const previous = this.deps.configs.get(id);
      const patch: InstanceConfigPatch = {};

      if (input.name !== undefined) patch.name = input.name;
      if (input.personalityOverride !== undefined) patch.personalityOverride = input.personalityOverride;
      if (input.features) patch.features = { ...previous.features, ...input.features };
      if (input.settings) patch.settings = { ...input.settings };
      if (input.autoStart !== undefined) patch.autoStart = input.autoStart;
      if (input.credentialId !== undefined && input.credentialId !== previous.credentialId) {
        const next = credentialId(input.credentialId);
        this.deps.vault.assertUsable(next);
        patch.credentialId = next;
      }

      const updated = await this.deps.configs.update(id, patch);
      this.publishConfig('updated', id);

      if (patch.credentialId !== undefined) {
        if (this.live.has(id)) await this.restartUnlocked(id, 'credential reference changed');
      } else {
        await this.applyLive(id, updated);
      }
      return this.describe(updated);
    });
  }

  /** Stop the instance if it is live, then drop its config. */
  delete(id: InstanceId): Promise<void> {
    return this.serial.run(id, async () => {
      this.deps.configs.get(id);
      await this.stopUnlocked(id, { persist: false });
      this.clearFault(id, 'deleted');
      await this.deps.configs.remove(id);
      this.publishConfig('deleted', id);
      this.logger.info({ instanceId: id }, 'Instance deleted');
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────

  /** Idempotent: starting a running instance is a no-op. */
  start(id: InstanceId): Promise<InstanceStatus> {
    return this.serial.run(id, async () => {
      await this.startUnlocked(id);
      return this.status(id);
    });
  }

  /** Idempotent: stopping an instance with no worker only records the intent. */
  stop(id: InstanceId): Promise<InstanceStatus> {
    return this.serial.run(id, async () => {
      this.deps.configs.get(id);
      await this.stopUnlocked(id, { persist: true });
      return this.status(id);
    });
  }

  /** Stop then start as one operation; nothing else on this id runs in between. */
  restart(id: InstanceId): Promise<InstanceStatus> {
    return this.serial.run(id, async () => {
      await this.restartUnlocked(id, 'restart requested');
      return this.status(id);
    });
  }

  // ─── Reconciliation ────────────────────────────────────────────

  /**
   * Start every instance flagged `autoStart`, one at a time. What the document
   * says was running last time is not consulted.
   */
  async boot(): Promise<BootReport> {
    const report: BootReport = { started: [], failed: [] };

    for (const id of planBoot(this.deps.configs.list())) {
      try {
        await this.start(id);
        report.started.push(id);
      } catch (err) {
        const reason = describeError(err);
        report.failed.push({ instanceId: id, reason });
        this.logger.warn({ instanceId: id, err: reason }, 'Auto-start failed');
      }
    }

    this.logger.info({ started: report.started.length, failed: report.failed.length }, 'Boot complete');
    return report;
  }

  /**
   * Bring live workers in line with a state document edited on disk. The
   * stores already hold `next` when this runs. Removals and stops finish
   * before anything starts, so a credential moved from one instance to
   * another is free by the time the new holder connects.
   */
  async applyReload(previous: StateDocument, next: StateDocument): Promise<void> {
    const actions = planReload(previous, next);
    this.logger.info({ actions: actions.length }, 'Applying state document reload');

    const teardown = actions.filter((action) => action.kind === 'remove' || action.kind === 'stop');
    const bringUp = actions.filter((action) => action.kind !== 'remove' && action.kind !== 'stop');
    await this.runReloadActions(teardown);
    await this.runReloadActions(bringUp);

    this.deps.bus.publish({ type: 'config', entity: 'instance', action: 'reloaded', id: '*', timestamp: this.timestamp() });
  }

  /** Stop every live worker. Desired state is left alone so the next boot sees the same intent. */
  async shutdown(): Promise<void> {
    const ids = [...this.live.keys()];
    this.logger.info({ live: ids.length }, 'Shutting down instances');
    const results = await Promise.allSettled(
      ids.map((id) => this.serial.run(id, () => this.stopUnlocked(id, { persist: false }))),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error({ err: describeError(result.reason) }, 'Instance failed to stop during shutdown');
      }
    }
  }

  // ─── Unlocked operations (caller holds the instance's slot) ────

  private async startUnlocked(id: InstanceId): Promise<void> {
    if (this.live.has(id)) return;

    // 1. Resolve references. Failures here leave no trace on the instance.
    const config = this.deps.configs.get(id);
    const credential = this.deps.vault.resolve(config.credentialId);
    const holder = this.liveHolderOf(config.credentialId);
    if (holder) throw new CredentialInUseError(config.credentialId, holder);

    // 2. Register the worker before anything async so a second start sees it.
    const profile = resolveProfile(config);
    const instance: LiveInstance = {
      config,
      state: this.faults.has(id) ? 'error' : 'stopped',
      generation: ++this.generation,
      isolationPath: deriveIsolationPath(this.options.dataDir, config.credentialId),
      abort: new AbortController(),
      storage: null,
      connection: null,
      supervisor: null,
      startedAt: this.now(),
    };
    this.faults.delete(id);
    this.live.set(id, instance);
    this.moveTo(instance, 'starting');

    // 3. Open storage, describe behavior, connect.
    try {
      instance.storage = await this.deps.knowledge.open(instance.isolationPath, {
        semanticSearch: profile.features.semanticSearch,
      });
      const behavior = await this.deps.personalities.describe(identityOf(config), profile);
      instance.connection = await this.deps.gateway.connect({
        instanceId: id,
        secret: credential.secret,
        behavior,
        storage: instance.storage,
        signal: instance.abort.signal,
      });
    } catch (err) {
      const error = err instanceof KennelError ? err : new ConnectError(id, describeError(err), err);
      instance.abort.abort(error);
      await this.releaseStorage(instance);
      this.live.delete(id);
      this.faults.set(id, error.message);
      this.moveTo(instance, 'error', error.message);
      await this.persistObserved(id, 'error', 'running');
      throw error;
    }

    // 4. Supervise.
    const generation = instance.generation;
    instance.supervisor = new Supervisor(instance.connection, {
      instanceId: id,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      now: this.now,
      onFault: (error) => {
        void this.serial
          .run(id, () => this.handleFault(id, generation, error.message))
          .catch((err: unknown) => {
            this.logger.error({ instanceId: id, err: describeError(err) }, 'Failed to record instance crash');
          });
      },
    });
    instance.startedAt = this.now();
    this.moveTo(instance, 'running');
    await this.persistObserved(id, 'running', 'running');
  }

  private async stopUnlocked(id: InstanceId, options: StopOptions): Promise<void> {
    const instance = this.live.get(id);
    if (!instance) {
      if (options.persist) await this.persistObserved(id, this.faults.has(id) ? 'error' : 'stopped', 'stopped');
      return;
    }

    this.moveTo(instance, 'stopping');
    instance.supervisor?.halt();

    const graceful = await this.disconnect(instance);
    if (!graceful) {
      this.logger.warn({ instanceId: id, timeoutMs: this.options.stopTimeoutMs }, 'Stop timed out, aborting worker');
      instance.abort.abort(new Error('stop timed out'));
    }

    await this.releaseStorage(instance);
    this.live.delete(id);
    this.moveTo(instance, 'stopped', graceful ? undefined : 'forced after stop timeout');
    if (options.persist) await this.persistObserved(id, 'stopped', 'stopped');
  }

  private async restartUnlocked(id: InstanceId, reason: string): Promise<void> {
    this.deps.configs.get(id);
    this.logger.info({ instanceId: id, reason }, 'Restarting instance');
    await this.stopUnlocked(id, { persist: false });

    await this.startRecordingRejection(id);
  }

  /**
   * Start on behalf of something other than a direct start call (restart,
   * reload). A start rejected before a worker registered publishes nothing,
   * so the rejection is recorded as a fault to keep it from looking like an
   * intentional stop.
   */
  private async startRecordingRejection(id: InstanceId): Promise<void> {
    try {
      await this.startUnlocked(id);
    } catch (err) {
      const message = describeError(err);
      if (!this.live.has(id) && this.deps.configs.find(id) && this.faults.get(id) !== message) {
        const alreadyFaulted = this.faults.has(id);
        this.faults.set(id, message);
        if (!alreadyFaulted) this.publishTransition(id, 'stopped', 'error', message);
        await this.persistObserved(id, 'error', 'running');
      }
      throw err;
    }
  }

  private async handleFault(id: InstanceId, generation: number, reason: string): Promise<void> {
    const instance = this.live.get(id);
    // The crash belongs to a worker that has since been stopped or replaced.
    if (!instance || instance.generation !== generation || instance.state !== 'running') return;

    this.logger.error({ instanceId: id, err: reason }, 'Instance crashed');
    instance.abort.abort(new Error(reason));
    await this.releaseStorage(instance);
    this.live.delete(id);
    this.faults.set(id, reason);
    this.moveTo(instance, 'error', reason);
    await this.persistObserved(id, 'error');
  }

  /** Run actions concurrently across instances; a failed action is logged and recorded, never thrown. */
  private async runReloadActions(actions: ReloadAction[]): Promise<void> {
    await Promise.all(
      actions.map((action) =>
        this.serial.run(action.instanceId, () => this.executeReloadAction(action)).catch((err: unknown) => {
          this.logger.warn(
            { instanceId: action.instanceId, action: action.kind, err: describeError(err) },
            'Reload action failed',
          );
        }),
      ),
    );
  }

  private async executeReloadAction(action: ReloadAction): Promise<void> {
    const id = action.instanceId;
    switch (action.kind) {
      case 'remove':
        await this.stopUnlocked(id, { persist: false });
        this.clearFault(id, 'config removed');
        return;
      case 'stop':
        await this.stopUnlocked(id, { persist: false });
        return;
      case 'start':
        await this.startRecordingRejection(id);
        return;
      case 'restart':
        if (this.live.has(id)) {
          await this.restartUnlocked(id, action.reason);
        } else if (this.deps.configs.get(id).desiredState === 'running') {
          await this.startRecordingRejection(id);
        }
        return;
      case 'apply':
        await this.applyLive(id, this.deps.configs.get(id));
        return;
    }
  }

  /** Hand a changed config to a running worker without reconnecting it. */
  private async applyLive(id: InstanceId, config: InstanceConfig): Promise<void> {
    const instance = this.live.get(id);
    if (!instance) return;

    const before = resolveProfile(instance.config);
    const after = resolveProfile(config);
    // The display name travels in the behavior descriptor too.
    const renamed = instance.config.name !== config.name;
    instance.config = config;
    if ((!renamed && sameProfile(before, after)) || !instance.connection) return;

    try {
      const behavior = await this.deps.personalities.describe(identityOf(config), after);
      await instance.connection.reconfigure(behavior);
      this.logger.info({ instanceId: id }, 'Applied profile change to running instance');
    } catch (err) {
      this.logger.warn({ instanceId: id, err: describeError(err) }, 'Live profile change failed, restart to apply');
    }
  }

  // ─── Helpers ───────────────────────────────────────────────────

  /** Resolves true if the worker ended within the stop timeout. */
  private async disconnect(instance: LiveInstance): Promise<boolean> {
    const connection = instance.connection;
    if (!connection) return true;
    const ended = instance.supervisor?.task ?? connection.closed;
    const timeoutMs = this.options.stopTimeoutMs;

    try {
      return await settlesWithin(
        connection.disconnect(timeoutMs).then(() => ended),
        timeoutMs,
      );
    } catch (err) {
      this.logger.warn({ instanceId: instance.config.instanceId, err: describeError(err) }, 'Disconnect failed');
      return false;
    }
  }

  private async releaseStorage(instance: LiveInstance): Promise<void> {
    const storage = instance.storage;
    instance.storage = null;
    if (!storage) return;
    try {
      await storage.close();
    } catch (err) {
      this.logger.warn({ instanceId: instance.config.instanceId, err: describeError(err) }, 'Failed to close storage');
    }
  }

  private liveHolderOf(credential: CredentialId): InstanceId | null {
    for (const instance of this.live.values()) {
      if (instance.config.credentialId === credential) return instance.config.instanceId;
    }
    return null;
  }

  private clearFault(id: InstanceId, reason: string): void {
    if (this.faults.delete(id)) this.publishTransition(id, 'error', 'stopped', reason);
  }

  private moveTo(instance: LiveInstance, to: LifecycleState, reason?: string): void {
    const from = instance.state;
    assertTransition(instance.config.instanceId, from, to);
    instance.state = to;
    this.publishTransition(instance.config.instanceId, from, to, reason);
  }

  private publishTransition(id: InstanceId, from: LifecycleState, to: LifecycleState, reason?: string): void {
    this.deps.bus.publish({
      type: 'transition',
      instanceId: id,
      oldState: from,
      newState: to,
      timestamp: this.timestamp(),
      ...(reason !== undefined ? { reason } : {}),
    });
  }

  private publishConfig(action: ConfigEvent['action'], id: InstanceId): void {
    this.deps.bus.publish({ type: 'config', entity: 'instance', action, id, timestamp: this.timestamp() });
  }

  /**
   * Record what was observed, and optionally the new intent. Informational
   * only, so a failed write is logged rather than failing the operation.
   */
  private async persistObserved(id: InstanceId, observed: LifecycleState, desired?: DesiredState): Promise<void> {
    const patch: InstanceConfigPatch = { lastObservedState: observed };
    if (desired) patch.desiredState = desired;
    try {
      await this.deps.configs.update(id, patch);
    } catch (err) {
      this.logger.warn({ instanceId: id, err: describeError(err) }, 'Failed to persist instance state');
    }
  }

  private describe(config: InstanceConfig): InstanceStatus {
    const id = config.instanceId;
    const instance = this.live.get(id);
    const fault = this.faults.get(id) ?? null;
    const heartbeat = instance?.supervisor?.lastHeartbeat ?? null;

    return {
      instanceId: id,
      name: config.name,
      templateId: config.templateId,
      credentialId: config.credentialId,
      autoStart: config.autoStart,
      desiredState: config.desiredState,
      state: instance?.state ?? (fault !== null ? 'error' : 'stopped'),
      isolationPath: instance?.isolationPath ?? null,
      startedAt: instance ? new Date(instance.startedAt).toISOString() : null,
      lastHeartbeat: heartbeat !== null ? new Date(heartbeat).toISOString() : null,
      heartbeatStale: instance?.supervisor?.isStale(this.options.heartbeatStaleMs) ?? false,
      lastError: fault,
      gateway: instance?.connection ? this.gatewayStats(id, instance.connection) : null,
      createdAt: config.createdAt,
    };
  }

  private gatewayStats(id: InstanceId, connection: GatewayConnection): GatewayStats | null {
    if (!connection.stats) return null;
    try {
      return connection.stats();
    } catch (err) {
      this.logger.debug({ instanceId: id, err: describeError(err) }, 'Gateway stats unavailable');
      return null;
    }
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function identityOf(config: InstanceConfig): InstanceIdentity {
  return { instanceId: config.instanceId, name: config.name, credentialId: config.credentialId };
}
