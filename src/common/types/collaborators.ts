import type { CredentialId, InstanceId } from './ids.js';
import type { FeatureFlags } from './template.js';
import type { GatewayStats } from './instance.js';

/**
 * Ports the orchestrator consumes. The orchestrator depends on these
 * abstractions, never on discord.js or the filesystem directly, so tests can
 * swap in in-process fakes and alternate behavior sources can be plugged in.
 */

// ─── Knowledge Store ───────────────────────────────────────────

export interface StorageHandle {
  readonly path: string;
  close(): Promise<void>;
}

export interface KnowledgeStore {
  open(isolatedPath: string, options: { semanticSearch: boolean }): Promise<StorageHandle>;
}

// ─── Personality Engine ────────────────────────────────────────

export interface InstanceIdentity {
  instanceId: InstanceId;
  name: string;
  credentialId: CredentialId;
}

export interface BehaviorDescriptor {
  personaId: string;
  displayName: string;
  traits: string[];
  /** Adaptive personas evolve per server instead of staying fixed. */
  evolving: boolean;
  features: FeatureFlags;
  settings: Record<string, string>;
}

export interface PersonalityEngine {
  describe(
    identity: InstanceIdentity,
    profile: { personality: string | null; features: FeatureFlags; settings: Record<string, string> },
  ): Promise<BehaviorDescriptor>;
}

// ─── Chat Gateway Client ───────────────────────────────────────

export interface ConnectRequest {
  instanceId: InstanceId;
  secret: string;
  behavior: BehaviorDescriptor;
  storage: StorageHandle;
  /** Aborted when a stop overruns its timeout. The connection must tear itself down. */
  signal: AbortSignal;
}

export interface GatewayConnection {
  /**
   * Settles when the connection ends. Rejects on a fault; resolving while the
   * orchestrator did not ask for a disconnect is treated as a fault too.
   */
  readonly closed: Promise<void>;
  isReady(): boolean;
  disconnect(timeoutMs: number): Promise<void>;
  reconfigure(behavior: BehaviorDescriptor): Promise<void>;
  stats?(): GatewayStats;
}

export interface ChatGatewayClient {
  connect(request: ConnectRequest): Promise<GatewayConnection>;
}
