import type { CredentialId, InstanceId, TemplateId } from './ids.js';
import type { FeatureFlags } from './template.js';

/** Observed lifecycle of a worker, derived from the live registry. */
export type LifecycleState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/** Operator intent, persisted. Never read back as a fact about a live task. */
export type DesiredState = 'running' | 'stopped';

export interface InstanceConfig {
  instanceId: InstanceId;
  name: string;
  templateId: TemplateId;
  credentialId: CredentialId;
  personalityOverride: string | null;
  // Seed copied from the template at create time; template edits never reach back here.
  personality: string | null;
  features: FeatureFlags;
  settings: Record<string, string>;
  autoStart: boolean;
  desiredState: DesiredState;
  lastObservedState: LifecycleState;
  createdAt: string;
  updatedAt: string;
}

export interface InstanceCreateInput {
  /** Generated when omitted. */
  instanceId?: string;
  name: string;
  templateId: string;
  credentialId: string;
  personalityOverride?: string | null;
  autoStart?: boolean;
  settings?: Record<string, string>;
}

export interface InstanceUpdateInput {
  name?: string;
  credentialId?: string;
  personalityOverride?: string | null;
  features?: Partial<FeatureFlags>;
  settings?: Record<string, string>;
  autoStart?: boolean;
}

export interface GatewayStats {
  guildCount: number;
  userCount: number;
  latencyMs: number;
}

/** What `status()` and `list()` report. Every field comes from runtime state. */
export interface InstanceStatus {
  instanceId: InstanceId;
  name: string;
  templateId: TemplateId;
  credentialId: CredentialId;
  autoStart: boolean;
  desiredState: DesiredState;
  state: LifecycleState;
  isolationPath: string | null;
  startedAt: string | null;
  lastHeartbeat: string | null;
  heartbeatStale: boolean;
  lastError: string | null;
  gateway: GatewayStats | null;
  createdAt: string;
}

export interface SystemStats {
  totalInstances: number;
  runningInstances: number;
  erroredInstances: number;
  totalGuilds: number;
  totalUsers: number;
  uptimeSeconds: number;
}
