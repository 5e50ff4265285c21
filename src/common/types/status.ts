import type { InstanceId } from './ids.js';
import type { LifecycleState } from './instance.js';

export interface TransitionEvent {
  type: 'transition';
  instanceId: InstanceId;
  oldState: LifecycleState;
  newState: LifecycleState;
  timestamp: string;
  reason?: string;
}

export type ConfigEntity = 'instance' | 'template' | 'credential';
export type ConfigAction = 'created' | 'updated' | 'deleted' | 'deactivated' | 'reloaded';

export interface ConfigEvent {
  type: 'config';
  entity: ConfigEntity;
  action: ConfigAction;
  id: string;
  timestamp: string;
}

export type StatusEvent = TransitionEvent | ConfigEvent;
