import { CrashError, describeError } from '../common/errors/index.js';
import type { GatewayConnection } from '../common/types/collaborators.js';
import type { InstanceId } from '../common/types/ids.js';

export interface SupervisorOptions {
  instanceId: InstanceId;
  heartbeatIntervalMs: number;
  now: () => number;
  /** Called at most once, when the connection ends without `halt()` having been called. */
  onFault: (error: CrashError) => void;
}

/**
 * Watches one live connection. Records a heartbeat on every interval tick the
 * connection reports ready, and turns an unrequested end of the connection
 * into a CrashError.
 */
export class Supervisor {
  /** Settles when the connection ends. Never rejects. */
  readonly task: Promise<void>;
  private halted = false;
  private heartbeat: number;
  private readonly timer: NodeJS.Timeout;

  constructor(
    private readonly connection: GatewayConnection,
    private readonly options: SupervisorOptions,
  ) {
    this.heartbeat = options.now();
    this.timer = setInterval(() => this.beat(), options.heartbeatIntervalMs);
    this.timer.unref();
    this.task = connection.closed.then(
      () => this.settle('connection closed unexpectedly'),
      (err: unknown) => this.settle(describeError(err), err),
    );
  }

  get lastHeartbeat(): number {
    return this.heartbeat;
  }

  isStale(staleMs: number): boolean {
    return this.options.now() - this.heartbeat > staleMs;
  }

  /** The connection is being shut down on purpose; its end is no longer a fault. */
  halt(): void {
    this.halted = true;
    clearInterval(this.timer);
  }

  private beat(): void {
    if (!this.halted && this.connection.isReady()) {
      this.heartbeat = this.options.now();
    }
  }

  private settle(reason: string, cause?: unknown): void {
    clearInterval(this.timer);
    if (this.halted) return;
    this.halted = true;
    this.options.onFault(new CrashError(this.options.instanceId, reason, cause));
  }
}
