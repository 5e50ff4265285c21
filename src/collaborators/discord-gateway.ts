import { ActivityType, Client, Events, GatewayIntentBits } from 'discord.js';
import { settlesWithin } from '../common/async.js';
import { describeError } from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import type {
  BehaviorDescriptor,
  ChatGatewayClient,
  ConnectRequest,
  GatewayConnection,
} from '../common/types/collaborators.js';
import type { GatewayStats } from '../common/types/instance.js';

const DEFAULT_READY_TIMEOUT_MS = 30_000;

/** Chat gateway backed by one discord.js client per connection. */
export class DiscordGatewayClient implements ChatGatewayClient {
  constructor(
    private readonly logger: Logger,
    private readonly readyTimeoutMs: number = DEFAULT_READY_TIMEOUT_MS,
  ) {}

  async connect(request: ConnectRequest): Promise<GatewayConnection> {
    const client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages],
    });
    const connection = new DiscordConnection(client, this.logger.child({ instanceId: request.instanceId }));
    await connection.open(request, this.readyTimeoutMs);
    return connection;
  }
}

class DiscordConnection implements GatewayConnection {
  readonly closed: Promise<void>;
  private resolveClosed: () => void = () => undefined;
  private rejectClosed: (err: unknown) => void = () => undefined;
  private stopping = false;
  private settled = false;
  private failure: Error | null = null;

  constructor(
    private readonly client: Client,
    private readonly logger: Logger,
  ) {
    this.closed = new Promise<void>((resolve, reject) => {
      this.resolveClosed = resolve;
      this.rejectClosed = reject;
    });
  }

  async open(request: ConnectRequest, readyTimeoutMs: number): Promise<void> {
    const ready = new Promise<void>((resolve) => {
      this.client.once(Events.ClientReady, () => resolve());
    });

    try {
      await this.client.login(request.secret);
    } catch (err) {
      await this.client.destroy();
      throw err;
    }
    if (!(await settlesWithin(ready, readyTimeoutMs))) {
      await this.client.destroy();
      throw new Error(`gateway not ready after ${readyTimeoutMs}ms`);
    }

    // Fatal events only count once the session is up; before that they fail login.
    this.client.on(Events.Invalidated, () => this.fail(new Error('gateway session invalidated')));
    this.client.on(Events.ShardDisconnect, (event) => {
      this.fail(new Error(`gateway closed with code ${event.code}`));
    });
    this.client.on(Events.Error, (err) => {
      this.logger.warn({ err: err.message }, 'Gateway client error');
    });
    request.signal.addEventListener('abort', () => {
      this.abort(new Error(`worker aborted: ${describeError(request.signal.reason)}`));
    }, { once: true });

    this.applyPresence(request.behavior);
    this.logger.info({ user: this.client.user?.tag, persona: request.behavior.personaId }, 'Gateway connected');
  }

  isReady(): boolean {
    return !this.stopping && !this.settled && this.client.isReady();
  }

  async disconnect(timeoutMs: number): Promise<void> {
    if (this.stopping || this.settled) return;
    this.stopping = true;
    const done = await settlesWithin(this.client.destroy(), timeoutMs);
    if (!done) this.logger.warn({ timeoutMs }, 'Gateway destroy still pending');
    this.settle(null);
  }

  async reconfigure(behavior: BehaviorDescriptor): Promise<void> {
    this.applyPresence(behavior);
  }

  stats(): GatewayStats {
    let userCount = 0;
    for (const guild of this.client.guilds.cache.values()) {
      userCount += guild.memberCount;
    }
    return {
      guildCount: this.client.guilds.cache.size,
      userCount,
      latencyMs: this.client.ws.ping,
    };
  }

  private applyPresence(behavior: BehaviorDescriptor): void {
    this.client.user?.setPresence({
      activities: [{ name: behavior.displayName, type: ActivityType.Playing }],
      status: 'online',
    });
  }

  private fail(error: Error): void {
    if (this.stopping || this.settled) return;
    this.stopping = true;
    this.failure = error;
    this.logger.error({ err: error.message }, 'Gateway connection lost');
    void this.client.destroy().then(
      () => this.settle(error),
      (err: unknown) => {
        this.logger.warn({ err: describeError(err) }, 'Gateway destroy failed');
        this.settle(error);
      },
    );
  }

  /** Forced cancellation: tears the client down even while a disconnect is still pending. */
  private abort(error: Error): void {
    if (this.settled) return;
    const requested = this.stopping;
    this.stopping = true;
    this.logger.warn({ err: error.message, requested }, 'Gateway connection aborted');
    this.client.destroy().catch((err: unknown) => {
      this.logger.warn({ err: describeError(err) }, 'Gateway destroy failed');
    });
    this.settle(this.failure ?? (requested ? null : error));
  }

  private settle(error: Error | null): void {
    if (this.settled) return;
    this.settled = true;
    if (error) this.rejectClosed(error);
    else this.resolveClosed();
  }
}
