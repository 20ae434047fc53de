import type { BackendKind, ClientOptions, DbClient } from "./drivers/base.js";
import type { ClientFactory } from "./drivers/index.js";
import { NoConnectionError, errorMessage } from "./errors.js";
import { Mutex } from "./lock.js";
import type { Logger } from "./logger.js";

export interface ActiveConnection {
  backend: BackendKind;
  /** Connection string with the password masked. */
  target: string;
}

function maskTarget(url: string): string {
  return url.replace(/^([a-z]+:\/\/[^:/@]*):[^@]*@/i, "$1:***@");
}

/**
 * Holds at most one live client. Every operation takes the lock for its
 * whole duration; none of them nests another.
 */
export class ConnectionRegistry {
  private client: DbClient | null = null;
  private active: ActiveConnection | null = null;
  private readonly lock = new Mutex();

  constructor(
    private readonly factory: ClientFactory,
    private readonly options: ClientOptions,
    private readonly logger: Logger,
  ) {}

  get connection(): ActiveConnection | null {
    return this.active;
  }

  get isConnected(): boolean {
    return this.client !== null;
  }

  /**
   * Replaces the current client. The slot is emptied before the new client
   * is opened, so a failed connect leaves no client behind.
   */
  connect(kind: BackendKind, url: string): Promise<void> {
    return this.lock.run(async () => {
      await this.clearSlot();
      const target = maskTarget(url);
      this.logger.info(`Connecting to ${kind} at ${target}`);
      this.client = await this.factory(kind, url, this.options);
      this.active = { backend: kind, target };
    });
  }

  disconnect(): Promise<void> {
    return this.lock.run(() => this.clearSlot());
  }

  /**
   * One-line summary for the debug view: the masked target and whether the
   * client still answers a ping.
   */
  status(): Promise<string> {
    return this.lock.run(async () => {
      if (!this.client || !this.active) return "not connected";
      const alive = await this.client.ping().catch(() => false);
      return `${alive ? "connected" : "disconnected"} (${this.active.backend} at ${this.active.target})`;
    });
  }

  /** Runs `fn` against the live client while holding the lock. */
  use<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      if (!this.client) throw new NoConnectionError();
      return fn(this.client);
    });
  }

  private async clearSlot(): Promise<void> {
    const previous = this.client;
    this.client = null;
    this.active = null;
    if (!previous) return;
    try {
      await previous.close();
      this.logger.info(`Closed ${previous.backend} connection`);
    } catch (e) {
      this.logger.warn(`Closing previous ${previous.backend} connection failed: ${errorMessage(e)}`);
    }
  }
}
