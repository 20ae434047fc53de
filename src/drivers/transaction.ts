import type { Transaction } from "./base.js";
import { TransactionError, errorMessage, toTransactionError } from "../errors.js";
import type { Logger } from "../logger.js";

/** Backend-specific operations on the one connection a transaction owns. */
export interface TransactionAdapter {
  execute(sql: string): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Hand the connection back to the pool. Called exactly once. */
  release(): void;
}

export class ScopedTransaction implements Transaction {
  private current: Transaction["state"] = "open";
  /** Set as soon as commit or rollback starts; the handle is consumed from then on. */
  private finishing = false;

  constructor(
    private readonly adapter: TransactionAdapter,
    private readonly onFinish: (tx: ScopedTransaction) => void,
  ) {}

  get state(): Transaction["state"] {
    return this.current;
  }

  get isFinishing(): boolean {
    return this.finishing;
  }

  async execute(sql: string): Promise<void> {
    this.ensureOpen("execute");
    try {
      await this.adapter.execute(sql);
    } catch (e) {
      throw toTransactionError(e);
    }
  }

  async commit(): Promise<void> {
    this.ensureOpen("commit");
    this.finishing = true;
    try {
      await this.adapter.commit();
      this.finish("committed");
    } catch (e) {
      this.finish("rolled-back");
      throw toTransactionError(e);
    }
  }

  async rollback(): Promise<void> {
    this.ensureOpen("rollback");
    this.finishing = true;
    try {
      await this.adapter.rollback();
    } catch (e) {
      throw toTransactionError(e);
    } finally {
      this.finish("rolled-back");
    }
  }

  private ensureOpen(op: string): void {
    if (this.current !== "open") {
      throw new TransactionError(`Cannot ${op}: transaction already ${this.current}.`);
    }
    if (this.finishing) {
      throw new TransactionError(`Cannot ${op}: transaction is already finishing.`);
    }
  }

  private finish(state: "committed" | "rolled-back"): void {
    this.current = state;
    this.adapter.release();
    this.onFinish(this);
  }
}

/**
 * Transactions a client has handed out and not yet seen finished. `close`
 * on the client rolls every one of them back before the pool goes away.
 */
export class OpenTransactions {
  private readonly open = new Set<ScopedTransaction>();

  constructor(private readonly logger: Logger) {}

  begin(adapter: TransactionAdapter): ScopedTransaction {
    const tx = new ScopedTransaction(adapter, (done) => this.open.delete(done));
    this.open.add(tx);
    return tx;
  }

  get size(): number {
    return this.open.size;
  }

  async rollbackAll(): Promise<void> {
    for (const tx of [...this.open]) {
      if (tx.isFinishing) continue;
      try {
        await tx.rollback();
        this.logger.info("Rolled back unfinished transaction on close");
      } catch (e) {
        this.logger.warn(`Rollback of unfinished transaction failed: ${errorMessage(e)}`);
      }
    }
  }
}
