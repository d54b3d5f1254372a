import * as crypto from "crypto";
import type { TransactionAction, TransactionRecord } from "../contracts";

export type { TransactionAction, TransactionRecord };

/**
 * Ordered log of the mutations a run attempted. `dryRun` is fixed at
 * creation; every attempt is recorded either way, the caller decides
 * whether it was actually performed.
 */
export class TransactionBuilder {
  readonly id: string;
  readonly name: string;
  readonly dryRun: boolean;
  readonly startedAt: string;
  private readonly actions: TransactionAction[] = [];
  private readonly rollback: TransactionAction[] = [];
  private closed = false;

  constructor(name: string, dryRun: boolean) {
    this.id = crypto.randomUUID();
    this.name = name;
    this.dryRun = dryRun;
    this.startedAt = new Date().toISOString();
  }

  record(action: TransactionAction): void {
    this.assertOpen();
    this.actions.push({ ...action });
  }

  /** Compensating action, for callers that can undo what they applied. */
  recordRollback(action: TransactionAction): void {
    this.assertOpen();
    this.rollback.push({ ...action });
  }

  get actionCount(): number {
    return this.actions.length;
  }

  close(): TransactionRecord {
    this.assertOpen();
    this.closed = true;
    return Object.freeze({
      id: this.id,
      name: this.name,
      dryRun: this.dryRun,
      startedAt: this.startedAt,
      closedAt: new Date().toISOString(),
      actions: Object.freeze(this.actions.map((a) => Object.freeze(a))),
      rollback: Object.freeze(this.rollback.map((a) => Object.freeze(a))),
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Transaction ${this.id} is already closed.`);
    }
  }
}

/**
 * Rollback entries in the order they should be replayed: last applied,
 * first undone.
 */
export function rollbackPlan(record: TransactionRecord): TransactionAction[] {
  return [...record.rollback].reverse();
}
