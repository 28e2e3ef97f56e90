import PQueue from 'p-queue';
import { Address } from '../utils/address';
import { LedgerClient } from './ledgerClient';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('nonce-tracker');

/**
 * Nonce management for rapid successive sends from one process.
 *
 * The ledger's transaction count lags behind transactions we just broadcast,
 * so the tracker remembers the last nonce it handed out per account and uses
 * whichever of the two is higher. A nonce handed out is consumed even when
 * the transaction carrying it never lands; that leaves a gap, never a reuse.
 */
export class NonceTracker {
  private readonly lastNonces = new Map<string, number>();
  private readonly sendQueue = new PQueue({ concurrency: 1 });

  constructor(private readonly ledger: LedgerClient) {}

  async next(account: Address): Promise<number> {
    const cached = this.lastNonces.get(account.toString()) ?? 0;
    const reported = await this.ledger.getTransactionCount(account);
    return Math.max(cached, reported);
  }

  advance(account: Address, used: number): void {
    logger.debug(`nonce: ${used}`);
    this.lastNonces.set(account.toString(), used + 1);
  }

  /**
   * Run `task` after every previously queued task has settled.
   * Nonce acquisition, signing and submission must go through here.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.sendQueue.add(task);
  }

  get pending(): number {
    return this.sendQueue.size + this.sendQueue.pending;
  }
}
