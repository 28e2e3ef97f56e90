import { Interface } from 'ethers';
import { LedgerClient, TransactionHandle, UnsignedTransaction } from '../providers/ledgerClient';
import { NonceTracker } from '../providers/nonceTracker';
import { Address } from '../utils/address';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('tx-builder');

export const DEFAULT_GAS_LIMIT = 250000n;
export const DEADLINE_WINDOW_SECONDS = 10 * 60;

// State-changing contract call
export interface ContractWrite {
  to: Address;
  iface: Interface;
  method: string;
  args: readonly unknown[];
}

export interface TransactionParams {
  from: Address;
  signingKey: string;
  gasPrice: bigint;
  value?: bigint;
  gasLimit?: bigint;
}

export type BuildStage = 'Built' | 'Signed' | 'Submitted';

export interface SubmittedTransaction {
  hash: TransactionHandle;
  request: UnsignedTransaction;
}

/**
 * Deadline for router calls: 10 minutes ahead of now, in unix seconds.
 */
export function getDeadline(nowMs: number = Date.now()): number {
  return Math.floor(nowMs / 1000) + DEADLINE_WINDOW_SECONDS;
}

/**
 * Transaction Builder
 *
 * Encodes a contract call, attaches a nonce, signs and broadcasts it.
 * The nonce is advanced whether or not signing or broadcasting succeeds.
 */
export class TransactionBuilder {
  constructor(
    private readonly ledger: LedgerClient,
    private readonly nonces: NonceTracker,
    private readonly chainId: bigint,
    private readonly defaultGasLimit: bigint = DEFAULT_GAS_LIMIT
  ) {}

  async buildAndSend(
    call: ContractWrite,
    params: TransactionParams,
    onStage?: (stage: BuildStage) => void
  ): Promise<SubmittedTransaction> {
    const data = call.iface.encodeFunctionData(call.method, [...call.args]);
    logger.debug(`${call.method} waiting behind ${this.nonces.pending} queued sends`);

    return this.nonces.runExclusive(async () => {
      const nonce = await this.nonces.next(params.from);
      try {
        const request: UnsignedTransaction = {
          from: params.from.toString(),
          to: call.to.toString(),
          data,
          value: params.value ?? 0n,
          gasLimit: params.gasLimit ?? this.defaultGasLimit,
          gasPrice: params.gasPrice,
          nonce,
          chainId: this.chainId,
        };
        onStage?.('Built');

        const signed = await this.ledger.signTransaction(request, params.signingKey);
        onStage?.('Signed');

        const hash = await this.ledger.sendSignedTransaction(signed);
        onStage?.('Submitted');

        logger.info(`Submitted ${call.method} to ${request.to}: ${hash}`);
        return { hash, request };
      } finally {
        this.nonces.advance(params.from, nonce);
      }
    });
  }
}
