import { Interface } from 'ethers';
import { LedgerClient, TransactionHandle } from '../providers/ledgerClient';
import { TransactionBuilder } from '../exec/txBuilder';
import { Address, AddressLike, toCanonical } from '../utils/address';
import { loadContractInterface } from '../utils/abi';
import { APPROVAL_THRESHOLD, MAX_APPROVAL, assertTokenAmount, expectUint } from '../utils/math';
import { ApprovalFailed, errorMessage } from '../errors';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('approval-manager');

export interface ApprovalSettings {
  /** Upper bound on the wait for the approval receipt. */
  receiptTimeoutSeconds: number;
  /** Pause after the receipt so follow-up reads see the new allowance. */
  settleDelayMs: number;
  gasLimit: bigint;
}

export const DEFAULT_APPROVAL_SETTINGS: ApprovalSettings = {
  receiptTimeoutSeconds: 6000,
  settleDelayMs: 1000,
  gasLimit: 250000n,
};

export interface ApproveOptions {
  amount?: bigint;
  gasPrice?: bigint;
}

// Who pays for approvals and which tokens a guarded call touches
export interface ApprovalContext {
  owner: AddressLike;
  tokens: readonly AddressLike[];
  signingKey: string;
  gasPrice?: bigint;
}

/**
 * Checks and grants router allowances. Approvals are only ever raised here,
 * and only when the current allowance is below APPROVAL_THRESHOLD.
 */
export class ApprovalManager {
  private readonly erc20: Interface = loadContractInterface('erc20');
  // owner:token -> check-then-approve in progress
  private readonly inFlight = new Map<string, Promise<boolean>>();

  constructor(
    private readonly ledger: LedgerClient,
    private readonly txBuilder: TransactionBuilder,
    private readonly spender: Address,
    private readonly settings: ApprovalSettings = DEFAULT_APPROVAL_SETTINGS
  ) {}

  async allowance(owner: AddressLike, token: AddressLike): Promise<bigint> {
    const tokenAddress = toCanonical(token);
    const [amount] = await this.ledger.callContract({
      to: tokenAddress,
      iface: this.erc20,
      method: 'allowance',
      args: [toCanonical(owner).toString(), this.spender.toString()],
    });
    return expectUint(amount, `allowance on ${tokenAddress}`);
  }

  async isApproved(owner: AddressLike, token: AddressLike): Promise<boolean> {
    if (toCanonical(token).isNative()) {
      return true;
    }
    return (await this.allowance(owner, token)) >= APPROVAL_THRESHOLD;
  }

  /**
   * Give the router an allowance of `amount` (max uint256 by default) and wait
   * until the approval is mined.
   */
  async approve(
    owner: AddressLike,
    token: AddressLike,
    signingKey: string,
    options: ApproveOptions = {}
  ): Promise<TransactionHandle> {
    const ownerAddress = toCanonical(owner);
    const tokenAddress = toCanonical(token);
    const amount = assertTokenAmount(options.amount ?? MAX_APPROVAL, 'approval amount');

    if (tokenAddress.isNative()) {
      throw new ApprovalFailed(tokenAddress.toString(), 'the native currency needs no approval');
    }

    logger.info(`Approving ${tokenAddress}...`);

    let hash: TransactionHandle;
    try {
      const gasPrice = options.gasPrice ?? (await this.ledger.getGasPrice());
      const submitted = await this.txBuilder.buildAndSend(
        {
          to: tokenAddress,
          iface: this.erc20,
          method: 'approve',
          args: [this.spender.toString(), amount],
        },
        { from: ownerAddress, signingKey, gasPrice, gasLimit: this.settings.gasLimit }
      );
      hash = submitted.hash;
    } catch (error) {
      logger.error(`Approval of ${tokenAddress} could not be submitted:`, error);
      throw new ApprovalFailed(tokenAddress.toString(), errorMessage(error));
    }

    const receipt = await this.ledger.waitForReceipt(hash, this.settings.receiptTimeoutSeconds);
    if (!receipt) {
      throw new ApprovalFailed(
        tokenAddress.toString(),
        `no receipt within ${this.settings.receiptTimeoutSeconds}s`,
        hash
      );
    }
    if (!receipt.status) {
      throw new ApprovalFailed(tokenAddress.toString(), 'transaction reverted', hash);
    }

    await new Promise(resolve => setTimeout(resolve, this.settings.settleDelayMs));
    logger.info(`Approved ${tokenAddress} in ${hash}`);
    return hash;
  }

  /**
   * Approve every non-native token in `context.tokens` that is not approved yet.
   * Returns the tokens an approval was sent for.
   */
  async ensureApproved(context: ApprovalContext): Promise<Address[]> {
    const approved: Address[] = [];
    for (const token of context.tokens) {
      const tokenAddress = toCanonical(token);
      if (tokenAddress.isNative() || approved.some(done => done.equals(tokenAddress))) {
        continue;
      }
      if (await this.approveOnce(context, tokenAddress)) {
        approved.push(tokenAddress);
      }
    }
    return approved;
  }

  /**
   * Check and, when needed, approve `token`. Concurrent callers for the same
   * owner and token share one check and at most one approval; only the caller
   * that started it gets `true`.
   */
  private async approveOnce(context: ApprovalContext, token: Address): Promise<boolean> {
    const owner = toCanonical(context.owner);
    const key = `${owner}:${token}`;

    const running = this.inFlight.get(key);
    if (running) {
      logger.debug(`Approval of ${token} for ${owner} already in progress`);
      await running;
      return false;
    }

    const attempt = (async () => {
      if (await this.isApproved(owner, token)) {
        return false;
      }
      await this.approve(owner, token, context.signingKey, { gasPrice: context.gasPrice });
      return true;
    })();
    this.inFlight.set(key, attempt);

    try {
      return await attempt;
    } finally {
      this.inFlight.delete(key);
    }
  }
}

/**
 * Wrap `operation` so the tokens picked out of its arguments by `selectContext`
 * are approved before it runs.
 */
export function withApprovalGuard<Args extends unknown[], Result>(
  manager: ApprovalManager,
  selectContext: (...args: Args) => ApprovalContext,
  operation: (...args: Args) => Promise<Result>
): (...args: Args) => Promise<Result> {
  return async (...args: Args) => {
    await manager.ensureApproved(selectContext(...args));
    return operation(...args);
  };
}
