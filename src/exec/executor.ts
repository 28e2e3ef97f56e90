import { Interface } from 'ethers';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { LedgerClient, ReceiptStatus, TransactionHandle } from '../providers/ledgerClient';
import { BalanceReader } from '../balances/balanceReader';
import { PriceOracle, TradePath, formatPath, resolvePath } from '../oracle/priceOracle';
import { ApprovalManager, withApprovalGuard } from '../approvals/approvalManager';
import { ContractWrite, TransactionBuilder, getDeadline } from './txBuilder';
import { Address, AddressLike, toCanonical } from '../utils/address';
import { loadContractInterface } from '../utils/abi';
import { assertTokenAmount, calculateMinimumOutput } from '../utils/math';
import {
  ConfigurationError,
  InsufficientBalance,
  InvalidAmount,
  Outcome,
  SwapClientError,
  SwapReverted,
  UnsupportedTrade,
  errorMessage,
  toOutcome,
} from '../errors';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('executor');

export type TradeMode = 'nativeToToken' | 'tokenToNative' | 'tokenToToken';

export type TradeState =
  | 'Validating'
  | 'PathSelected'
  | 'Quoted'
  | 'Approved'
  | 'Built'
  | 'Signed'
  | 'Submitted'
  | 'Confirmed'
  | 'Failed';

export interface TradeRequest {
  inputToken: AddressLike;
  outputToken: AddressLike;
  quantity: bigint;
  gasPrice: bigint;
  senderAddress: AddressLike;
  signingKey: string;
  /** Defaults to the sender. */
  recipient?: AddressLike;
  /** Defaults to the client's gas limit. */
  gasLimit?: bigint;
}

// Trade after validation, filled in as it moves through the states
export interface TradePlan {
  id: string;
  mode: TradeMode;
  inputToken: Address;
  outputToken: Address;
  sender: Address;
  recipient: Address;
  quantity: bigint;
  gasPrice: bigint;
  gasLimit?: bigint;
  signingKey: string;
  path: TradePath;
  quotedOutput: bigint;
  minOutput: bigint;
}

export interface TradeTransition {
  tradeId: string;
  state: TradeState;
  transactionHash?: TransactionHandle;
  error?: SwapClientError | Error;
}

export interface ExecutorEvents {
  state: (transition: TradeTransition) => void;
}

export type TradeOutcome = Outcome<TransactionHandle>;

export interface ExecutorDependencies {
  ledger: LedgerClient;
  balances: BalanceReader;
  oracle: PriceOracle;
  approvals: ApprovalManager;
  txBuilder: TransactionBuilder;
  routerAddress: Address;
  wrappedBase: Address;
  maxSlippage: number;
  routerInterface?: Interface;
  /** How many submitted trades keep their id for waitForTrade. */
  maxTrackedTrades?: number;
}

export const DEFAULT_MAX_TRACKED_TRADES = 256;

/**
 * Pick the trade mode from which side, if any, is the native currency.
 */
export function classifyTrade(inputToken: Address, outputToken: Address): TradeMode {
  if (inputToken.equals(outputToken)) {
    throw new UnsupportedTrade(`input and output are both ${inputToken}`);
  }
  if (inputToken.isNative()) {
    return 'nativeToToken';
  }
  return outputToken.isNative() ? 'tokenToNative' : 'tokenToToken';
}

/**
 * Router path for a trade. Native legs always go through the wrapped base token.
 */
export function selectPath(mode: TradeMode, inputToken: Address, outputToken: Address, wrappedBase: Address): TradePath {
  switch (mode) {
    case 'nativeToToken':
      return [wrappedBase, outputToken];
    case 'tokenToNative':
      return [inputToken, wrappedBase];
    case 'tokenToToken':
      return resolvePath(inputToken, outputToken, wrappedBase);
  }
}

export declare interface TradeExecutor {
  on<E extends keyof ExecutorEvents>(event: E, listener: ExecutorEvents[E]): this;
  off<E extends keyof ExecutorEvents>(event: E, listener: ExecutorEvents[E]): this;
  emit<E extends keyof ExecutorEvents>(event: E, ...args: Parameters<ExecutorEvents[E]>): boolean;
}

/**
 * Trade Executor
 *
 * Validating -> PathSelected -> Quoted -> Approved -> Built -> Signed -> Submitted,
 * ending in Failed on any error. Confirmed is only reached through waitForTrade.
 */
export class TradeExecutor extends EventEmitter {
  private readonly router: Interface;
  private readonly tradeIds = new Map<TransactionHandle, string>();
  private readonly submitGuarded: (plan: TradePlan) => Promise<TransactionHandle>;

  constructor(private readonly deps: ExecutorDependencies) {
    super();
    this.router = deps.routerInterface ?? loadContractInterface('router02');
    if (!(deps.maxSlippage >= 0 && deps.maxSlippage < 1)) {
      throw new ConfigurationError([`maxSlippage must be in [0, 1), got ${deps.maxSlippage}`]);
    }

    this.submitGuarded = withApprovalGuard(
      deps.approvals,
      (plan: TradePlan) => ({
        owner: plan.sender,
        tokens: [plan.inputToken, plan.outputToken],
        signingKey: plan.signingKey,
        gasPrice: plan.gasPrice,
      }),
      (plan: TradePlan) => this.submit(plan)
    );
  }

  async executeTrade(request: TradeRequest): Promise<TransactionHandle> {
    const tradeId = uuidv4();

    try {
      this.transition({ tradeId, state: 'Validating' });
      const validated = await this.validate(tradeId, request);

      const path = selectPath(validated.mode, validated.inputToken, validated.outputToken, this.deps.wrappedBase);
      this.transition({ tradeId, state: 'PathSelected' });
      logger.debug(`Trade ${tradeId} (${validated.mode}) path: ${formatPath(path).join(' -> ')}`);

      const quotedOutput = await this.deps.oracle.quoteExactInput(path, validated.quantity);
      const minOutput = calculateMinimumOutput(quotedOutput, this.deps.maxSlippage);
      this.transition({ tradeId, state: 'Quoted' });
      logger.info(`Trade ${tradeId} quoted ${quotedOutput}, minimum out ${minOutput}`);

      const hash = await this.submitGuarded({ ...validated, path, quotedOutput, minOutput });
      this.track(hash, tradeId);
      return hash;
    } catch (error) {
      logger.error(`Trade ${tradeId} failed:`, error);
      this.transition({ tradeId, state: 'Failed', error: error instanceof Error ? error : new Error(String(error)) });
      throw error;
    }
  }

  /**
   * Same as executeTrade, with client errors returned instead of thrown.
   */
  async tryExecuteTrade(request: TradeRequest): Promise<TradeOutcome> {
    return toOutcome(() => this.executeTrade(request));
  }

  /**
   * Wait for a submitted swap to be mined.
   */
  async waitForTrade(handle: TransactionHandle, timeoutSeconds: number): Promise<ReceiptStatus> {
    const tradeId = this.tradeIds.get(handle) ?? handle;
    let receipt: ReceiptStatus | null;
    try {
      receipt = await this.deps.ledger.waitForReceipt(handle, timeoutSeconds);
    } finally {
      this.tradeIds.delete(handle);
    }

    if (!receipt || !receipt.status) {
      const error = new SwapReverted(receipt ? 'transaction reverted' : `no receipt within ${timeoutSeconds}s`, handle);
      this.transition({ tradeId, state: 'Failed', transactionHash: handle, error });
      throw error;
    }

    this.transition({ tradeId, state: 'Confirmed', transactionHash: handle });
    return receipt;
  }

  private async validate(
    tradeId: string,
    request: TradeRequest
  ): Promise<Omit<TradePlan, 'path' | 'quotedOutput' | 'minOutput'>> {
    // every address is checked before the first network call
    const inputToken = toCanonical(request.inputToken);
    const outputToken = toCanonical(request.outputToken);
    const sender = toCanonical(request.senderAddress);
    const recipient = request.recipient === undefined ? sender : toCanonical(request.recipient);

    const quantity = assertTokenAmount(request.quantity, 'quantity');
    if (quantity === 0n) {
      throw new InvalidAmount(quantity, 'quantity must be positive');
    }
    assertTokenAmount(request.gasPrice, 'gas price');
    if (request.gasLimit !== undefined) {
      assertTokenAmount(request.gasLimit, 'gas limit');
    }

    const mode = classifyTrade(inputToken, outputToken);

    const balance = mode === 'nativeToToken'
      ? await this.deps.balances.nativeBalance(sender)
      : await this.deps.balances.tokenBalance(sender, inputToken);
    if (quantity > balance) {
      throw new InsufficientBalance(balance, quantity);
    }

    return {
      id: tradeId,
      mode,
      inputToken,
      outputToken,
      sender,
      recipient,
      quantity,
      gasPrice: request.gasPrice,
      gasLimit: request.gasLimit,
      signingKey: request.signingKey,
    };
  }

  private async submit(plan: TradePlan): Promise<TransactionHandle> {
    this.transition({ tradeId: plan.id, state: 'Approved' });

    const call = this.buildSwapCall(plan);
    try {
      const submitted = await this.deps.txBuilder.buildAndSend(
        call,
        {
          from: plan.sender,
          signingKey: plan.signingKey,
          gasPrice: plan.gasPrice,
          gasLimit: plan.gasLimit,
          value: plan.mode === 'nativeToToken' ? plan.quantity : 0n,
        },
        stage => this.transition({ tradeId: plan.id, state: stage })
      );
      return submitted.hash;
    } catch (error) {
      throw new SwapReverted(`${call.method} could not be submitted`, undefined, error);
    }
  }

  buildSwapCall(plan: Pick<TradePlan, 'mode' | 'path' | 'quantity' | 'minOutput' | 'recipient'>): ContractWrite {
    const path = formatPath(plan.path);
    const recipient = plan.recipient.toString();
    const deadline = getDeadline();

    switch (plan.mode) {
      case 'nativeToToken':
        return {
          to: this.deps.routerAddress,
          iface: this.router,
          method: 'swapExactETHForTokens',
          args: [plan.minOutput, path, recipient, deadline],
        };
      case 'tokenToNative':
        return {
          to: this.deps.routerAddress,
          iface: this.router,
          method: 'swapExactTokensForETHSupportingFeeOnTransferTokens',
          args: [plan.quantity, plan.minOutput, path, recipient, deadline],
        };
      case 'tokenToToken':
        return {
          to: this.deps.routerAddress,
          iface: this.router,
          method: 'swapExactTokensForTokens',
          args: [plan.quantity, plan.minOutput, path, recipient, deadline],
        };
    }
  }

  // Oldest entries go first; an untracked hash is reported under its own value
  private track(hash: TransactionHandle, tradeId: string): void {
    this.tradeIds.set(hash, tradeId);
    const limit = this.deps.maxTrackedTrades ?? DEFAULT_MAX_TRACKED_TRADES;
    for (const oldest of this.tradeIds.keys()) {
      if (this.tradeIds.size <= limit) {
        break;
      }
      this.tradeIds.delete(oldest);
    }
  }

  private transition(transition: TradeTransition): void {
    if (transition.error) {
      logger.debug(`Trade ${transition.tradeId} -> ${transition.state}: ${errorMessage(transition.error)}`);
    } else {
      logger.debug(`Trade ${transition.tradeId} -> ${transition.state}`);
    }
    this.emit('state', transition);
  }
}
