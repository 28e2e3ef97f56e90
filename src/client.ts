import { Interface } from 'ethers';
import { ClientConfig, DEPLOYMENTS, describeConfig, loadConfig, validateConfig } from './config';
import { EthersLedgerClient, LedgerClient, ReceiptStatus, TransactionHandle } from './providers/ledgerClient';
import { NonceTracker } from './providers/nonceTracker';
import { BalanceReader } from './balances/balanceReader';
import { PriceOracle } from './oracle/priceOracle';
import { ApprovalManager, DEFAULT_APPROVAL_SETTINGS } from './approvals/approvalManager';
import { TransactionBuilder } from './exec/txBuilder';
import { TradeExecutor, TradeOutcome, TradeRequest, TradeTransition } from './exec/executor';
import { Address, AddressLike, NATIVE_ADDRESS, toCanonical } from './utils/address';
import { loadAbiFromFile, loadContractInterface } from './utils/abi';
import { ConfigurationError } from './errors';
import { createServiceLogger } from './utils/logger';

const logger = createServiceLogger('swap-client');

export interface SwapClientOptions extends Partial<ClientConfig> {
  /** Ledger to use instead of an ethers client on `rpcUrl`. */
  ledger?: LedgerClient;
  /** JSON ABI (or Hardhat artifact) replacing the built-in router ABI. */
  routerAbiPath?: string;
}

export interface TradeOptions {
  senderAddress?: AddressLike;
  signingKey?: string;
  recipient?: AddressLike;
  gasLimit?: bigint;
}

export interface ApprovalRequest {
  owner?: AddressLike;
  signingKey?: string;
  amount?: bigint;
  gasPrice?: bigint;
}

/**
 * Swap client for a Uniswap-V2-style router (PancakeSwap V2 by default).
 *
 * One instance owns one nonce tracker, so concurrent trades from the same
 * instance never share a nonce. Only router version 2 is supported.
 */
export class SwapClient {
  readonly config: ClientConfig;
  readonly nativeAddress: Address = NATIVE_ADDRESS;
  readonly routerAddress: Address;
  readonly factoryAddress: Address;
  readonly wrappedBaseAddress: Address;

  readonly balances: BalanceReader;
  readonly oracle: PriceOracle;
  readonly approvals: ApprovalManager;
  readonly nonces: NonceTracker;
  readonly executor: TradeExecutor;

  private readonly ledger: LedgerClient;
  private readonly walletAddress?: Address;
  private readonly privateKey?: string;

  constructor(options: SwapClientOptions = {}) {
    const { ledger, routerAbiPath, ...rawConfig } = options;
    this.config = validateConfig(rawConfig);

    this.ledger = ledger ?? this.connect(this.config);
    this.walletAddress = this.config.walletAddress ? toCanonical(this.config.walletAddress) : undefined;
    this.privateKey = this.config.privateKey;

    const deployment = DEPLOYMENTS[this.config.version];
    this.routerAddress = toCanonical(deployment.router);
    this.factoryAddress = toCanonical(deployment.factory);
    this.wrappedBaseAddress = toCanonical(deployment.wrappedBase);

    const routerInterface: Interface = routerAbiPath
      ? loadAbiFromFile(routerAbiPath)
      : loadContractInterface('router02');

    this.nonces = new NonceTracker(this.ledger);
    const txBuilder = new TransactionBuilder(
      this.ledger,
      this.nonces,
      BigInt(this.config.chainId),
      BigInt(this.config.defaultGasLimit)
    );

    this.balances = new BalanceReader(this.ledger);
    this.oracle = new PriceOracle(this.ledger, this.routerAddress, this.wrappedBaseAddress, routerInterface);
    this.approvals = new ApprovalManager(this.ledger, txBuilder, this.routerAddress, {
      receiptTimeoutSeconds: this.config.approvalTimeoutSeconds,
      settleDelayMs: this.config.approvalSettleMs,
      gasLimit: DEFAULT_APPROVAL_SETTINGS.gasLimit,
    });
    this.executor = new TradeExecutor({
      ledger: this.ledger,
      balances: this.balances,
      oracle: this.oracle,
      approvals: this.approvals,
      txBuilder,
      routerAddress: this.routerAddress,
      wrappedBase: this.wrappedBaseAddress,
      maxSlippage: this.config.maxSlippage,
      routerInterface,
    });

    logger.debug(`Client configured: ${describeConfig(this.config)}`);
  }

  /**
   * Client configured from environment variables (see `.env.example`).
   */
  static fromEnv(overrides: SwapClientOptions = {}): SwapClient {
    return new SwapClient({ ...loadConfig(), ...overrides });
  }

  get maxSlippage(): number {
    return this.config.maxSlippage;
  }

  async getNativeBalance(account?: AddressLike): Promise<bigint> {
    return this.balances.nativeBalance(this.resolveAccount(account));
  }

  async getTokenBalance(token: AddressLike, account?: AddressLike): Promise<bigint> {
    return this.balances.tokenBalance(this.resolveAccount(account), token);
  }

  async getNativeTokenInputPrice(token: AddressLike, qty: bigint): Promise<bigint> {
    return this.oracle.getNativeTokenInputPrice(token, qty);
  }

  async getTokenNativeInputPrice(token: AddressLike, qty: bigint): Promise<bigint> {
    return this.oracle.getTokenNativeInputPrice(token, qty);
  }

  async getTokenTokenInputPrice(tokenIn: AddressLike, tokenOut: AddressLike, qty: bigint): Promise<bigint> {
    return this.oracle.getTokenTokenInputPrice(tokenIn, tokenOut, qty);
  }

  async isApproved(token: AddressLike, owner?: AddressLike): Promise<boolean> {
    return this.approvals.isApproved(this.resolveAccount(owner), token);
  }

  async approve(token: AddressLike, request: ApprovalRequest = {}): Promise<TransactionHandle> {
    return this.approvals.approve(
      this.resolveAccount(request.owner),
      token,
      this.resolveKey(request.signingKey),
      { amount: request.amount, gasPrice: request.gasPrice }
    );
  }

  /**
   * Swap `quantity` of `inputToken` for `outputToken`. Either side may be the
   * native currency (NATIVE_ADDRESS). Returns the swap transaction hash.
   */
  async makeTrade(
    inputToken: AddressLike,
    outputToken: AddressLike,
    quantity: bigint,
    gasPrice: bigint,
    options: TradeOptions = {}
  ): Promise<TransactionHandle> {
    return this.executeTrade({
      inputToken,
      outputToken,
      quantity,
      gasPrice,
      senderAddress: this.resolveAccount(options.senderAddress),
      signingKey: this.resolveKey(options.signingKey),
      recipient: options.recipient,
      gasLimit: options.gasLimit,
    });
  }

  async executeTrade(request: TradeRequest): Promise<TransactionHandle> {
    return this.executor.executeTrade(request);
  }

  async tryExecuteTrade(request: TradeRequest): Promise<TradeOutcome> {
    return this.executor.tryExecuteTrade(request);
  }

  async waitForTrade(handle: TransactionHandle, timeoutSeconds: number = this.config.approvalTimeoutSeconds): Promise<ReceiptStatus> {
    return this.executor.waitForTrade(handle, timeoutSeconds);
  }

  onTradeState(listener: (transition: TradeTransition) => void): () => void {
    this.executor.on('state', listener);
    return () => {
      this.executor.off('state', listener);
    };
  }

  private connect(config: ClientConfig): LedgerClient {
    if (!config.rpcUrl) {
      throw new ConfigurationError(['either a ledger or an rpcUrl is required']);
    }
    return EthersLedgerClient.fromUrl(config.rpcUrl, config.chainId);
  }

  private resolveAccount(account?: AddressLike): Address {
    if (account !== undefined) {
      return toCanonical(account);
    }
    if (!this.walletAddress) {
      throw new ConfigurationError(['no account given and no walletAddress configured']);
    }
    return this.walletAddress;
  }

  private resolveKey(signingKey?: string): string {
    const key = signingKey ?? this.privateKey;
    if (!key) {
      throw new ConfigurationError(['no signing key given and no privateKey configured']);
    }
    return key;
  }
}
