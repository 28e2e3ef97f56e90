export { SwapClient } from './client';
export type { SwapClientOptions, TradeOptions, ApprovalRequest } from './client';
export { loadConfig, validateConfig, describeConfig, DEPLOYMENTS } from './config';
export type { ClientConfig, RouterVersion } from './config';

export { Address, NATIVE_ADDRESS, toCanonical, toDisplay, isSameAddress, isNative } from './utils/address';
export type { AddressLike } from './utils/address';
export { loadContractInterface, loadAbiFromFile, BSC_ADDRESSES } from './utils/abi';
export type { ContractName } from './utils/abi';
export {
  APPROVAL_THRESHOLD,
  MAX_APPROVAL,
  calculateMinimumOutput,
  toWei,
  fromWei,
  formatWei,
} from './utils/math';

export { EthersLedgerClient } from './providers/ledgerClient';
export type {
  LedgerClient,
  LedgerRpc,
  ContractCall,
  UnsignedTransaction,
  ReceiptStatus,
  TransactionHandle,
} from './providers/ledgerClient';
export { NonceTracker } from './providers/nonceTracker';
export { PriceOracle, resolvePath } from './oracle/priceOracle';
export type { TradePath } from './oracle/priceOracle';
export { BalanceReader } from './balances/balanceReader';
export { ApprovalManager, withApprovalGuard, DEFAULT_APPROVAL_SETTINGS } from './approvals/approvalManager';
export type { ApprovalSettings, ApprovalContext, ApproveOptions } from './approvals/approvalManager';
export { TransactionBuilder, getDeadline, DEFAULT_GAS_LIMIT } from './exec/txBuilder';
export type { ContractWrite, TransactionParams, SubmittedTransaction } from './exec/txBuilder';
export { TradeExecutor, classifyTrade, selectPath, DEFAULT_MAX_TRACKED_TRADES } from './exec/executor';
export type { TradeRequest, TradeMode, TradeState, TradeTransition, TradeOutcome } from './exec/executor';

export {
  SwapClientError,
  InvalidAddress,
  InvalidAmount,
  UnsupportedTrade,
  InsufficientBalance,
  QuoteUnavailable,
  ApprovalFailed,
  SwapReverted,
  ConfigurationError,
  toOutcome,
} from './errors';
export type { SwapErrorKind, Outcome } from './errors';
