import { Interface, JsonRpcProvider, Network, Wallet } from 'ethers';
import { Address } from '../utils/address';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('ledger-client');

export type TransactionHandle = string;

// Read-only contract call
export interface ContractCall {
  to: Address;
  iface: Interface;
  method: string;
  args: readonly unknown[];
}

// Legacy (gasPrice) transaction, ready for signing
export interface UnsignedTransaction {
  from: string;
  to: string;
  data: string;
  value: bigint;
  gasLimit: bigint;
  gasPrice: bigint;
  nonce: number;
  chainId: bigint;
}

export interface ReceiptStatus {
  status: boolean;
  blockNumber?: number;
}

/**
 * Everything the swap client needs from the chain. Reads never mutate state;
 * only `sendSignedTransaction` does.
 */
export interface LedgerClient {
  getBalance(address: Address): Promise<bigint>;
  getTransactionCount(address: Address): Promise<number>;
  callContract(call: ContractCall): Promise<readonly unknown[]>;
  sendSignedTransaction(signed: string): Promise<TransactionHandle>;
  /** Resolves null when `timeoutSeconds` elapses before the receipt arrives. */
  waitForReceipt(handle: TransactionHandle, timeoutSeconds: number): Promise<ReceiptStatus | null>;
  signTransaction(tx: UnsignedTransaction, signingKey: string): Promise<string>;
  getGasPrice(): Promise<bigint>;
}

// The slice of an ethers Provider the client uses
export interface LedgerRpc {
  getBalance(address: string): Promise<bigint>;
  getTransactionCount(address: string): Promise<number>;
  call(tx: { to: string; data: string }): Promise<string>;
  broadcastTransaction(signed: string): Promise<{ hash: string }>;
  waitForTransaction(hash: string, confirms?: number): Promise<{ status: number | null; blockNumber: number } | null>;
  getFeeData(): Promise<{ gasPrice: bigint | null }>;
}

/**
 * LedgerClient over an ethers provider, signing locally with ethers wallets.
 */
export class EthersLedgerClient implements LedgerClient {
  constructor(private readonly rpc: LedgerRpc) {}

  static fromUrl(rpcUrl: string, chainId: number): EthersLedgerClient {
    const network = Network.from(chainId);
    const provider = new JsonRpcProvider(rpcUrl, network, { staticNetwork: network });
    logger.info(`Connected to ${rpcUrl} (chain ${chainId})`);
    return new EthersLedgerClient(provider);
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.rpc.getBalance(address.toString());
  }

  async getTransactionCount(address: Address): Promise<number> {
    return this.rpc.getTransactionCount(address.toString());
  }

  async callContract(call: ContractCall): Promise<readonly unknown[]> {
    const data = call.iface.encodeFunctionData(call.method, [...call.args]);
    const raw = await this.rpc.call({ to: call.to.toString(), data });
    return call.iface.decodeFunctionResult(call.method, raw);
  }

  async sendSignedTransaction(signed: string): Promise<TransactionHandle> {
    const response = await this.rpc.broadcastTransaction(signed);
    logger.debug(`Broadcast ${response.hash}`);
    return response.hash;
  }

  async waitForReceipt(handle: TransactionHandle, timeoutSeconds: number): Promise<ReceiptStatus | null> {
    const timeoutMs = timeoutSeconds * 1000;
    let timer: NodeJS.Timeout | undefined;

    try {
      const receipt = await Promise.race([
        this.rpc.waitForTransaction(handle, 1),
        new Promise<null>(resolve => {
          timer = setTimeout(() => {
            logger.warn(`Transaction ${handle} timed out after ${timeoutMs}ms`);
            resolve(null);
          }, timeoutMs);
        }),
      ]);

      if (!receipt) {
        return null;
      }
      return { status: receipt.status === 1, blockNumber: receipt.blockNumber };
    } finally {
      clearTimeout(timer);
    }
  }

  async signTransaction(tx: UnsignedTransaction, signingKey: string): Promise<string> {
    const wallet = new Wallet(signingKey);
    return wallet.signTransaction({ ...tx, type: 0 });
  }

  async getGasPrice(): Promise<bigint> {
    const feeData = await this.rpc.getFeeData();
    if (feeData.gasPrice === null) {
      throw new Error('Provider returned no gas price');
    }
    return feeData.gasPrice;
  }
}
