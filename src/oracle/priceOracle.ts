import { Interface } from 'ethers';
import { LedgerClient } from '../providers/ledgerClient';
import { Address, AddressLike, toCanonical } from '../utils/address';
import { loadContractInterface } from '../utils/abi';
import { assertTokenAmount } from '../utils/math';
import { QuoteUnavailable } from '../errors';
import { createServiceLogger } from '../utils/logger';

const logger = createServiceLogger('price-oracle');

/**
 * Hop sequence through the AMM pools: input, optionally the wrapped base token, output.
 */
export type TradePath = readonly [Address, Address] | readonly [Address, Address, Address];

/**
 * Direct path when either side already is the wrapped base token, else a hop through it.
 */
export function resolvePath(tokenA: AddressLike, tokenB: AddressLike, wrappedBase: AddressLike): TradePath {
  const a = toCanonical(tokenA);
  const b = toCanonical(tokenB);
  const wrapped = toCanonical(wrappedBase);

  if (a.equals(wrapped) || b.equals(wrapped)) {
    return [a, b];
  }
  return [a, wrapped, b];
}

export function formatPath(path: readonly Address[]): string[] {
  return path.map(address => address.toString());
}

/**
 * Quotes from the router's `getAmountsOut`. Read-only.
 */
export class PriceOracle {
  private readonly router: Interface;

  constructor(
    private readonly ledger: LedgerClient,
    private readonly routerAddress: Address,
    private readonly wrappedBase: Address,
    routerInterface: Interface = loadContractInterface('router02')
  ) {
    this.router = routerInterface;
  }

  async quoteExactInput(path: readonly Address[], inputQty: bigint): Promise<bigint> {
    assertTokenAmount(inputQty, 'input quantity');
    if (path.length < 2) {
      throw new QuoteUnavailable(formatPath(path), inputQty, new Error('path needs at least two tokens'));
    }

    let result: readonly unknown[];
    try {
      result = await this.ledger.callContract({
        to: this.routerAddress,
        iface: this.router,
        method: 'getAmountsOut',
        args: [inputQty, formatPath(path)],
      });
    } catch (error) {
      logger.error(`getAmountsOut reverted for ${formatPath(path).join(' -> ')}:`, error);
      throw new QuoteUnavailable(formatPath(path), inputQty, error);
    }

    const amounts = result[0];
    if (!Array.isArray(amounts) || amounts.length !== path.length) {
      throw new QuoteUnavailable(formatPath(path), inputQty, new Error('malformed getAmountsOut result'));
    }
    const last: unknown = amounts[amounts.length - 1];
    if (typeof last !== 'bigint') {
      throw new QuoteUnavailable(formatPath(path), inputQty, new Error('non-integer amount in getAmountsOut result'));
    }
    return last;
  }

  /**
   * Price for native-to-token trades with an exact input.
   */
  async getNativeTokenInputPrice(token: AddressLike, qty: bigint): Promise<bigint> {
    return this.quoteExactInput([this.wrappedBase, toCanonical(token)], qty);
  }

  /**
   * Price for token-to-native trades with an exact input.
   */
  async getTokenNativeInputPrice(token: AddressLike, qty: bigint): Promise<bigint> {
    return this.quoteExactInput([toCanonical(token), this.wrappedBase], qty);
  }

  async getTokenTokenInputPrice(tokenIn: AddressLike, tokenOut: AddressLike, qty: bigint): Promise<bigint> {
    return this.quoteExactInput(resolvePath(tokenIn, tokenOut, this.wrappedBase), qty);
  }

  get wrappedBaseAddress(): Address {
    return this.wrappedBase;
  }
}
