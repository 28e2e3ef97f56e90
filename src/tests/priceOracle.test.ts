import { describe, expect, it } from 'vitest';
import { PriceOracle, resolvePath } from '../oracle/priceOracle';
import { toCanonical } from '../utils/address';
import { BSC_ADDRESSES } from '../utils/abi';
import { QuoteUnavailable } from '../errors';
import { FakeLedger, TOKEN_A, TOKEN_B } from './fakeLedger';

const WBNB = BSC_ADDRESSES.WBNB;
const ROUTER = BSC_ADDRESSES.PANCAKESWAP_V2_ROUTER;

function setup() {
  const ledger = new FakeLedger();
  const oracle = new PriceOracle(ledger, toCanonical(ROUTER), toCanonical(WBNB));
  return { ledger, oracle };
}

describe('resolvePath', () => {
  it('routes token to token through the wrapped base token', () => {
    expect(resolvePath(TOKEN_A, TOKEN_B, WBNB).map(String)).toEqual([TOKEN_A, WBNB, TOKEN_B]);
  });

  it('goes direct when either side is the wrapped base token', () => {
    expect(resolvePath(WBNB, TOKEN_B, WBNB).map(String)).toEqual([WBNB, TOKEN_B]);
    expect(resolvePath(TOKEN_A, WBNB.toLowerCase(), WBNB).map(String)).toEqual([TOKEN_A, WBNB]);
  });
});

describe('PriceOracle', () => {
  it('returns the last amount from getAmountsOut', async () => {
    const { ledger, oracle } = setup();
    ledger.quote = (path, amountIn) => [amountIn, 1234n, 5678n].slice(0, path.length);

    const quoted = await oracle.quoteExactInput(resolvePath(TOKEN_A, TOKEN_B, WBNB), 10n ** 18n);

    expect(quoted).toBe(5678n);
    expect(ledger.reads).toEqual([
      { method: 'getAmountsOut', to: ROUTER, args: [10n ** 18n, [TOKEN_A, WBNB, TOKEN_B]] },
    ]);
  });

  it('never calls the router with a path shorter than two tokens', async () => {
    const { ledger, oracle } = setup();

    await expect(oracle.quoteExactInput([toCanonical(TOKEN_A)], 1n)).rejects.toThrow(QuoteUnavailable);
    await expect(oracle.quoteExactInput([], 1n)).rejects.toThrow(QuoteUnavailable);
    expect(ledger.reads).toHaveLength(0);
  });

  it('reports a reverted quote as QuoteUnavailable with the path and amount', async () => {
    const { ledger, oracle } = setup();
    ledger.quote = () => {
      throw new Error('execution reverted: PancakeLibrary: INSUFFICIENT_LIQUIDITY');
    };

    const error = await oracle.quoteExactInput(resolvePath(TOKEN_A, TOKEN_B, WBNB), 5n).catch(e => e);

    expect(error).toBeInstanceOf(QuoteUnavailable);
    expect(error.path).toEqual([TOKEN_A, WBNB, TOKEN_B]);
    expect(error.quantity).toBe(5n);
    expect(error.message).toBe(
      `No quote for 5 along ${TOKEN_A} -> ${WBNB} -> ${TOKEN_B}: execution reverted: PancakeLibrary: INSUFFICIENT_LIQUIDITY`
    );
  });

  it('rejects a result whose length does not match the path', async () => {
    const { ledger, oracle } = setup();
    ledger.quote = () => [1n];

    await expect(oracle.quoteExactInput(resolvePath(WBNB, TOKEN_B, WBNB), 5n)).rejects.toThrow(QuoteUnavailable);
  });

  it('quotes native-to-token along [wrapped, token]', async () => {
    const { ledger, oracle } = setup();

    expect(await oracle.getNativeTokenInputPrice(TOKEN_A, 100n)).toBe(50n);
    expect(ledger.reads[0].args).toEqual([100n, [WBNB, TOKEN_A]]);
  });

  it('quotes token-to-native along [token, wrapped]', async () => {
    const { ledger, oracle } = setup();

    expect(await oracle.getTokenNativeInputPrice(TOKEN_A, 100n)).toBe(50n);
    expect(ledger.reads[0].args).toEqual([100n, [TOKEN_A, WBNB]]);
  });

  it('quotes token-to-token over three hops, or two when one side is wrapped', async () => {
    const { ledger, oracle } = setup();

    expect(await oracle.getTokenTokenInputPrice(TOKEN_A, TOKEN_B, 100n)).toBe(25n);
    expect(await oracle.getTokenTokenInputPrice(TOKEN_A, WBNB, 100n)).toBe(50n);
    expect(ledger.reads.map(read => read.args[1])).toEqual([[TOKEN_A, WBNB, TOKEN_B], [TOKEN_A, WBNB]]);
  });
});
