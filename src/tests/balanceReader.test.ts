import { describe, expect, it } from 'vitest';
import { BalanceReader } from '../balances/balanceReader';
import { NATIVE_ADDRESS } from '../utils/address';
import { InvalidAddress } from '../errors';
import { FakeLedger, SENDER, TOKEN_A } from './fakeLedger';

describe('BalanceReader', () => {
  const ledger = new FakeLedger()
    .setNativeBalance(SENDER, 100n * 10n ** 18n)
    .setTokenBalance(TOKEN_A, SENDER, 42n);
  const balances = new BalanceReader(ledger);

  it('reads the native balance', async () => {
    expect(await balances.nativeBalance(SENDER)).toBe(100n * 10n ** 18n);
  });

  it('reads ERC20 balances through balanceOf', async () => {
    expect(await balances.tokenBalance(SENDER.toLowerCase(), TOKEN_A)).toBe(42n);
    expect(ledger.reads.at(-1)).toEqual({ method: 'balanceOf', to: TOKEN_A, args: [SENDER] });
  });

  it('delegates the native sentinel to the native balance', async () => {
    const readsBefore = ledger.reads.length;
    expect(await balances.tokenBalance(SENDER, NATIVE_ADDRESS)).toBe(100n * 10n ** 18n);
    expect(ledger.reads).toHaveLength(readsBefore);
  });

  it('reports zero for tokens never held', async () => {
    expect(await balances.tokenBalance(SENDER, '0x5555555555555555555555555555555555555555')).toBe(0n);
  });

  it('rejects malformed token addresses', async () => {
    await expect(balances.tokenBalance(SENDER, 'btc')).rejects.toThrow(InvalidAddress);
  });
});
