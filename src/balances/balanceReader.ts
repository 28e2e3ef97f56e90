import { Interface } from 'ethers';
import { LedgerClient } from '../providers/ledgerClient';
import { AddressLike, toCanonical } from '../utils/address';
import { loadContractInterface } from '../utils/abi';
import { expectUint } from '../utils/math';

export class BalanceReader {
  private readonly erc20: Interface = loadContractInterface('erc20');

  constructor(private readonly ledger: LedgerClient) {}

  async nativeBalance(account: AddressLike): Promise<bigint> {
    return this.ledger.getBalance(toCanonical(account));
  }

  /**
   * ERC20 `balanceOf`, or the native balance for the native-currency sentinel.
   */
  async tokenBalance(account: AddressLike, token: AddressLike): Promise<bigint> {
    const tokenAddress = toCanonical(token);
    if (tokenAddress.isNative()) {
      return this.nativeBalance(account);
    }

    const [balance] = await this.ledger.callContract({
      to: tokenAddress,
      iface: this.erc20,
      method: 'balanceOf',
      args: [toCanonical(account).toString()],
    });
    return expectUint(balance, `balanceOf(${toCanonical(account)}) on ${tokenAddress}`);
  }
}
