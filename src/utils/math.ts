import { MaxUint256 } from 'ethers';
import Decimal from 'decimal.js';
import { InvalidAmount } from '../errors';

// uint256 values have 78 digits; keep every one of them
const WeiDecimal = Decimal.clone({
  precision: 100,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -100,
  toExpPos: 100,
});

export const MAX_UINT256: bigint = MaxUint256;

/**
 * Allowance granted by `approve` when no amount is given.
 */
export const MAX_APPROVAL: bigint = MAX_UINT256;

/**
 * An allowance at or above this counts as unlimited: 0x000000000000000 followed by 49 f's.
 * Lower than MAX_APPROVAL so that partially spent max approvals still qualify.
 */
export const APPROVAL_THRESHOLD: bigint = BigInt(`0x${'0'.repeat(15)}${'f'.repeat(49)}`);

/**
 * Reject amounts that do not fit an unsigned EVM word.
 */
export function assertTokenAmount(amount: bigint, label = 'amount'): bigint {
  if (amount < 0n) {
    throw new InvalidAmount(amount, `${label} must not be negative`);
  }
  if (amount > MAX_UINT256) {
    throw new InvalidAmount(amount, `${label} exceeds uint256`);
  }
  return amount;
}

/**
 * Narrow a decoded contract return value to a uint.
 */
export function expectUint(value: unknown, context: string): bigint {
  if (typeof value !== 'bigint' || value < 0n) {
    throw new Error(`Unexpected value from ${context}: ${String(value)}`);
  }
  return value;
}

/**
 * floor((1 - maxSlippage) * quotedOutput), computed without float rounding.
 */
export function calculateMinimumOutput(quotedOutput: bigint, maxSlippage: number): bigint {
  if (!(maxSlippage >= 0 && maxSlippage < 1)) {
    throw new RangeError(`maxSlippage must be in [0, 1), got ${maxSlippage}`);
  }
  const factor = new WeiDecimal(1).minus(new WeiDecimal(maxSlippage));
  const minimum = factor.mul(new WeiDecimal(quotedOutput.toString())).floor();
  return BigInt(minimum.toFixed(0));
}

/**
 * Convert a human-readable amount to wei
 */
export function toWei(amount: string | number, decimals: number = 18): bigint {
  const scaled = new WeiDecimal(amount).mul(new WeiDecimal(10).pow(decimals));
  return BigInt(scaled.toFixed(0));
}

/**
 * Convert wei to human-readable amount
 */
export function fromWei(amount: bigint | string, decimals: number = 18): string {
  const divisor = new WeiDecimal(10).pow(decimals);
  return new WeiDecimal(amount.toString()).div(divisor).toFixed();
}

/**
 * Format wei to human-readable with specified decimal places
 */
export function formatWei(amount: bigint | string, decimals: number = 18, displayDecimals: number = 6): string {
  return new WeiDecimal(fromWei(amount, decimals)).toFixed(displayDecimals);
}
