import { describe, expect, it, vi } from 'vitest';
import { ApprovalManager, withApprovalGuard } from '../approvals/approvalManager';
import { TransactionBuilder } from '../exec/txBuilder';
import { NonceTracker } from '../providers/nonceTracker';
import { NATIVE_ADDRESS, toCanonical } from '../utils/address';
import { BSC_ADDRESSES } from '../utils/abi';
import { APPROVAL_THRESHOLD, MAX_APPROVAL } from '../utils/math';
import { ApprovalFailed } from '../errors';
import { FakeLedger, SENDER, SIGNING_KEY, TOKEN_A, TOKEN_B } from './fakeLedger';

const ROUTER = BSC_ADDRESSES.PANCAKESWAP_V2_ROUTER;

function setup(receiptTimeoutSeconds = 30) {
  const ledger = new FakeLedger().setTransactionCount(SENDER, 1);
  const txBuilder = new TransactionBuilder(ledger, new NonceTracker(ledger), 56n);
  const approvals = new ApprovalManager(ledger, txBuilder, toCanonical(ROUTER), {
    receiptTimeoutSeconds,
    settleDelayMs: 0,
    gasLimit: 250000n,
  });
  return { ledger, approvals };
}

describe('ApprovalManager.isApproved', () => {
  it('is true at the threshold and above', async () => {
    const { ledger, approvals } = setup();
    ledger.setAllowance(TOKEN_A, SENDER, ROUTER, APPROVAL_THRESHOLD);
    ledger.setAllowance(TOKEN_B, SENDER, ROUTER, MAX_APPROVAL);

    expect(await approvals.isApproved(SENDER, TOKEN_A)).toBe(true);
    expect(await approvals.isApproved(SENDER, TOKEN_B)).toBe(true);
  });

  it('is false below the threshold', async () => {
    const { ledger, approvals } = setup();
    ledger.setAllowance(TOKEN_A, SENDER, ROUTER, APPROVAL_THRESHOLD - 1n);

    expect(await approvals.isApproved(SENDER, TOKEN_A)).toBe(false);
    expect(await approvals.isApproved(SENDER, TOKEN_B)).toBe(false);
  });

  it('asks the token for the allowance granted to the router', async () => {
    const { ledger, approvals } = setup();
    await approvals.isApproved(SENDER, TOKEN_A);

    expect(ledger.reads).toEqual([{ method: 'allowance', to: TOKEN_A, args: [SENDER, ROUTER] }]);
  });

  it('never needs an approval for the native currency', async () => {
    const { ledger, approvals } = setup();

    expect(await approvals.isApproved(SENDER, NATIVE_ADDRESS)).toBe(true);
    expect(ledger.reads).toHaveLength(0);
  });
});

describe('ApprovalManager.approve', () => {
  it('approves the router for the maximum amount and waits for the receipt', async () => {
    const { ledger, approvals } = setup();
    const waitSpy = vi.spyOn(ledger, 'waitForReceipt');

    const hash = await approvals.approve(SENDER, TOKEN_A, SIGNING_KEY);

    expect(ledger.sent).toHaveLength(1);
    const [sent] = ledger.sent;
    expect(sent.hash).toBe(hash);
    expect(sent.method).toBe('approve');
    expect(sent.args).toEqual([ROUTER, MAX_APPROVAL]);
    expect(sent.tx).toMatchObject({ to: TOKEN_A, from: SENDER, value: 0n, gasLimit: 250000n, gasPrice: ledger.gasPrice, nonce: 1 });
    expect(waitSpy).toHaveBeenCalledWith(hash, 30);
    expect(await approvals.isApproved(SENDER, TOKEN_A)).toBe(true);
  });

  it('approves a custom amount with the given gas price', async () => {
    const { ledger, approvals } = setup();

    await approvals.approve(SENDER, TOKEN_A, SIGNING_KEY, { amount: 500n, gasPrice: 9n });

    expect(ledger.sent[0].args).toEqual([ROUTER, 500n]);
    expect(ledger.sent[0].tx.gasPrice).toBe(9n);
    expect(await approvals.allowance(SENDER, TOKEN_A)).toBe(500n);
  });

  it('fails when the approval reverts', async () => {
    const { ledger, approvals } = setup();
    ledger.defaultReceipt = { status: false };

    const error = await approvals.approve(SENDER, TOKEN_A, SIGNING_KEY).catch(e => e);

    expect(error).toBeInstanceOf(ApprovalFailed);
    expect(error.reason).toBe('transaction reverted');
    expect(error.transactionHash).toBe(ledger.sent[0].hash);
  });

  it('fails when no receipt arrives in time', async () => {
    const { ledger, approvals } = setup(5);
    ledger.defaultReceipt = null;

    await expect(approvals.approve(SENDER, TOKEN_A, SIGNING_KEY)).rejects.toThrow(
      `Approval of ${TOKEN_A} failed: no receipt within 5s`
    );
  });

  it('fails when the approval cannot be broadcast, and still consumes the nonce', async () => {
    const { ledger, approvals } = setup();
    ledger.failNextSend = new Error('nonce too low');

    await expect(approvals.approve(SENDER, TOKEN_A, SIGNING_KEY)).rejects.toThrow(ApprovalFailed);
    await approvals.approve(SENDER, TOKEN_A, SIGNING_KEY);

    expect(ledger.signAttempts.map(tx => tx.nonce)).toEqual([1, 2]);
  });

  it('refuses to approve the native currency', async () => {
    const { ledger, approvals } = setup();

    await expect(approvals.approve(SENDER, NATIVE_ADDRESS, SIGNING_KEY)).rejects.toThrow(ApprovalFailed);
    expect(ledger.sent).toHaveLength(0);
  });
});

describe('approval guard', () => {
  it('approves only unapproved, non-native tokens, once each', async () => {
    const { ledger, approvals } = setup();
    ledger.setAllowance(TOKEN_B, SENDER, ROUTER, MAX_APPROVAL);

    const approved = await approvals.ensureApproved({
      owner: SENDER,
      tokens: [NATIVE_ADDRESS, TOKEN_A, TOKEN_B, TOKEN_A.toLowerCase()],
      signingKey: SIGNING_KEY,
      gasPrice: 3n,
    });

    expect(approved.map(String)).toEqual([TOKEN_A]);
    expect(ledger.mutations).toEqual(['approve']);
    expect(ledger.sent[0].tx.gasPrice).toBe(3n);
  });

  it('shares one approval between concurrent callers for the same token', async () => {
    const { ledger, approvals } = setup();
    const context = { owner: SENDER, tokens: [TOKEN_A], signingKey: SIGNING_KEY };

    const results = await Promise.all([approvals.ensureApproved(context), approvals.ensureApproved(context)]);

    expect(ledger.mutations).toEqual(['approve']);
    expect(results.map(tokens => tokens.map(String))).toEqual([[TOKEN_A], []]);
  });

  it('fails every concurrent caller when the shared approval fails', async () => {
    const { ledger, approvals } = setup();
    ledger.defaultReceipt = { status: false };
    const context = { owner: SENDER, tokens: [TOKEN_A], signingKey: SIGNING_KEY };

    const results = await Promise.allSettled([approvals.ensureApproved(context), approvals.ensureApproved(context)]);

    expect(results.map(result => result.status)).toEqual(['rejected', 'rejected']);
    expect(ledger.mutations).toEqual(['approve']);

    ledger.defaultReceipt = { status: true, blockNumber: 2 };
    await approvals.ensureApproved(context);
    expect(ledger.mutations).toEqual(['approve', 'approve']);
  });

  it('runs the approvals before the wrapped operation', async () => {
    const { ledger, approvals } = setup();
    const order: string[] = [];

    const guarded = withApprovalGuard(
      approvals,
      (token: string, amount: bigint) => ({ owner: SENDER, tokens: [token], signingKey: SIGNING_KEY, gasPrice: amount }),
      async (token: string, amount: bigint) => {
        order.push(`operation:${ledger.mutations.join(',')}`);
        return `${token}:${amount}`;
      }
    );

    expect(await guarded(TOKEN_A, 1n)).toBe(`${TOKEN_A}:1`);
    expect(order).toEqual(['operation:approve']);

    await guarded(TOKEN_A, 1n);
    expect(ledger.mutations).toEqual(['approve']);
  });

  it('does not run the operation when an approval fails', async () => {
    const { ledger, approvals } = setup();
    ledger.defaultReceipt = { status: false };
    const operation = vi.fn(async () => 'done');

    const guarded = withApprovalGuard(approvals, () => ({ owner: SENDER, tokens: [TOKEN_A], signingKey: SIGNING_KEY }), operation);

    await expect(guarded()).rejects.toThrow(ApprovalFailed);
    expect(operation).not.toHaveBeenCalled();
  });
});
