export type SwapErrorKind =
  | 'InvalidAddress'
  | 'InvalidAmount'
  | 'UnsupportedTrade'
  | 'InsufficientBalance'
  | 'QuoteUnavailable'
  | 'ApprovalFailed'
  | 'SwapReverted'
  | 'ConfigurationError';

/**
 * Base class for every failure the swap client raises on its own.
 * Errors coming from the RPC layer during reads are not wrapped.
 */
export abstract class SwapClientError extends Error {
  abstract readonly kind: SwapErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAddress extends SwapClientError {
  readonly kind = 'InvalidAddress';

  constructor(readonly input: unknown, reason?: string) {
    super(`Invalid address: ${describeInput(input)}${reason ? ` (${reason})` : ''}`);
  }
}

export class InvalidAmount extends SwapClientError {
  readonly kind = 'InvalidAmount';

  constructor(readonly amount: bigint, reason: string) {
    super(`Invalid amount ${amount.toString()}: ${reason}`);
  }
}

export class UnsupportedTrade extends SwapClientError {
  readonly kind = 'UnsupportedTrade';

  constructor(reason: string) {
    super(`Unsupported trade: ${reason}`);
  }
}

export class InsufficientBalance extends SwapClientError {
  readonly kind = 'InsufficientBalance';

  constructor(readonly had: bigint, readonly needed: bigint) {
    super(`Insufficient balance. Had ${had.toString()}, needed ${needed.toString()}`);
  }
}

export class QuoteUnavailable extends SwapClientError {
  readonly kind = 'QuoteUnavailable';

  constructor(readonly path: readonly string[], readonly quantity: bigint, cause?: unknown) {
    super(
      `No quote for ${quantity.toString()} along ${path.join(' -> ')}${causeSuffix(cause)}`,
      { cause }
    );
  }
}

export class ApprovalFailed extends SwapClientError {
  readonly kind = 'ApprovalFailed';

  constructor(readonly token: string, readonly reason: string, readonly transactionHash?: string) {
    super(`Approval of ${token} failed: ${reason}${transactionHash ? ` (tx ${transactionHash})` : ''}`);
  }
}

export class SwapReverted extends SwapClientError {
  readonly kind = 'SwapReverted';

  constructor(readonly reason: string, readonly transactionHash?: string, cause?: unknown) {
    super(
      `Swap failed: ${reason}${transactionHash ? ` (tx ${transactionHash})` : ''}${causeSuffix(cause)}`,
      { cause }
    );
  }
}

export class ConfigurationError extends SwapClientError {
  readonly kind = 'ConfigurationError';

  constructor(readonly details: readonly string[]) {
    super(`Invalid configuration: ${details.join('; ')}`);
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: SwapClientError };

/**
 * Run `operation`, turning any SwapClientError into a failed outcome.
 * Anything else (RPC failures, bugs) is rethrown.
 */
export async function toOutcome<T>(operation: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    if (error instanceof SwapClientError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function causeSuffix(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`;
}

function describeInput(input: unknown): string {
  if (input instanceof Uint8Array) {
    return `<${input.length} bytes>`;
  }
  return typeof input === 'string' ? `"${input}"` : String(input);
}
