import { getAddress, getBytes, hexlify, ZeroAddress } from 'ethers';
import { InvalidAddress } from '../errors';

const ADDRESS_LENGTH = 20;
const HEX_ADDRESS = /^0x[0-9a-fA-F]{40}$/;

/**
 * A 20-byte account or contract identifier.
 * Instances are immutable; two instances are equal when their bytes are.
 */
export class Address {
  private readonly raw: Uint8Array;
  private readonly checksummed: string;

  private constructor(raw: Uint8Array) {
    this.raw = Uint8Array.from(raw);
    this.checksummed = getAddress(hexlify(raw));
  }

  static fromBytes(bytes: Uint8Array): Address {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new InvalidAddress(bytes, `expected ${ADDRESS_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Address(bytes);
  }

  static fromString(value: string): Address {
    if (!value.startsWith('0x')) {
      throw new InvalidAddress(value, 'missing 0x prefix');
    }
    if (!HEX_ADDRESS.test(value)) {
      throw new InvalidAddress(value, 'expected 40 hex characters');
    }
    try {
      // getAddress rejects mixed-case input whose casing is not a valid checksum
      return new Address(getBytes(getAddress(value)));
    } catch {
      throw new InvalidAddress(value, 'bad checksum');
    }
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.raw);
  }

  equals(other: Address): boolean {
    return this.raw.every((byte, i) => byte === other.raw[i]);
  }

  isNative(): boolean {
    return this.equals(NATIVE_ADDRESS);
  }

  toString(): string {
    return this.checksummed;
  }

  toJSON(): string {
    return this.checksummed;
  }
}

export type AddressLike = string | Uint8Array | Address;

/**
 * Sentinel for the network's native currency (BNB on BSC). Not an ERC20 contract.
 */
export const NATIVE_ADDRESS = Address.fromString(ZeroAddress);

export function toCanonical(input: AddressLike): Address {
  if (input instanceof Address) {
    return input;
  }
  if (input instanceof Uint8Array) {
    return Address.fromBytes(input);
  }
  if (typeof input === 'string') {
    return Address.fromString(input);
  }
  throw new InvalidAddress(input, 'unsupported address type');
}

export function toDisplay(address: AddressLike): string {
  return toCanonical(address).toString();
}

export function isSameAddress(a: AddressLike, b: AddressLike): boolean {
  return toCanonical(a).equals(toCanonical(b));
}

export function isNative(address: AddressLike): boolean {
  return toCanonical(address).isNative();
}
