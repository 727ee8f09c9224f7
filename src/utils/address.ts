import { createHash } from 'crypto';
import { ValidationError } from '../errors';

export type Address = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';
export const BURN_ADDRESS: Address = '0x000000000000000000000000000000000000dead';

export const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: string): boolean {
  return ADDRESS_REGEX.test(value);
}

/**
 * Lowercases a well-formed address; anything else is rejected.
 */
export function normalizeAddress(value: string, field: string = 'address'): Address {
  if (!isAddress(value)) {
    throw ValidationError.invalidField(field, 'must be a 0x-prefixed 20-byte hex address');
  }
  return value.toLowerCase();
}

export function isZeroOrBurn(address: Address): boolean {
  const normalized = address.toLowerCase();
  return normalized === ZERO_ADDRESS || normalized === BURN_ADDRESS;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function requireUsableAddress(address: Address, field: string): Address {
  const normalized = normalizeAddress(address, field);
  if (isZeroOrBurn(normalized)) {
    throw ValidationError.invalidAddress(field);
  }
  return normalized;
}

/**
 * Last 20 bytes of sha256 over the given parts, joined by ':'.
 */
export function deriveAddress(...parts: string[]): Address {
  const digest = createHash('sha256').update(parts.join(':')).digest('hex');
  return `0x${digest.slice(-40)}`;
}
