import { BadRequestException } from '@nestjs/common';
import { getAddress, isAddress, ZeroAddress } from 'ethers';

export type Address = string;

export { ZeroAddress };

// Checksummed form, so that map keys and comparisons never depend on casing.
export function normalizeAddress(value: string, field = 'address'): Address {
  if (!isAddress(value)) {
    throw new BadRequestException(`Invalid ${field}: ${value}`);
  }
  return getAddress(value);
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(value: Address): boolean {
  return sameAddress(value, ZeroAddress);
}

// Used when MARKETPLACE_ADDRESS is not configured.
export const DEFAULT_MARKETPLACE_ADDRESS = '0x000000000000000000000000000000000000beef';
