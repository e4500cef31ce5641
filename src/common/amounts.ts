import { BadRequestException } from '@nestjs/common';

const UNSIGNED_INTEGER = /^\d+$/;

export const MAX_UINT64 = (1n << 64n) - 1n;

/** Parses a non-negative decimal integer string (wei, token units, ids, seconds). */
export function parseUnsigned(value: string, field: string, max?: bigint): bigint {
  if (!UNSIGNED_INTEGER.test(value)) {
    throw new BadRequestException(`${field} must be a non-negative integer string, got "${value}"`);
  }
  const parsed = BigInt(value);
  if (max !== undefined && parsed > max) {
    throw new BadRequestException(`${field} exceeds ${max.toString()}`);
  }
  return parsed;
}
