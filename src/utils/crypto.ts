import { createHash, createHmac, timingSafeEqual } from 'crypto';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function hmacSha256(key: Buffer | string, message: string): string {
  return createHmac('sha256', key).update(message, 'utf8').digest('hex');
}

/** Constant-time comparison of two hex digests. */
export function digestEquals(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  if (left.length === 0 || left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/**
 * Map a string to a uniform fraction in [0, 1) using the first 8 bytes of
 * its SHA-256 digest, read big-endian.
 */
export function hashFraction(input: string): number {
  const digest = createHash('sha256').update(input, 'utf8').digest();
  return Number(digest.readBigUInt64BE(0)) / 2 ** 64;
}
