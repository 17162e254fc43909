import crypto from 'crypto';

/**
 * Uniform integer in [min, max) from the system CSPRNG
 */
export function randomInt(min: number, max: number): number {
  return crypto.randomInt(min, max);
}

/**
 * SHA-256 digest of a buffer or UTF-8 string
 */
export function sha256(data: Buffer | string): Buffer {
  return crypto.createHash('sha256').update(data).digest();
}
