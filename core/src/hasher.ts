/**
 * Content hashing. Every digest in modsync is the lowercase hex SHA-256
 * of a file's raw bytes.
 */

import { createReadStream } from 'node:fs';
import { createHash } from 'node:crypto';

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Compute the SHA-256 digest of a file by streaming it
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');

  return new Promise((resolve, reject) => {
    const stream = createReadStream(filePath, { highWaterMark: 64 * 1024 });

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Compute the SHA-256 digest of a buffer
 */
export function hashBuffer(buffer: Buffer): string {
  return createHash('sha256').update(buffer).digest('hex');
}

/** Whether `value` is a well-formed digest */
export function isDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value);
}
