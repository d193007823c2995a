/**
 * Streaming File Hash Utility
 *
 * Digests the full content of a file by reading it in fixed-size blocks, so
 * memory use stays bounded by the block size whatever the file size.
 */

import fs from 'fs';
import crypto, { type BinaryLike } from 'crypto';
import { logger } from './logging.js';
import { ErrorCode, GeneralError } from '../errors/index.js';
import { getErrorMessage, toError } from './errorHandling.js';

export const DEFAULT_HASH_ALGORITHM = 'sha256';
export const DEFAULT_HASH_BLOCK_SIZE = 8 * 1024 * 1024; // 8 MiB

/**
 * Whether Node's crypto module supports `algorithm`
 */
export function isSupportedHashAlgorithm(algorithm: string): boolean {
  return crypto.getHashes().includes(algorithm.toLowerCase());
}

/**
 * Digest a block of data already held in memory
 */
export function hashData(data: BinaryLike, algorithm: string = DEFAULT_HASH_ALGORITHM): string {
  assertAlgorithm(algorithm);
  return crypto.createHash(algorithm).update(data).digest('hex');
}

/**
 * Calculate the hex digest of a file's full content
 *
 * @param filePath - Path to the file
 * @param algorithm - Any algorithm listed by `crypto.getHashes()`
 * @param blockSize - Bytes read per chunk
 * @returns Hex digest
 *
 * @example
 * ```typescript
 * const hash = await hashFile('/photos/IMG_0001.jpg');
 * // hash: "e3b0c442..." (64 character hex string)
 * ```
 */
export async function hashFile(
  filePath: string,
  algorithm: string = DEFAULT_HASH_ALGORITHM,
  blockSize: number = DEFAULT_HASH_BLOCK_SIZE
): Promise<string> {
  assertAlgorithm(algorithm);

  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new GeneralError(
      `Invalid hash block size ${blockSize}: must be a positive integer`,
      ErrorCode.VALIDATION_INPUT_INVALID,
      { operation: 'hashFile', metadata: { blockSize } }
    );
  }

  const startTime = Date.now();
  const hasher = crypto.createHash(algorithm);

  try {
    // for-await destroys the stream (closing the descriptor) on every exit path
    for await (const chunk of fs.createReadStream(filePath, { highWaterMark: blockSize })) {
      hasher.update(chunk);
    }
  } catch (error) {
    logger.error('Failed to calculate file hash', {
      filePath,
      error: getErrorMessage(error),
    });
    throw new GeneralError(
      `Failed to hash file ${filePath}: ${getErrorMessage(error)}`,
      ErrorCode.FS_READ_FAILED,
      { operation: 'hashFile', filePath },
      toError(error)
    );
  }

  const digest = hasher.digest('hex');

  logger.debug('File hash generated', {
    filePath,
    algorithm,
    hash: digest.substring(0, 8),
    timeMs: Date.now() - startTime,
  });

  return digest;
}

function assertAlgorithm(algorithm: string): void {
  if (!isSupportedHashAlgorithm(algorithm)) {
    throw new GeneralError(
      `Unknown hash algorithm requested '${algorithm}'`,
      ErrorCode.VALIDATION_INPUT_INVALID,
      { operation: 'hashFile', metadata: { algorithm } }
    );
  }
}
