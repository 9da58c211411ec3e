import { createHash } from "crypto";
import { createReadStream } from "fs";

import { ChecksumUnavailableError } from "./errors.js";
import { ChecksumAlgorithm, CHECKSUM_ALGORITHMS, Checksums } from "./utils.js";

export const CHECKSUM_BLOCK_SIZE = 2 ** 13;

/**
 * Pick the strongest declared checksum; SHA3-256 wins over MD5
 */
export function selectChecksum(checksums: Checksums): {
  algorithm: ChecksumAlgorithm;
  value: string;
} {
  for (const algorithm of CHECKSUM_ALGORITHMS) {
    const value = checksums[algorithm];
    if (value) {
      return { algorithm, value };
    }
  }
  throw new ChecksumUnavailableError();
}

export async function computeChecksum(
  filePath: string,
  algorithm: ChecksumAlgorithm,
  onProgress?: (bytes: number) => void
): Promise<string> {
  const hash = createHash(algorithm);
  const stream = createReadStream(filePath, { highWaterMark: CHECKSUM_BLOCK_SIZE });
  for await (const block of stream) {
    hash.update(block);
    onProgress?.(block.length);
  }
  return hash.digest("hex");
}

/**
 * Compare a file against its declared checksum
 * @returns false on mismatch
 * @throws ChecksumUnavailableError when neither MD5 nor SHA3-256 is declared
 */
export async function checksumCompare(
  filePath: string,
  checksums: Checksums,
  options: { onProgress?: (bytes: number) => void } = {}
): Promise<boolean> {
  const { algorithm, value } = selectChecksum(checksums);
  const actual = await computeChecksum(filePath, algorithm, options.onProgress);
  return actual.toLowerCase() === value.toLowerCase();
}
