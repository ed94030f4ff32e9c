import { InvalidConfigError } from "./errors.js";
import type { Range } from "./utils/range.js";

// Checksum and commit state of a chunk live in its ChunkCommit
export interface ChunkDescriptor {
  readonly index: number;
  readonly offset: number;
  readonly length: number;
}

/**
 * What the ledger remembers about a chunk once it has been received. A
 * commit is set once, a second commit of the same index has to carry the
 * same checksum.
 */
export interface ChunkCommit {
  index: number;
  length: number;
  checksum: string;
}

const assertPlan = (fileSize: number, chunkSize: number): void => {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigError(
      `"chunkSize" needs to be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isSafeInteger(fileSize) || fileSize < 0) {
    throw new InvalidConfigError(
      `"fileSize" needs to be a non-negative integer, got ${fileSize}`
    );
  }
};

export const countChunks = (fileSize: number, chunkSize: number): number => {
  assertPlan(fileSize, chunkSize);
  return Math.max(1, Math.ceil(fileSize / chunkSize));
};

/**
 * Splits `[0, fileSize)` into chunks of `chunkSize` bytes. The last chunk
 * holds the remainder. An empty file still gets one (empty) chunk, so that
 * every upload has something to commit.
 *
 * The result depends on nothing but the two arguments: a client resuming an
 * upload regenerates the exact chunk boundaries of the first session.
 */
export const planChunks = (
  fileSize: number,
  chunkSize: number
): ChunkDescriptor[] => {
  const count = countChunks(fileSize, chunkSize);
  const chunks: ChunkDescriptor[] = [];
  for (let index = 0; index < count; index++) {
    const offset = index * chunkSize;
    // Last chunk cannot go beyond the end of the file
    const length = Math.min(chunkSize, fileSize - offset);
    chunks.push({ index, offset, length });
  }
  return chunks;
};

// Inclusive byte range, or null for an empty chunk
export const toRange = ({ offset, length }: ChunkDescriptor): Range | null =>
  length > 0 ? { start: offset, end: offset + length - 1 } : null;

export const missingChunks = (
  manifest: ChunkDescriptor[],
  committed: Iterable<number>
): number[] => {
  const done = new Set(committed);
  return manifest
    .filter(({ index }) => !done.has(index))
    .map(({ index }) => index);
};
