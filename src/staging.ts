import Debug from "debug";
import { randomUUID } from "node:crypto";
import { constants, createReadStream, createWriteStream } from "node:fs";
import { access, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { finished, pipeline } from "node:stream/promises";

import { ChunkDescriptor, toRange } from "./chunk-planner.js";
import { calculateChecksum } from "./client/fs.js";
import { IntegrityError } from "./errors.js";
import { Range, reduceRanges, toString } from "./utils/range.js";

const debug = Debug("staging");

export const chunkFileName = (index: number): string =>
  `chunk_${index.toString(10).padStart(6, "0")}`;

const exists = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export interface AssembleOptions {
  // Hex SHA-256 that the assembled file has to match
  fileHash?: string;
}

/**
 * Holds received chunks on disk, one directory per job, until all of them are
 * there and can be concatenated into the destination file.
 */
export class StagingStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  directory(jobId: string): string {
    return join(this.root, jobId);
  }
  chunkPath(jobId: string, index: number): string {
    return join(this.directory(jobId), chunkFileName(index));
  }

  /**
   * Writes the bytes of a chunk next to its final location. The returned path
   * is either promoted or discarded by the caller.
   */
  async writeTemp(
    jobId: string,
    index: number,
    data: Uint8Array
  ): Promise<string> {
    const path = `${this.chunkPath(jobId, index)}.${randomUUID()}.partial`;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
    return path;
  }

  async promote(temporaryPath: string, jobId: string, index: number): Promise<void> {
    await rename(temporaryPath, this.chunkPath(jobId, index));
  }

  async discard(temporaryPath: string): Promise<void> {
    await rm(temporaryPath, { force: true });
  }

  async hasChunk(jobId: string, index: number): Promise<boolean> {
    return exists(this.chunkPath(jobId, index));
  }

  /**
   * Concatenates the chunk files of a job into `destination`, after checking
   * that together they cover every byte of the file exactly once.
   */
  async assemble(
    jobId: string,
    manifest: ChunkDescriptor[],
    destination: string,
    { fileHash }: AssembleOptions = {}
  ): Promise<void> {
    const ranges: Range[] = [];
    for (const chunk of manifest) {
      const path = this.chunkPath(jobId, chunk.index);
      let size: number;
      try {
        ({ size } = await stat(path));
      } catch {
        throw new IntegrityError(`Chunk ${chunk.index} of ${jobId} is missing`);
      }
      if (size !== chunk.length) {
        throw new IntegrityError(
          `Chunk ${chunk.index} of ${jobId} has ${size} bytes, expected ${chunk.length}`
        );
      }
      const range = toRange(chunk);
      if (range !== null) {
        ranges.push(range);
      }
    }
    const fileSize = manifest.reduce((total, { length }) => total + length, 0);
    const covered = reduceRanges(ranges);
    const [range] = covered;
    if (
      fileSize > 0 &&
      (covered.length !== 1 ||
        range === undefined ||
        range.start !== 0 ||
        range.end !== fileSize - 1)
    ) {
      throw new IntegrityError(
        `Chunks of ${jobId} cover ${covered.map(toString).join(", ")}, ` +
          `not 0-${fileSize - 1}`
      );
    }

    debug("assembling %d chunks of %s into %o", manifest.length, jobId, destination);
    await mkdir(dirname(destination), { recursive: true });
    const output = createWriteStream(destination);
    for (const chunk of manifest) {
      const input = createReadStream(this.chunkPath(jobId, chunk.index));
      await pipeline(input, output, { end: false });
    }
    output.end();
    await finished(output);

    if (fileHash !== undefined) {
      const checksumSHA256 = await calculateChecksum(destination, "sha256");
      if (checksumSHA256 !== fileHash.toLowerCase()) {
        throw new IntegrityError(
          `Mismatched checksum for ${destination}: ${checksumSHA256} !== ${fileHash}`
        );
      }
      debug("verified %o", destination);
    }
  }

  /**
   * Moves the chunks staged for one job over to another, for an upload that
   * resumes under a new job id.
   */
  async adopt(fromJobId: string, toJobId: string): Promise<void> {
    const from = this.directory(fromJobId);
    if (!(await exists(from))) {
      return;
    }
    const to = this.directory(toJobId);
    if (await exists(to)) {
      throw new Error(`Staging directory for ${toJobId} already exists`);
    }
    await mkdir(this.root, { recursive: true });
    await rename(from, to);
    debug("moved staged chunks from %s to %s", fromJobId, toJobId);
  }

  async purge(jobId: string): Promise<void> {
    await rm(this.directory(jobId), { recursive: true, force: true });
    debug("purged staged chunks of %s", jobId);
  }
}
