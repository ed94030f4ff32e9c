import Debug from "debug";

import type { ChunkCommit } from "./chunk-planner.js";
import { IntegrityError, InvalidConfigError, JobNotFoundError } from "./errors.js";

const debug = Debug("ledger");

// The plan a ledger was opened with, so that a later session can recompute
// the same manifest
export interface LedgerHeader {
  fileSize: number;
  chunkSize: number;
}

export type CommitOutcome = "committed" | "duplicate";

/**
 * Durable record of which chunks of an upload have been received. The ledger
 * is the authority for resume: whatever it has not recorded gets sent again.
 */
export interface ResumeLedger {
  // Creates the ledger for a job; opening it again with the same plan is a
  // no-op
  open(jobId: string, header: LedgerHeader): Promise<void>;
  header(jobId: string): Promise<LedgerHeader | undefined>;
  // Commits ordered by index
  committed(jobId: string): Promise<ChunkCommit[]>;
  lookup(jobId: string, index: number): Promise<ChunkCommit | undefined>;
  commit(jobId: string, commit: ChunkCommit): Promise<CommitOutcome>;
  purge(jobId: string): Promise<void>;
  close(): Promise<void>;
}

export const sameHeader = (a: LedgerHeader, b: LedgerHeader): boolean =>
  a.fileSize === b.fileSize && a.chunkSize === b.chunkSize;

export const assertSameHeader = (
  jobId: string,
  existing: LedgerHeader,
  header: LedgerHeader
): void => {
  if (!sameHeader(existing, header)) {
    throw new InvalidConfigError(
      `Ledger for ${jobId} was opened for ${existing.fileSize} bytes in ` +
        `chunks of ${existing.chunkSize}, not ${header.fileSize} in ` +
        `chunks of ${header.chunkSize}`
    );
  }
};

/**
 * Decides what a commit means given what is already recorded for its index.
 */
export const compareCommit = (
  jobId: string,
  existing: ChunkCommit | undefined,
  commit: ChunkCommit
): CommitOutcome => {
  if (existing === undefined) {
    return "committed";
  }
  if (
    existing.checksum !== commit.checksum ||
    existing.length !== commit.length
  ) {
    throw new IntegrityError(
      `Chunk ${commit.index} of ${jobId} was already committed with ` +
        `checksum ${existing.checksum}, refusing ${commit.checksum}`
    );
  }
  return "duplicate";
};

interface MemoryEntry {
  header: LedgerHeader;
  commits: Map<number, ChunkCommit>;
}

export class MemoryResumeLedger implements ResumeLedger {
  private entries: Map<string, MemoryEntry> = new Map();

  async open(jobId: string, header: LedgerHeader): Promise<void> {
    const entry = this.entries.get(jobId);
    if (entry !== undefined) {
      assertSameHeader(jobId, entry.header, header);
      return;
    }
    debug("opening ledger for %s", jobId);
    this.entries.set(jobId, { header: { ...header }, commits: new Map() });
  }

  async header(jobId: string): Promise<LedgerHeader | undefined> {
    const entry = this.entries.get(jobId);
    return entry === undefined ? undefined : { ...entry.header };
  }

  async committed(jobId: string): Promise<ChunkCommit[]> {
    return [...this.require(jobId).commits.values()]
      .map((commit) => ({ ...commit }))
      .sort((a, b) => a.index - b.index);
  }

  async lookup(jobId: string, index: number): Promise<ChunkCommit | undefined> {
    const commit = this.require(jobId).commits.get(index);
    return commit === undefined ? undefined : { ...commit };
  }

  async commit(jobId: string, commit: ChunkCommit): Promise<CommitOutcome> {
    const { commits } = this.require(jobId);
    const outcome = compareCommit(jobId, commits.get(commit.index), commit);
    if (outcome === "committed") {
      commits.set(commit.index, { ...commit });
    }
    return outcome;
  }

  async purge(jobId: string): Promise<void> {
    if (this.entries.delete(jobId)) {
      debug("purged ledger for %s", jobId);
    }
  }

  async close(): Promise<void> {}

  private require(jobId: string): MemoryEntry {
    const entry = this.entries.get(jobId);
    if (entry === undefined) {
      throw new JobNotFoundError(jobId);
    }
    return entry;
  }
}
