import retry from "async-retry";
import Debug from "debug";
import { DataSource, EntityManager, QueryFailedError } from "typeorm";

import type { ChunkCommit } from "./chunk-planner.js";
import { Chunk } from "./entity/chunk.js";
import { DatabaseType, getDataSource } from "./entity/data-source.js";
import { Ledger } from "./entity/ledger.js";
import { InvalidConfigError, JobNotFoundError } from "./errors.js";
import {
  assertSameHeader,
  CommitOutcome,
  compareCommit,
  LedgerHeader,
  MemoryResumeLedger,
  ResumeLedger,
} from "./ledger.js";
import { SerialQueue } from "./utils/serial-queue.js";

const debug = Debug("ledger");

const isSerializationFailure = (error: unknown): boolean =>
  error instanceof QueryFailedError &&
  error.message === "could not serialize access due to concurrent update";

const toCommit = ({ index, length, checksum }: Chunk): ChunkCommit => ({
  index,
  length: Number(length),
  checksum,
});

/**
 * Ledger kept in a relational database, so that uploads can be resumed after
 * the server restarts. Transactions are submitted to a queue and run one at a
 * time.
 */
export class DatabaseResumeLedger implements ResumeLedger {
  dataSource: DataSource;
  private queue: SerialQueue = new SerialQueue();

  constructor(dataSource: DataSource) {
    this.dataSource = dataSource;
  }

  async submitTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>
  ): Promise<T> {
    return this.queue.submit(() => this.runTransaction(callback));
  }
  async runTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>
  ): Promise<T> {
    debug("starting transaction");
    const result = await retry(
      async (bail: (e: Error) => void): Promise<{ value: T } | undefined> => {
        try {
          const value = await this.dataSource.transaction(
            "SERIALIZABLE",
            callback
          );
          return { value };
        } catch (error: unknown) {
          if (isSerializationFailure(error)) {
            throw error;
          }
          bail(
            error instanceof Error
              ? error
              : new Error(`transaction failed with error: ${error}`)
          );
          return undefined;
        }
      }
    );
    debug("finished transaction");
    if (result === undefined) {
      throw new Error("Transaction was aborted");
    }
    return result.value;
  }

  async open(jobId: string, header: LedgerHeader): Promise<void> {
    return this.submitTransaction(async (manager): Promise<void> => {
      const ledger = await manager.findOneBy(Ledger, { jobId });
      if (ledger !== null) {
        assertSameHeader(jobId, toHeader(ledger), header);
        return;
      }
      debug("opening ledger for %s", jobId);
      await manager.insert(Ledger, { jobId, ...header });
    });
  }

  async header(jobId: string): Promise<LedgerHeader | undefined> {
    return this.submitTransaction(
      async (manager): Promise<LedgerHeader | undefined> => {
        const ledger = await manager.findOneBy(Ledger, { jobId });
        return ledger === null ? undefined : toHeader(ledger);
      }
    );
  }

  async committed(jobId: string): Promise<ChunkCommit[]> {
    return this.submitTransaction(async (manager): Promise<ChunkCommit[]> => {
      await requireLedger(manager, jobId);
      const chunks = await manager.find(Chunk, {
        where: { jobId },
        order: { index: "ASC" },
      });
      return chunks.map(toCommit);
    });
  }

  async lookup(jobId: string, index: number): Promise<ChunkCommit | undefined> {
    return this.submitTransaction(
      async (manager): Promise<ChunkCommit | undefined> => {
        await requireLedger(manager, jobId);
        const chunk = await manager.findOneBy(Chunk, { jobId, index });
        return chunk === null ? undefined : toCommit(chunk);
      }
    );
  }

  async commit(jobId: string, commit: ChunkCommit): Promise<CommitOutcome> {
    return this.submitTransaction(async (manager): Promise<CommitOutcome> => {
      await requireLedger(manager, jobId);
      const { index, length, checksum } = commit;
      const chunk = await manager.findOneBy(Chunk, { jobId, index });
      const outcome = compareCommit(
        jobId,
        chunk === null ? undefined : toCommit(chunk),
        commit
      );
      if (outcome === "committed") {
        await manager.insert(Chunk, { jobId, index, length, checksum });
      }
      return outcome;
    });
  }

  async purge(jobId: string): Promise<void> {
    return this.submitTransaction(async (manager): Promise<void> => {
      await manager.delete(Chunk, { jobId });
      const result = await manager.delete(Ledger, { jobId });
      if (result.affected) {
        debug("purged ledger for %s", jobId);
      }
    });
  }

  async close(): Promise<void> {
    await this.queue.drained();
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}

const toHeader = ({ fileSize, chunkSize }: Ledger): LedgerHeader => ({
  fileSize: Number(fileSize),
  chunkSize: Number(chunkSize),
});

const requireLedger = async (
  manager: EntityManager,
  jobId: string
): Promise<Ledger> => {
  const ledger = await manager.findOneBy(Ledger, { jobId });
  if (ledger === null) {
    throw new JobNotFoundError(jobId);
  }
  return ledger;
};

export const createLedger = async (
  type: DatabaseType,
  connectionString: string | undefined
): Promise<ResumeLedger> => {
  if (type === "memory") {
    return new MemoryResumeLedger();
  }
  if (connectionString === undefined) {
    throw new InvalidConfigError(
      `A connection string is needed for a ${type} database`
    );
  }
  return new DatabaseResumeLedger(await getDataSource(type, connectionString));
};
