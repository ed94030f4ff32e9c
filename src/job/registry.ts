import Debug from "debug";

import type { TransferResult, TransferWorkerPool } from "../client/transfer-pool.js";
import { JobNotFoundError } from "../errors.js";
import { SerialQueue } from "../utils/serial-queue.js";
import type { UploadJobConfig } from "./job.js";
import { isTerminal, JobStateMachine, JobStatus } from "./state-machine.js";

const debug = Debug("service");

export interface JobEntry {
  readonly config: UploadJobConfig;
  readonly machine: JobStateMachine;
  // Serializes ledger commits, the completion barrier and state changes
  readonly lock: SerialQueue;
  // Aborted when the job fails or times out
  readonly abortController: AbortController;
  readonly settled: Promise<JobStatus>;
  fileSize: number | undefined;
  committed: Set<number>;
  startedAt: Date | undefined;
  completedAt: Date | undefined;
  error: Error | undefined;
  retryCount: number;
  pool: TransferWorkerPool | undefined;
  transfer: Promise<TransferResult> | undefined;
  watchdog: NodeJS.Timeout | undefined;
}

export interface JobRegistryOptions {
  // How long finished jobs stay queryable
  retentionMs?: number;
  now?: () => number;
}

export class JobRegistry {
  private entries: Map<string, JobEntry> = new Map();
  private retentionMs: number;
  private now: () => number;

  constructor({
    retentionMs = 60 * 60 * 1000,
    now = Date.now,
  }: JobRegistryOptions = {}) {
    this.retentionMs = retentionMs;
    this.now = now;
  }

  create(config: UploadJobConfig, fileSize: number | undefined): JobEntry {
    const { jobId } = config;
    if (this.entries.has(jobId)) {
      throw new Error(`Job ${jobId} is already registered`);
    }
    const machine = new JobStateMachine();
    let resolve: (status: JobStatus) => void = () => {};
    const settled = new Promise<JobStatus>((r) => {
      resolve = r;
    });
    const entry: JobEntry = {
      config,
      machine,
      lock: new SerialQueue(),
      abortController: new AbortController(),
      settled,
      fileSize,
      committed: new Set(),
      startedAt: undefined,
      completedAt: undefined,
      error: undefined,
      retryCount: 0,
      pool: undefined,
      transfer: undefined,
      watchdog: undefined,
    };
    machine.onTransition(({ to }) => {
      if (isTerminal(to)) {
        entry.completedAt = new Date(this.now());
        resolve(to);
      }
    });
    this.entries.set(jobId, entry);
    return entry;
  }

  get(jobId: string): JobEntry | undefined {
    return this.entries.get(jobId);
  }

  require(jobId: string): JobEntry {
    const entry = this.entries.get(jobId);
    if (entry === undefined) {
      throw new JobNotFoundError(jobId);
    }
    return entry;
  }

  has(jobId: string): boolean {
    return this.entries.has(jobId);
  }

  values(): JobEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Removes jobs that ended more than the retention window ago and returns
   * them.
   */
  sweep(now: number = this.now()): JobEntry[] {
    const removed: JobEntry[] = [];
    for (const [jobId, entry] of this.entries) {
      const { completedAt } = entry;
      if (completedAt === undefined || !entry.machine.terminal) {
        continue;
      }
      if (completedAt.getTime() + this.retentionMs <= now) {
        this.entries.delete(jobId);
        removed.push(entry);
      }
    }
    if (removed.length > 0) {
      debug("swept %d finished jobs", removed.length);
    }
    return removed;
  }
}
