import Debug from "debug";
import { EventEmitter } from "node:events";

import { isTerminal, JobStatus } from "./state-machine.js";

const debug = Debug("progress");

const megabyte = 1024 * 1024;
// Lowest speed used for the ETA, in MB/s
const epsilon = 1e-6;

export interface UploadProgress {
  readonly jobId: string;
  readonly status: JobStatus;
  readonly progressPercentage: number;
  readonly bytesUploaded: number;
  readonly bytesTotal: number;
  readonly speedMbps: number;
  readonly etaSeconds: number;
  readonly currentFile: string;
  readonly errorMessage: string;
  readonly lastUpdated: Date;
}

interface Sample {
  time: number;
  bytes: number;
}

interface ProgressRecord {
  jobId: string;
  status: JobStatus;
  bytesUploaded: number;
  bytesTotal: number;
  currentFile: string;
  errorMessage: string;
  lastUpdated: number;
  startedAt: number;
  samples: Sample[];
}

export interface ProgressAggregatorOptions {
  windowMs?: number;
  now?: () => number;
}

/**
 * Byte counters for every job. Workers report finished chunks through
 * `increment`; status queries read through `getProgress`. Each mutation is a
 * single synchronous call, so no reader ever sees half an update.
 */
export class ProgressAggregator extends EventEmitter {
  private records: Map<string, ProgressRecord> = new Map();
  private windowMs: number;
  private now: () => number;

  constructor({ windowMs = 5000, now = Date.now }: ProgressAggregatorOptions = {}) {
    super();
    this.windowMs = windowMs;
    this.now = now;
  }

  register(jobId: string, bytesTotal: number, currentFile: string = ""): void {
    const time = this.now();
    this.records.set(jobId, {
      jobId,
      status: "QUEUED",
      bytesUploaded: 0,
      bytesTotal,
      currentFile,
      errorMessage: "",
      lastUpdated: time,
      startedAt: time,
      samples: [],
    });
    this.publish(jobId);
  }

  onProgress(listener: (progress: UploadProgress) => void): () => void {
    this.on("progress", listener);
    return () => {
      this.off("progress", listener);
    };
  }

  has(jobId: string): boolean {
    return this.records.has(jobId);
  }

  remove(jobId: string): void {
    this.records.delete(jobId);
  }

  setTotal(jobId: string, bytesTotal: number): void {
    const record = this.require(jobId);
    record.bytesTotal = bytesTotal;
    record.lastUpdated = this.now();
    this.publish(jobId);
  }

  setStatus(jobId: string, status: JobStatus, errorMessage?: string): void {
    const record = this.require(jobId);
    record.status = status;
    if (errorMessage !== undefined) {
      record.errorMessage = errorMessage;
    }
    if (status === "UPLOADING") {
      // Speed is measured from the moment bytes can flow again
      record.startedAt = this.now();
      record.samples = [];
    }
    record.lastUpdated = this.now();
    this.publish(jobId);
  }

  /**
   * Adds the bytes of a committed chunk. Returns false if the job has
   * already ended, in which case the counters stay frozen.
   */
  increment(jobId: string, bytes: number): boolean {
    if (!Number.isFinite(bytes) || bytes < 0) {
      throw new RangeError(`Cannot add ${bytes} bytes to progress of ${jobId}`);
    }
    const record = this.require(jobId);
    if (isTerminal(record.status)) {
      debug("ignoring %d bytes for finished job %s", bytes, jobId);
      return false;
    }
    const time = this.now();
    record.bytesUploaded += bytes;
    record.samples.push({ time, bytes });
    record.lastUpdated = time;
    this.prune(record, time);
    this.publish(jobId);
    return true;
  }

  getProgress(jobId: string): UploadProgress | undefined {
    const record = this.records.get(jobId);
    if (record === undefined) {
      return undefined;
    }
    return this.snapshot(record);
  }

  private require(jobId: string): ProgressRecord {
    const record = this.records.get(jobId);
    if (record === undefined) {
      throw new Error(`No progress registered for job ${jobId}`);
    }
    return record;
  }

  private prune(record: ProgressRecord, time: number): void {
    const cutoff = time - this.windowMs;
    record.samples = record.samples.filter((sample) => sample.time > cutoff);
  }

  private speed(record: ProgressRecord, time: number): number {
    const cutoff = time - this.windowMs;
    const bytes = record.samples
      .filter((sample) => sample.time > cutoff)
      .reduce((total, sample) => total + sample.bytes, 0);
    if (bytes === 0) {
      return 0;
    }
    // Young transfers are measured over the time they have been running
    const spanMs = Math.min(this.windowMs, time - record.startedAt);
    return bytes / megabyte / (Math.max(spanMs, 1) / 1000);
  }

  private snapshot(record: ProgressRecord): UploadProgress {
    const time = this.now();
    const { bytesUploaded, bytesTotal } = record;
    const speedMbps = this.speed(record, time);
    const remaining = Math.max(bytesTotal - bytesUploaded, 0);
    const etaSeconds =
      remaining === 0
        ? 0
        : Math.ceil(remaining / megabyte / Math.max(speedMbps, epsilon));
    let progressPercentage = (bytesUploaded / bytesTotal) * 100;
    if (bytesTotal === 0) {
      progressPercentage = record.status === "COMPLETED" ? 100 : 0;
    }
    return Object.freeze({
      jobId: record.jobId,
      status: record.status,
      progressPercentage,
      bytesUploaded,
      bytesTotal,
      speedMbps,
      etaSeconds,
      currentFile: record.currentFile,
      errorMessage: record.errorMessage,
      lastUpdated: new Date(record.lastUpdated),
    });
  }

  private publish(jobId: string): void {
    const record = this.records.get(jobId);
    if (record !== undefined && this.listenerCount("progress") > 0) {
      this.emit("progress", this.snapshot(record));
    }
  }
}
