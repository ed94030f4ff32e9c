import retry from "async-retry";
import Debug from "debug";
import fastq, { queueAsPromised } from "fastq";
import { EventEmitter } from "node:events";

import type { ChunkCommit, ChunkDescriptor } from "../chunk-planner.js";
import {
  CancelledByUserError,
  ChecksumMismatchError,
  ChunkUploadFailedError,
  IntegrityError,
  InvalidTransitionError,
  toError,
} from "../errors.js";
import { checksum, defaultChecksumAlgorithm } from "../utils/hash.js";
import { InvalidResponseError } from "../utils/http-client.js";
import type { ChunkSource } from "./sources.js";

const debug = Debug("pool");

export interface ChunkAck {
  // Checksum of the bytes as the receiving end saw them
  checksum: string;
  duplicate: boolean;
}

/**
 * Delivers chunks to wherever they are committed.
 */
export interface ChunkTransport {
  send(
    jobId: string,
    chunk: ChunkDescriptor,
    data: Uint8Array,
    checksum: string,
    signal: AbortSignal
  ): Promise<ChunkAck>;
  // Indices the receiving end has committed so far
  committed?(jobId: string): Promise<Iterable<number>>;
}

export interface TransferOptions {
  maxWorkers?: number;
  // Attempts per chunk
  maxRetries?: number;
  // Delay before the first retry, doubled after every failed attempt
  retryDelaySeconds?: number;
  retryFactor?: number;
  chunkTimeoutMs?: number;
  checksumAlgorithm?: string;
  // Aborting the signal stops the transfer, including attempts in flight
  signal?: AbortSignal;
}

export type TransferError =
  | ChunkUploadFailedError
  | IntegrityError
  | CancelledByUserError;

export type TransferResult =
  | { ok: true; uploaded: number[]; skipped: number[] }
  | { ok: false; error: TransferError; uploaded: number[] };

class AttemptTimeoutError extends Error {}

// Errors that another attempt with the same bytes cannot fix
const isFatal = (error: unknown): boolean =>
  error instanceof IntegrityError ||
  error instanceof InvalidTransitionError ||
  error instanceof InvalidResponseError;

/**
 * Uploads the chunks of a manifest with a bounded number of concurrent
 * workers. Each chunk is read, hashed, sent and acknowledged; failed attempts
 * are retried with exponential backoff.
 *
 * Emits `chunk` with a {@link ChunkCommit} for every acknowledged chunk.
 */
export class TransferWorkerPool extends EventEmitter {
  readonly source: ChunkSource;
  readonly transport: ChunkTransport;

  private maxWorkers: number;
  private maxRetries: number;
  private retryDelaySeconds: number;
  private retryFactor: number;
  private chunkTimeoutMs: number;
  private checksumAlgorithm: string;

  private stopped = false;
  private stopController = new AbortController();
  private abortController = new AbortController();
  private failure: TransferError | undefined;

  constructor(
    source: ChunkSource,
    transport: ChunkTransport,
    {
      maxWorkers = 4,
      maxRetries = 3,
      retryDelaySeconds = 30,
      retryFactor = 2,
      chunkTimeoutMs = 5 * 60 * 1000,
      checksumAlgorithm = defaultChecksumAlgorithm,
      signal,
    }: TransferOptions = {}
  ) {
    super();
    this.source = source;
    this.transport = transport;
    this.maxWorkers = Math.max(1, Math.floor(maxWorkers));
    this.maxRetries = Math.max(1, Math.floor(maxRetries));
    this.retryDelaySeconds = Math.max(0, retryDelaySeconds);
    this.retryFactor = retryFactor;
    this.chunkTimeoutMs = chunkTimeoutMs;
    this.checksumAlgorithm = checksumAlgorithm;

    if (signal !== undefined) {
      if (signal.aborted) {
        this.abort();
      } else {
        signal.addEventListener("abort", () => this.abort(), { once: true });
      }
    }
  }

  get cancelled(): boolean {
    return this.stopped;
  }

  onChunk(listener: (commit: ChunkCommit) => void): () => void {
    this.on("chunk", listener);
    return () => {
      this.off("chunk", listener);
    };
  }

  /**
   * Stops handing out chunks. Attempts in flight run to completion, workers
   * waiting to retry give up at once.
   */
  cancel(): void {
    if (!this.stopped) {
      debug("cancelling transfer from %s", this.source.name);
    }
    this.stopped = true;
    this.stopController.abort();
  }

  /**
   * Stops handing out chunks and aborts the attempts in flight.
   */
  abort(): void {
    this.cancel();
    this.abortController.abort();
  }

  async upload(
    jobId: string,
    manifest: ChunkDescriptor[],
    alreadyCommitted: Iterable<number> = []
  ): Promise<TransferResult> {
    const skip = new Set(alreadyCommitted);
    const pending = manifest.filter(({ index }) => !skip.has(index));
    const skipped = manifest
      .filter(({ index }) => skip.has(index))
      .map(({ index }) => index);
    debug(
      "uploading %d of %d chunks for %s with %d workers",
      pending.length,
      manifest.length,
      jobId,
      this.maxWorkers
    );

    const uploaded: number[] = [];
    const queue: queueAsPromised<ChunkDescriptor, boolean> = fastq.promise(
      this,
      (chunk: ChunkDescriptor) => this.runChunk(jobId, chunk, skipped),
      this.maxWorkers
    );
    await Promise.all(
      pending.map(async (chunk) => {
        if (await queue.push(chunk)) {
          uploaded.push(chunk.index);
        }
      })
    );
    debug("workers for %s exited, %d chunks sent", jobId, uploaded.length);

    uploaded.sort((a, b) => a - b);
    skipped.sort((a, b) => a - b);
    if (this.failure !== undefined) {
      return { ok: false, error: this.failure, uploaded };
    }
    if (this.stopped && uploaded.length + skipped.length < manifest.length) {
      return { ok: false, error: new CancelledByUserError(), uploaded };
    }
    return { ok: true, uploaded, skipped };
  }

  // Resolves true if the chunk was sent, never rejects
  private async runChunk(
    jobId: string,
    chunk: ChunkDescriptor,
    skipped: number[]
  ): Promise<boolean> {
    if (this.stopped) {
      return false;
    }
    try {
      if (this.transport.committed !== undefined) {
        const committed = new Set(await this.transport.committed(jobId));
        if (committed.has(chunk.index)) {
          debug("chunk %d of %s was committed elsewhere", chunk.index, jobId);
          skipped.push(chunk.index);
          return false;
        }
      }
      const commit = await this.send(jobId, chunk);
      this.emit("chunk", commit);
      return true;
    } catch (error: unknown) {
      if (error instanceof CancelledByUserError) {
        return false;
      }
      this.fail(
        error instanceof IntegrityError ||
          error instanceof ChunkUploadFailedError
          ? error
          : new ChunkUploadFailedError(chunk.index, toError(error))
      );
      return false;
    }
  }

  private fail(error: TransferError): void {
    debug("transfer failed: %s", error.message);
    this.failure ??= error;
    this.abort();
  }

  private async send(
    jobId: string,
    chunk: ChunkDescriptor
  ): Promise<ChunkCommit> {
    const { index } = chunk;
    let attempting = false;
    const retrying = retry(
      async (
        bail: (e: Error) => void,
        attempt: number
      ): Promise<ChunkCommit | undefined> => {
        if (this.stopped) {
          bail(new CancelledByUserError());
          return undefined;
        }
        attempting = true;
        try {
          return await this.attempt(jobId, chunk);
        } catch (error: unknown) {
          if (this.stopped) {
            bail(new CancelledByUserError());
            return undefined;
          }
          if (error instanceof IntegrityError) {
            bail(error);
            return undefined;
          }
          if (isFatal(error)) {
            bail(new ChunkUploadFailedError(index, toError(error)));
            return undefined;
          }
          debug(
            "attempt %d of %d for chunk %d of %s failed: %s",
            attempt,
            this.maxRetries,
            index,
            jobId,
            toError(error).message
          );
          throw error;
        } finally {
          attempting = false;
        }
      },
      {
        retries: this.maxRetries - 1,
        factor: this.retryFactor,
        minTimeout: this.retryDelaySeconds * 1000,
        maxTimeout: Infinity,
        randomize: false,
      }
    ).catch((error: unknown) => {
      if (
        error instanceof CancelledByUserError ||
        error instanceof IntegrityError ||
        error instanceof ChunkUploadFailedError
      ) {
        throw error;
      }
      throw new ChunkUploadFailedError(index, toError(error));
    });

    const result = await new Promise<ChunkCommit | undefined>(
      (resolve, reject) => {
        const { signal } = this.stopController;
        // Stopping ends the wait between attempts
        const onStop = () => {
          if (!attempting) {
            resolve(undefined);
          }
        };
        signal.addEventListener("abort", onStop, { once: true });
        retrying.then(
          (value) => {
            signal.removeEventListener("abort", onStop);
            resolve(value);
          },
          (error: unknown) => {
            signal.removeEventListener("abort", onStop);
            reject(error);
          }
        );
      }
    );
    if (result === undefined) {
      throw new CancelledByUserError();
    }
    return result;
  }

  private async attempt(
    jobId: string,
    chunk: ChunkDescriptor
  ): Promise<ChunkCommit> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    this.abortController.signal.addEventListener("abort", onAbort);
    const timeout = setTimeout(() => {
      controller.abort(
        new AttemptTimeoutError(
          `Chunk ${chunk.index} took longer than ${this.chunkTimeoutMs}ms`
        )
      );
    }, this.chunkTimeoutMs);
    timeout.unref();

    const { signal } = controller;
    try {
      const data = await withSignal(this.source.read(chunk, signal), signal);
      if (data.byteLength !== chunk.length) {
        throw new Error(
          `Read ${data.byteLength} bytes for chunk ${chunk.index}, expected ${chunk.length}`
        );
      }
      const sum = checksum(data, this.checksumAlgorithm);
      const ack = await withSignal(
        this.transport.send(jobId, chunk, data, sum, signal),
        signal
      );
      if (ack.checksum !== sum) {
        throw new ChecksumMismatchError(chunk.index, sum, ack.checksum);
      }
      return { index: chunk.index, length: chunk.length, checksum: sum };
    } finally {
      clearTimeout(timeout);
      this.abortController.signal.removeEventListener("abort", onAbort);
    }
  }
}

// Settles with the signal's reason if it aborts first
const withSignal = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(toError(signal.reason ?? new Error("Aborted")));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
