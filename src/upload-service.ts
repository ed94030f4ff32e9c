import Debug from "debug";
import fastq, { queueAsPromised } from "fastq";
import { randomUUID } from "node:crypto";
import { isAbsolute, join, normalize } from "node:path";

import {
  ChunkCommit,
  ChunkDescriptor,
  countChunks,
  missingChunks,
  planChunks,
} from "./chunk-planner.js";
import {
  ChunkSource,
  makeSourceFactory,
  sourceName,
  SourceFactory,
} from "./client/sources.js";
import {
  ChunkAck,
  ChunkTransport,
  TransferResult,
  TransferWorkerPool,
} from "./client/transfer-pool.js";
import { ConversionDispatcher } from "./conversion.js";
import {
  CancelledByUserError,
  ChecksumMismatchError,
  IntegrityError,
  InvalidConfigError,
  InvalidTransitionError,
  isTransient,
  JobNotFoundError,
  TimeoutExceededError,
  toError,
  ValidationError,
} from "./errors.js";
import {
  datasetIdPattern,
  isPulled,
  jobDefaults,
  maxTimeoutMinutes,
  UploadJobConfig,
  UploadJobRequest,
} from "./job/job.js";
import { ProgressAggregator, UploadProgress } from "./job/progress.js";
import { JobEntry, JobRegistry } from "./job/registry.js";
import { JobStatus, Transition } from "./job/state-machine.js";
import { compareCommit, ResumeLedger } from "./ledger.js";
import { StagingStore } from "./staging.js";
import {
  checksum,
  defaultChecksumAlgorithm,
  isSupportedAlgorithm,
} from "./utils/hash.js";

const debug = Debug("service");

const megabyte = 1024 * 1024;
const sha256Pattern = /^[0-9a-f]{64}$/i;

export interface UploadLimits {
  defaultChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
  maxFileSize: number;
  checksumAlgorithm: string;
}

export const defaultLimits: Readonly<UploadLimits> = Object.freeze({
  defaultChunkSize: 64 * megabyte,
  minChunkSize: 1,
  maxChunkSize: 1024 * megabyte,
  maxFileSize: 10 * 1024 * 1024 * megabyte,
  checksumAlgorithm: defaultChecksumAlgorithm,
});

export interface InitiateResult {
  jobId: string;
  status: JobStatus;
  chunkSize: number;
  // Unknown until the size of a pulled source has been discovered
  totalChunks: number | null;
}

export interface ResumeInfo {
  uploadId: string;
  missingChunks: number[];
  totalChunks: number;
  chunkSize: number;
  canResume: boolean;
}

export interface CommitResult {
  committed: true;
  duplicate: boolean;
  checksum: string;
}

export interface UploadServiceOptions {
  ledger: ResumeLedger;
  staging: StagingStore;
  dispatcher: ConversionDispatcher;
  // Assembled files go to <uploadDirectory>/<destination>/<file name>
  uploadDirectory: string;
  // Converters write to <convertedDirectory>/<dataset id>
  convertedDirectory: string;
  registry?: JobRegistry;
  progress?: ProgressAggregator;
  sources?: SourceFactory;
  maxConcurrentJobs?: number;
  // Workers per job for sources the server pulls itself
  maxWorkers?: number;
  chunkTimeoutMs?: number;
  limits?: Partial<UploadLimits>;
}

const assertInteger = (
  name: string,
  value: number,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER
): void => {
  if (!Number.isSafeInteger(value) || value < minimum || value > maximum) {
    throw new InvalidConfigError(
      `"${name}" needs to be an integer from ${minimum} to ${maximum}, got ${value}`
    );
  }
};

const resolveDatasetId = (datasetId: string): string => {
  if (!datasetIdPattern.test(datasetId)) {
    throw new InvalidConfigError(
      `"datasetId" needs to be a single path segment, got ${JSON.stringify(datasetId)}`
    );
  }
  return datasetId;
};

const resolveDestination = (destination: string): string => {
  const path = normalize(destination);
  if (isAbsolute(path) || path === ".." || path.startsWith("../")) {
    throw new InvalidConfigError(
      `"destination" needs to be a relative path inside the upload directory`
    );
  }
  return path;
};

/**
 * Commits chunks pulled in-process straight into the service.
 */
class ServiceTransport implements ChunkTransport {
  private service: UploadService;

  constructor(service: UploadService) {
    this.service = service;
  }

  async send(
    jobId: string,
    chunk: ChunkDescriptor,
    data: Uint8Array,
    sum: string
  ): Promise<ChunkAck> {
    const { duplicate, checksum } = await this.service.commitChunk(
      jobId,
      chunk.index,
      data,
      sum
    );
    return { duplicate, checksum };
  }

  async committed(jobId: string): Promise<Iterable<number>> {
    return this.service.committedChunks(jobId);
  }
}

/**
 * Runs upload jobs from initiation to conversion. Every operation of the
 * HTTP API maps to one method.
 */
export class UploadService {
  readonly registry: JobRegistry;
  readonly progress: ProgressAggregator;
  readonly ledger: ResumeLedger;
  readonly staging: StagingStore;
  readonly dispatcher: ConversionDispatcher;
  readonly uploadDirectory: string;
  readonly convertedDirectory: string;

  private sources: SourceFactory;
  private limitValues: UploadLimits;
  private maxWorkers: number;
  private chunkTimeoutMs: number;
  private scheduler: queueAsPromised<string, void>;
  private tasks: Set<Promise<void>> = new Set();
  private resuming: Set<string> = new Set();
  private transport: ServiceTransport;

  constructor({
    ledger,
    staging,
    dispatcher,
    uploadDirectory,
    convertedDirectory,
    registry = new JobRegistry(),
    progress = new ProgressAggregator(),
    sources = makeSourceFactory(),
    maxConcurrentJobs = 2,
    maxWorkers = 4,
    chunkTimeoutMs = 5 * 60 * 1000,
    limits = {},
  }: UploadServiceOptions) {
    this.ledger = ledger;
    this.staging = staging;
    this.dispatcher = dispatcher;
    this.uploadDirectory = uploadDirectory;
    this.convertedDirectory = convertedDirectory;
    this.registry = registry;
    this.progress = progress;
    this.sources = sources;
    this.maxWorkers = maxWorkers;
    this.chunkTimeoutMs = chunkTimeoutMs;
    this.limitValues = { ...defaultLimits, ...limits };

    const { minChunkSize, maxChunkSize, defaultChunkSize } = this.limitValues;
    assertInteger("minChunkSize", minChunkSize, 1);
    assertInteger("maxChunkSize", maxChunkSize, minChunkSize);
    assertInteger("defaultChunkSize", defaultChunkSize, minChunkSize, maxChunkSize);
    assertInteger("maxConcurrentJobs", maxConcurrentJobs, 1);
    if (!isSupportedAlgorithm(this.limitValues.checksumAlgorithm)) {
      throw new InvalidConfigError(
        `Unsupported checksum algorithm ${this.limitValues.checksumAlgorithm}`
      );
    }

    this.scheduler = fastq.promise(this, this.runJob, maxConcurrentJobs);
    this.transport = new ServiceTransport(this);
  }

  limits(): UploadLimits {
    return { ...this.limitValues };
  }

  async initiate(request: UploadJobRequest): Promise<InitiateResult> {
    const { source, resumeToken } = request;
    const { defaultChunkSize, minChunkSize, maxChunkSize, maxFileSize } =
      this.limitValues;

    const chunkSize = request.chunkSize ?? defaultChunkSize;
    assertInteger("chunkSize", chunkSize, minChunkSize, maxChunkSize);
    let fileSize = request.fileSize;
    if (fileSize !== undefined) {
      assertInteger("fileSize", fileSize, 0, maxFileSize);
    } else if (!isPulled(source)) {
      throw new InvalidConfigError(`"fileSize" is needed for local sources`);
    }
    const maxRetries = request.maxRetries ?? jobDefaults.maxRetries;
    assertInteger("maxRetries", maxRetries, 1);
    const retryDelaySeconds =
      request.retryDelaySeconds ?? jobDefaults.retryDelaySeconds;
    const timeoutMinutes = request.timeoutMinutes ?? jobDefaults.timeoutMinutes;
    if (!(retryDelaySeconds >= 0)) {
      throw new InvalidConfigError(`"retryDelaySeconds" cannot be negative`);
    }
    if (!(timeoutMinutes > 0 && timeoutMinutes <= maxTimeoutMinutes)) {
      throw new InvalidConfigError(
        `"timeoutMinutes" needs to be above 0 and at most ${maxTimeoutMinutes}`
      );
    }
    if (request.fileHash !== undefined && !sha256Pattern.test(request.fileHash)) {
      throw new InvalidConfigError(`"fileHash" needs to be a hex SHA-256`);
    }
    if (request.datasetName.trim() === "" || request.userEmail.trim() === "") {
      throw new InvalidConfigError(`"datasetName" and "userEmail" are required`);
    }
    const fileName = sourceName(source);

    const jobId = randomUUID();
    const datasetId = resolveDatasetId(request.datasetId ?? jobId);
    const destination = resolveDestination(request.destination ?? datasetId);

    // A resume token is taken by one initiate at a time
    if (resumeToken !== undefined) {
      if (this.resuming.has(resumeToken)) {
        throw new InvalidConfigError(`Job ${resumeToken} is already being resumed`);
      }
      this.resuming.add(resumeToken);
    }
    try {
      // Resuming takes over what a failed job already received
      let adopted: ChunkCommit[] = [];
      let retryCount = 0;
      if (resumeToken !== undefined) {
        const previous = this.registry.get(resumeToken);
        if (previous !== undefined) {
          const { state } = previous.machine;
          if (state !== "FAILED" || !isTransient(previous.error)) {
            throw new InvalidConfigError(
              `Job ${resumeToken} is ${state} and cannot be resumed with a new job`
            );
          }
          retryCount = previous.retryCount + 1;
        }
        const header = await this.ledger.header(resumeToken);
        if (header === undefined) {
          throw new InvalidConfigError(`Nothing to resume for ${resumeToken}`);
        }
        if (
          header.chunkSize !== chunkSize ||
          (fileSize !== undefined && header.fileSize !== fileSize)
        ) {
          throw new InvalidConfigError(
            `Job ${resumeToken} uploaded ${header.fileSize} bytes in chunks of ` +
              `${header.chunkSize}, which does not match this upload`
          );
        }
        fileSize = header.fileSize;
        retryCount = Math.max(retryCount, 1);
        adopted = await this.ledger.committed(resumeToken);
      }

      const config: UploadJobConfig = {
        jobId,
        source: { ...source },
        datasetId,
        datasetName: request.datasetName,
        userEmail: request.userEmail,
        sensor: request.sensor,
        destination,
        fileName,
        fileHash: request.fileHash?.toLowerCase(),
        chunkSize,
        maxRetries,
        retryDelaySeconds,
        timeoutMinutes,
        autoConvert: request.autoConvert ?? jobDefaults.autoConvert,
        verifyChecksum: request.verifyChecksum ?? jobDefaults.verifyChecksum,
        isPublic: request.isPublic ?? jobDefaults.isPublic,
        folder: request.folder,
        teamUuid: request.teamUuid,
        resumeToken,
        createdAt: new Date(),
      };

      if (fileSize !== undefined) {
        await this.ledger.open(jobId, { fileSize, chunkSize });
      }
      if (resumeToken !== undefined) {
        await this.takeOver(resumeToken, jobId, adopted);
      }

      const entry = this.registry.create(config, fileSize);
      entry.retryCount = retryCount;
      this.progress.register(jobId, fileSize ?? 0, fileName);
      for (const { index, length } of adopted) {
        entry.committed.add(index);
        this.progress.increment(jobId, length);
      }
      entry.machine.onTransition((transition) =>
        this.onTransition(entry, transition)
      );
      const status = entry.machine.state;

      debug("queued job %s for %o", jobId, source);
      this.scheduler
        .push(jobId)
        .catch((error: unknown) => this.fail(entry, toError(error)));
      return {
        jobId,
        status,
        chunkSize,
        totalChunks:
          fileSize === undefined ? null : countChunks(fileSize, chunkSize),
      };
    } finally {
      if (resumeToken !== undefined) {
        this.resuming.delete(resumeToken);
      }
    }
  }

  // Moves the chunks of a failed job over to the job that resumes it
  private async takeOver(
    resumeToken: string,
    jobId: string,
    adopted: ChunkCommit[]
  ): Promise<void> {
    let moved = false;
    try {
      await this.staging.adopt(resumeToken, jobId);
      moved = true;
      for (const commit of adopted) {
        await this.ledger.commit(jobId, commit);
      }
      await this.ledger.purge(resumeToken);
    } catch (error: unknown) {
      await this.ledger.purge(jobId);
      if (moved) {
        await this.staging.adopt(jobId, resumeToken);
      }
      throw error;
    }
    debug("job %s took over %d chunks of %s", jobId, adopted.length, resumeToken);
  }

  /**
   * Stores the bytes of one chunk. Committing a chunk again with the same
   * bytes is acknowledged as a duplicate; different bytes fail the job.
   */
  async commitChunk(
    jobId: string,
    index: number,
    data: Uint8Array,
    expectedChecksum?: string
  ): Promise<CommitResult> {
    const entry = this.registry.require(jobId);
    assertUploading(entry);
    const chunk = this.plannedChunk(entry, index);
    if (data.byteLength !== chunk.length) {
      throw new ValidationError(
        `Chunk ${index} of ${jobId} needs ${chunk.length} bytes, got ${data.byteLength}`
      );
    }
    const actual = checksum(data, this.limitValues.checksumAlgorithm);
    if (
      expectedChecksum !== undefined &&
      expectedChecksum.toLowerCase() !== actual
    ) {
      throw new ChecksumMismatchError(index, expectedChecksum, actual);
    }
    const commit: ChunkCommit = { index, length: chunk.length, checksum: actual };

    const temporaryPath = await this.staging.writeTemp(jobId, index, data);
    let promoted = false;
    try {
      return await entry.lock.submit(async (): Promise<CommitResult> => {
        assertUploading(entry);
        const existing = await this.ledger.lookup(jobId, index);
        if (compareCommit(jobId, existing, commit) === "duplicate") {
          debug("chunk %d of %s is a duplicate", index, jobId);
          return { committed: true, duplicate: true, checksum: actual };
        }
        await this.staging.promote(temporaryPath, jobId, index);
        promoted = true;
        await this.ledger.commit(jobId, commit);
        entry.committed.add(index);
        this.progress.increment(jobId, chunk.length);
        this.checkBarrier(entry);
        return { committed: true, duplicate: false, checksum: actual };
      });
    } catch (error: unknown) {
      if (error instanceof IntegrityError) {
        await this.fail(entry, error);
      }
      throw error;
    } finally {
      if (!promoted) {
        await this.staging.discard(temporaryPath);
      }
    }
  }

  async committedChunks(jobId: string): Promise<number[]> {
    const entry = this.registry.require(jobId);
    return [...entry.committed].sort((a, b) => a - b);
  }

  async getResumeInfo(jobId: string): Promise<ResumeInfo> {
    const entry = this.registry.get(jobId);
    const header = await this.ledger.header(jobId);
    if (entry === undefined) {
      // Left behind by an earlier server process
      if (header === undefined) {
        throw new JobNotFoundError(jobId);
      }
      const manifest = planChunks(header.fileSize, header.chunkSize);
      const committed = await this.ledger.committed(jobId);
      return {
        uploadId: jobId,
        missingChunks: missingChunks(
          manifest,
          committed.map(({ index }) => index)
        ),
        totalChunks: manifest.length,
        chunkSize: header.chunkSize,
        canResume: true,
      };
    }

    const { fileSize, config, machine } = entry;
    if (fileSize === undefined) {
      return {
        uploadId: jobId,
        missingChunks: [],
        totalChunks: 0,
        chunkSize: config.chunkSize,
        canResume: false,
      };
    }
    const manifest = planChunks(fileSize, config.chunkSize);
    const committed =
      header === undefined
        ? [...entry.committed]
        : (await this.ledger.committed(jobId)).map(({ index }) => index);
    const resumable =
      !machine.terminal ||
      (machine.state === "FAILED" && isTransient(entry.error));
    return {
      uploadId: jobId,
      missingChunks: missingChunks(manifest, committed),
      totalChunks: manifest.length,
      chunkSize: config.chunkSize,
      canResume: header !== undefined && resumable,
    };
  }

  getStatus(jobId: string): UploadProgress {
    const progress = this.progress.getProgress(jobId);
    if (progress === undefined) {
      throw new JobNotFoundError(jobId);
    }
    return progress;
  }

  /**
   * Stops the job for good. Workers pulling the source finish their current
   * chunk first.
   */
  async cancel(jobId: string): Promise<JobStatus> {
    const entry = this.registry.require(jobId);
    if (entry.machine.terminal) {
      return entry.machine.state;
    }
    const state = await entry.lock.submit(async () => {
      if (!entry.machine.can("cancel")) {
        throw new InvalidTransitionError(
          entry.machine.state,
          "cancel",
          `Job ${jobId} cannot be cancelled while ${entry.machine.state}`
        );
      }
      return entry.machine.state;
    });
    debug("cancelling job %s in state %s", jobId, state);
    await this.stopTransfer(entry);

    const result = await entry.lock.submit(async () => {
      if (entry.machine.can("cancel")) {
        entry.error = new CancelledByUserError();
      }
      return entry.machine.apply("cancel");
    });
    if (!result.ok) {
      if (entry.machine.terminal) {
        return entry.machine.state;
      }
      throw result.error;
    }
    await this.cleanUp(jobId);
    return entry.machine.state;
  }

  async pause(jobId: string): Promise<JobStatus> {
    const entry = this.registry.require(jobId);
    if (entry.machine.terminal) {
      return entry.machine.state;
    }
    const result = await entry.lock.submit(async () =>
      entry.machine.apply("pause")
    );
    if (!result.ok) {
      throw result.error;
    }
    await this.stopTransfer(entry);
    return entry.machine.state;
  }

  async resume(jobId: string): Promise<JobStatus> {
    const entry = this.registry.require(jobId);
    if (entry.machine.terminal) {
      return entry.machine.state;
    }
    const result = await entry.lock.submit(async () => {
      const result = entry.machine.apply("resume");
      if (result.ok) {
        entry.retryCount += 1;
        this.checkBarrier(entry);
      }
      return result;
    });
    if (!result.ok) {
      throw result.error;
    }
    if (isPulled(entry.config.source) && entry.machine.state === "UPLOADING") {
      await this.stopTransfer(entry);
      this.startTransfer(entry, this.sources(entry.config.source));
    }
    return entry.machine.state;
  }

  /**
   * Forgets jobs that ended longer than the retention window ago. Returns
   * their ids.
   */
  async sweep(now?: number): Promise<string[]> {
    const removed = this.registry.sweep(now);
    for (const { config, machine } of removed) {
      this.progress.remove(config.jobId);
      if (machine.state === "FAILED") {
        await this.cleanUp(config.jobId);
      }
    }
    return removed.map(({ config }) => config.jobId);
  }

  /**
   * Stops picking up jobs and aborts running transfers.
   */
  async close(): Promise<void> {
    this.scheduler.kill();
    for (const entry of this.registry.values()) {
      clearTimeout(entry.watchdog);
      entry.pool?.abort();
    }
    await Promise.allSettled(
      this.registry.values().map(({ transfer }) => transfer)
    );
    await Promise.allSettled([...this.tasks]);
  }

  private async runJob(jobId: string): Promise<void> {
    const entry = this.registry.get(jobId);
    if (entry === undefined || !entry.machine.apply("pickup").ok) {
      return;
    }
    entry.startedAt = new Date();
    this.startWatchdog(entry);
    // A source that never answers is ended by the watchdog
    this.track(
      this.initialize(entry).catch((error: unknown) =>
        this.fail(entry, toError(error))
      )
    );
    // Hold the slot until the job has ended
    await entry.settled;
  }

  private async initialize(entry: JobEntry): Promise<void> {
    const { config } = entry;
    const { jobId, chunkSize } = config;
    let source: ChunkSource | undefined;
    if (isPulled(config.source)) {
      source = this.sources(config.source);
      const size = await source.size();
      assertInteger("fileSize", size, 0, this.limitValues.maxFileSize);
      if (entry.fileSize === undefined) {
        await this.ledger.open(jobId, { fileSize: size, chunkSize });
        entry.fileSize = size;
        this.progress.setTotal(jobId, size);
      } else if (entry.fileSize !== size) {
        throw new InvalidConfigError(
          `${config.source.location} has ${size} bytes, expected ${entry.fileSize}`
        );
      }
    }

    const ready = await entry.lock.submit(async () => {
      const result = entry.machine.apply("ready");
      if (result.ok) {
        this.checkBarrier(entry);
      }
      return result;
    });
    if (ready.ok && source !== undefined && entry.machine.state === "UPLOADING") {
      this.startTransfer(entry, source);
    }
  }

  private startTransfer(entry: JobEntry, source: ChunkSource): void {
    const { config } = entry;
    const { fileSize } = entry;
    if (fileSize === undefined) {
      throw new Error(`Size of ${config.jobId} is not known yet`);
    }
    const pool = new TransferWorkerPool(source, this.transport, {
      maxWorkers: this.maxWorkers,
      maxRetries: config.maxRetries,
      retryDelaySeconds: config.retryDelaySeconds,
      chunkTimeoutMs: this.chunkTimeoutMs,
      checksumAlgorithm: this.limitValues.checksumAlgorithm,
      signal: entry.abortController.signal,
    });
    entry.pool = pool;
    const manifest = planChunks(fileSize, config.chunkSize);
    entry.transfer = pool
      .upload(config.jobId, manifest, entry.committed)
      .then(async (result: TransferResult): Promise<TransferResult> => {
        if (entry.pool === pool) {
          entry.pool = undefined;
        }
        if (!result.ok && !(result.error instanceof CancelledByUserError)) {
          await this.fail(entry, result.error);
        }
        return result;
      });
  }

  // Waits for the workers of an in-process transfer to exit
  private async stopTransfer(entry: JobEntry): Promise<void> {
    entry.pool?.cancel();
    if (entry.transfer !== undefined) {
      await entry.transfer;
    }
  }

  // Runs inside the job lock
  private checkBarrier(entry: JobEntry): void {
    const { fileSize, config } = entry;
    if (fileSize === undefined) {
      return;
    }
    if (entry.committed.size < countChunks(fileSize, config.chunkSize)) {
      return;
    }
    if (entry.machine.apply("uploaded").ok) {
      this.track(this.process(entry, fileSize));
    }
  }

  private async process(entry: JobEntry, fileSize: number): Promise<void> {
    const { config } = entry;
    const { jobId } = config;
    try {
      const directory = join(this.uploadDirectory, config.destination);
      const destination = join(directory, config.fileName);
      await this.staging.assemble(
        jobId,
        planChunks(fileSize, config.chunkSize),
        destination,
        { fileHash: config.verifyChecksum ? config.fileHash : undefined }
      );

      const converting = await entry.lock.submit(async () =>
        entry.machine.apply("convert")
      );
      if (!converting.ok) {
        return;
      }
      if (config.autoConvert) {
        const result = await this.dispatcher.dispatch({
          jobId,
          datasetId: config.datasetId,
          sensor: config.sensor,
          inputDirectory: directory,
          outputDirectory: join(this.convertedDirectory, config.datasetId),
        });
        if (!result.success) {
          throw new Error(result.message ?? `Conversion of ${jobId} failed`);
        }
      }

      const verified = await entry.lock.submit(async () =>
        entry.machine.apply("verify")
      );
      if (verified.ok) {
        await this.cleanUp(jobId);
      }
    } catch (error: unknown) {
      await this.fail(entry, toError(error));
    }
  }

  /**
   * Ends the job as FAILED, unless it has already ended. Never throws.
   */
  private async fail(entry: JobEntry, error: Error): Promise<void> {
    const { jobId } = entry.config;
    const event = error instanceof TimeoutExceededError ? "timeout" : "fail";
    const failed = await entry.lock.submit(async () => {
      if (!entry.machine.can(event)) {
        return false;
      }
      entry.error = error;
      return entry.machine.apply(event).ok;
    });
    if (!failed) {
      debug("not failing job %s in state %s: %s", jobId, entry.machine.state, error.message);
      return;
    }
    entry.abortController.abort();
    if (!isTransient(error)) {
      await this.cleanUp(jobId);
    }
  }

  private onTransition(entry: JobEntry, { from, to, event }: Transition): void {
    const { jobId } = entry.config;
    debug("job %s: %s -> %s (%s)", jobId, from, to, event);
    const message =
      to === "FAILED" || to === "CANCELLED" ? entry.error?.message : undefined;
    this.progress.setStatus(jobId, to, message);
    if (entry.machine.terminal) {
      clearTimeout(entry.watchdog);
    }
  }

  private startWatchdog(entry: JobEntry): void {
    const timeoutMs = entry.config.timeoutMinutes * 60 * 1000;
    entry.watchdog = setTimeout(() => {
      this.track(this.fail(entry, new TimeoutExceededError(timeoutMs)));
    }, timeoutMs);
    entry.watchdog.unref();
  }

  // Removes what a job left in the ledger and the staging area
  private async cleanUp(jobId: string): Promise<void> {
    try {
      await this.ledger.purge(jobId);
      await this.staging.purge(jobId);
    } catch (error: unknown) {
      debug("could not clean up after %s: %O", jobId, error);
    }
  }

  private plannedChunk(entry: JobEntry, index: number): ChunkDescriptor {
    const { fileSize, config } = entry;
    if (fileSize === undefined) {
      throw new ValidationError(`Size of ${config.jobId} is not known yet`);
    }
    const count = countChunks(fileSize, config.chunkSize);
    if (!Number.isSafeInteger(index) || index < 0 || index >= count) {
      throw new ValidationError(
        `Chunk index ${index} is out of range for ${count} chunks`
      );
    }
    const offset = index * config.chunkSize;
    return {
      index,
      offset,
      length: Math.min(config.chunkSize, fileSize - offset),
    };
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task);
    task.then(
      () => this.tasks.delete(task),
      (error: unknown) => {
        this.tasks.delete(task);
        debug("background task failed: %O", error);
      }
    );
  }
}

const assertUploading = (entry: JobEntry): void => {
  const { state } = entry.machine;
  if (state !== "UPLOADING") {
    throw new InvalidTransitionError(
      state,
      "commit",
      `Job ${entry.config.jobId} is ${state}, chunks are only accepted while UPLOADING`
    );
  }
};
