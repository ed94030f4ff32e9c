import { parse } from "bytes";
import { Command, Option } from "commander";
import Debug from "debug";
import { availableParallelism } from "node:os";
import { setTimeout as sleep } from "node:timers/promises";

import { planChunks } from "../chunk-planner.js";
import { parseSensor, Sensor } from "../conversion.js";
import {
  CancelledByUserError,
  InvalidConfigError,
  toError,
} from "../errors.js";
import { isTerminal, JobStatus } from "../job/state-machine.js";
import type { InitiateBody, StatusResponse } from "../server/wire.js";
import { Progress } from "../utils/progress.js";
import { waitForSignal } from "../utils/signal.js";
import { ApiError, HttpChunkTransport, UploadApi } from "./api.js";
import { calculateChecksum } from "./fs.js";
import { FileChunkSource } from "./sources.js";
import { TransferWorkerPool } from "./transfer-pool.js";

const debug = Debug("client");

export interface UploadClientOptions {
  maxWorkers?: number;
  maxRetries?: number;
  retryDelaySeconds?: number;
  chunkTimeoutMs?: number;
  pollIntervalMs?: number;
  progress?: Progress;
}

export interface UploadFileOptions {
  datasetName: string;
  userEmail: string;
  sensor: Sensor;
  chunkSize?: number;
  destination?: string;
  datasetId?: string;
  convert?: boolean;
  // Sends the SHA-256 of the file so that the server checks the assembly
  fileHash?: boolean;
  // Continues an earlier job instead of starting a new one
  resumeJobId?: string;
  // Stops handing out chunks and pauses the job on the server
  signal?: AbortSignal;
}

export interface UploadOutcome {
  jobId: string;
  status: JobStatus;
  uploaded: number[];
  errorMessage: string;
}

interface Attachment {
  jobId: string;
  chunkSize: number;
  committed: number[];
}

/**
 * Pushes local files to the upload server chunk by chunk.
 */
export class UploadClient {
  readonly api: UploadApi;

  private maxWorkers: number;
  private maxRetries: number;
  private retryDelaySeconds: number;
  private chunkTimeoutMs: number;
  private pollIntervalMs: number;
  private progress: Progress | undefined;

  constructor(
    api: UploadApi,
    {
      maxWorkers = 4,
      maxRetries = 3,
      retryDelaySeconds = 1,
      chunkTimeoutMs = 5 * 60 * 1000,
      pollIntervalMs = 500,
      progress,
    }: UploadClientOptions = {}
  ) {
    this.api = api;
    this.maxWorkers = maxWorkers;
    this.maxRetries = maxRetries;
    this.retryDelaySeconds = retryDelaySeconds;
    this.chunkTimeoutMs = chunkTimeoutMs;
    this.pollIntervalMs = pollIntervalMs;
    this.progress = progress;
  }

  async upload(path: string, options: UploadFileOptions): Promise<UploadOutcome> {
    const source = new FileChunkSource(path);
    const fileSize = await source.size();
    const limits = await this.api.limits();
    const body: InitiateBody = {
      source: { kind: "local", location: path },
      dataset_name: options.datasetName,
      user_email: options.userEmail,
      sensor: options.sensor,
      file_size: fileSize,
      destination: options.destination,
      dataset_id: options.datasetId,
      chunk_size: options.chunkSize,
      convert: options.convert,
      max_retries: this.maxRetries,
    };
    if (options.fileHash ?? true) {
      body.file_hash = await calculateChecksum(path, "sha256");
    }

    const { jobId, chunkSize, committed } =
      options.resumeJobId === undefined
        ? await this.initiate(body)
        : await this.reattach(options.resumeJobId, body);
    this.progress?.setTotal(fileSize);

    const status = await this.waitFor(
      jobId,
      (status) => status !== "QUEUED" && status !== "INITIALIZING"
    );
    if (status.status !== "UPLOADING") {
      return this.outcome(status, []);
    }

    const pool = new TransferWorkerPool(source, new HttpChunkTransport(this.api), {
      maxWorkers: this.maxWorkers,
      maxRetries: this.maxRetries,
      retryDelaySeconds: this.retryDelaySeconds,
      chunkTimeoutMs: this.chunkTimeoutMs,
      checksumAlgorithm: limits.checksum_algorithm,
    });
    pool.onChunk(({ length }) => this.progress?.complete(length));
    const { signal } = options;
    const onAbort = () => pool.cancel();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) {
      pool.cancel();
    }

    const manifest = planChunks(fileSize, chunkSize);
    for (const index of committed) {
      const chunk = manifest[index];
      if (chunk !== undefined) {
        this.progress?.complete(chunk.length);
      }
    }
    const result = await pool
      .upload(jobId, manifest, committed)
      .finally(() => signal?.removeEventListener("abort", onAbort));

    if (!result.ok) {
      if (result.error instanceof CancelledByUserError) {
        debug("pausing %s after %d chunks", jobId, result.uploaded.length);
        return this.outcome(await this.pause(jobId), result.uploaded);
      }
      const status = await this.api.status(jobId);
      if (!isTerminal(status.status)) {
        throw result.error;
      }
      return this.outcome(status, result.uploaded);
    }

    this.progress?.setStatus("PROCESSING");
    const final = await this.waitFor(jobId, isTerminal);
    this.progress?.setStatus(final.status);
    return this.outcome(final, result.uploaded);
  }

  private async initiate(body: InitiateBody): Promise<Attachment> {
    const { job_id: jobId, chunk_size: chunkSize } = await this.api.initiate(body);
    debug("created job %s", jobId);
    return { jobId, chunkSize, committed: [] };
  }

  private async reattach(jobId: string, body: InitiateBody): Promise<Attachment> {
    const info = await this.api.resumeInfo(jobId);
    const missing = new Set(info.missing_chunks);
    const committed = [...Array(info.total_chunks).keys()].filter(
      (index) => !missing.has(index)
    );

    let status: JobStatus | undefined;
    try {
      status = (await this.api.status(jobId)).status;
    } catch (error: unknown) {
      // The server no longer knows the job, but its chunks are still there
      if (!(error instanceof ApiError && error.code === "JobNotFound")) {
        throw error;
      }
    }
    debug("job %s is %s with %d chunks missing", jobId, status, missing.size);

    switch (status) {
      case "PAUSED":
        await this.api.resume(jobId);
        return { jobId, chunkSize: info.chunk_size, committed };
      case "UPLOADING":
        return { jobId, chunkSize: info.chunk_size, committed };
      case "FAILED":
      case undefined: {
        if (!info.can_resume) {
          break;
        }
        const next = await this.api.initiate({
          ...body,
          chunk_size: info.chunk_size,
          resume_token: jobId,
        });
        debug("job %s continues %s", next.job_id, jobId);
        return { jobId: next.job_id, chunkSize: next.chunk_size, committed };
      }
    }
    throw new InvalidConfigError(
      `Job ${jobId} is ${status ?? "unknown"} and cannot be resumed`
    );
  }

  private async pause(jobId: string): Promise<StatusResponse> {
    try {
      await this.api.pause(jobId);
    } catch (error: unknown) {
      // The last chunk may have arrived in the meantime
      if (!(error instanceof ApiError && error.code === "InvalidTransition")) {
        throw error;
      }
      debug("could not pause %s: %s", jobId, toError(error).message);
    }
    return this.api.status(jobId);
  }

  private async waitFor(
    jobId: string,
    predicate: (status: JobStatus) => boolean
  ): Promise<StatusResponse> {
    for (;;) {
      const status = await this.api.status(jobId);
      if (predicate(status.status) || isTerminal(status.status)) {
        return status;
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private outcome(status: StatusResponse, uploaded: number[]): UploadOutcome {
    return {
      jobId: status.job_id,
      status: status.status,
      uploaded,
      errorMessage: status.error_message,
    };
  }
}

export const makeUploadClientCommand = (): Command => {
  const command = new Command();
  command
    .name(`upload-client`)
    .description("Upload a file to the server")
    .showHelpAfterError()
    .requiredOption("--endpoint <value>", "Where the server is located")
    .requiredOption("--path <value>", "Path of the file to upload")
    .requiredOption("--dataset-name <value>", "Name of the dataset")
    .requiredOption("--user-email <value>", "Who owns the dataset")
    .requiredOption("--sensor <value>", "Which converter to run")
    .option("--chunk-size <size>", "Size of the chunks, such as 64MB")
    .option("--destination <path>", "Directory on the server")
    .option("--dataset-id <value>", "Identifier of the dataset")
    .option("--no-convert", "Do not run the converter")
    .option("--no-file-hash", "Do not have the server verify the file")
    .option("--resume <job>", "Continue an earlier upload job")
    .addOption(
      new Option(
        "--num-threads <number>",
        "Number of concurrent chunk uploads"
      ).default(availableParallelism())
    )
    .addOption(
      new Option("--max-retries <number>", "Attempts per chunk").default(3)
    )
    .action(async () => {
      const options = command.opts();
      const string = (name: string): string | undefined => {
        const value: unknown = options[name];
        return typeof value === "string" ? value : undefined;
      };
      const integer = (name: string): number => {
        const value = Number(options[name]);
        if (!Number.isSafeInteger(value) || value < 1) {
          throw new InvalidConfigError(`"${name}" needs to be a positive integer`);
        }
        return value;
      };

      const endpoint = string("endpoint");
      const path = string("path");
      const datasetName = string("datasetName");
      const userEmail = string("userEmail");
      const sensor = string("sensor");
      if (
        endpoint === undefined ||
        path === undefined ||
        datasetName === undefined ||
        userEmail === undefined ||
        sensor === undefined
      ) {
        throw new InvalidConfigError("Missing required options");
      }
      const chunkSizeOption = string("chunkSize");
      let chunkSize: number | undefined;
      if (chunkSizeOption !== undefined) {
        const parsed = parse(chunkSizeOption);
        if (parsed === null || !Number.isSafeInteger(parsed)) {
          throw new InvalidConfigError(`"chunkSize" is not a size`);
        }
        chunkSize = parsed;
      }

      const progress = new Progress();
      const client = new UploadClient(new UploadApi(endpoint), {
        maxWorkers: integer("numThreads"),
        maxRetries: integer("maxRetries"),
        progress,
      });
      const controller = new AbortController();
      waitForSignal(["SIGINT"]).then(
        () => controller.abort(),
        (error: unknown) => debug("error waiting for signal: %O", error)
      );

      try {
        const outcome = await client.upload(path, {
          datasetName,
          userEmail,
          sensor: parseSensor(sensor),
          chunkSize,
          destination: string("destination"),
          datasetId: string("datasetId"),
          convert: options["convert"] !== false,
          fileHash: options["fileHash"] !== false,
          resumeJobId: string("resume"),
          signal: controller.signal,
        });
        progress.terminate();
        debug("job %s ended as %s", outcome.jobId, outcome.status);
        if (outcome.status === "PAUSED") {
          debug("continue with --resume %s", outcome.jobId);
        } else if (outcome.status !== "COMPLETED") {
          debug("upload failed: %s", outcome.errorMessage);
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        progress.terminate();
        debug("error during upload %O", error);
        process.exitCode = 1;
      }
    });
  return command;
};
