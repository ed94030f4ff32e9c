import Debug from "debug";
import Joi from "joi";
import { Dispatcher, request } from "undici";

import type { ChunkDescriptor } from "../chunk-planner.js";
import { IntegrityError } from "../errors.js";
import {
  checksumHeader,
  CommitResponse,
  commitResponseSchema,
  errorResponseSchema,
  InitiateBody,
  InitiateResponse,
  initiateResponseSchema,
  LimitsResponse,
  limitsResponseSchema,
  ResumeResponse,
  resumeResponseSchema,
  StateResponse,
  stateResponseSchema,
  StatusResponse,
  statusResponseSchema,
} from "../server/wire.js";
import { Http, InvalidResponseError, isRetryableStatus } from "../utils/http-client.js";
import type { ChunkAck, ChunkTransport } from "./transfer-pool.js";

const debug = Debug("client");

export const endpointSchema = Joi.string().uri({ scheme: ["http", "https"] });

/**
 * The server answered with an error that sending the same request again
 * will not fix.
 */
export class ApiError extends InvalidResponseError {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(`${code} (${statusCode}): ${message}`);
    this.statusCode = statusCode;
    this.code = code;
  }
}

interface CallOptions {
  body?: string | Uint8Array;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Client for the HTTP API of the upload server.
 */
export class UploadApi {
  readonly endpoint: string;
  private dispatcher: Dispatcher | undefined;

  constructor(endpoint: string, dispatcher?: Dispatcher) {
    this.endpoint = Joi.attempt(endpoint, endpointSchema).replace(/\/+$/, "");
    this.dispatcher = dispatcher;
  }

  initiate(body: InitiateBody): Promise<InitiateResponse> {
    return this.call("POST", "/upload/initiate", initiateResponseSchema, {
      body: JSON.stringify(body),
      headers: { "content-type": "application/json" },
    });
  }

  status(jobId: string): Promise<StatusResponse> {
    return this.call("GET", `/upload/status/${jobId}`, statusResponseSchema);
  }

  resumeInfo(jobId: string): Promise<ResumeResponse> {
    return this.call("GET", `/upload/resume/${jobId}`, resumeResponseSchema);
  }

  cancel(jobId: string): Promise<StateResponse> {
    return this.call("POST", `/upload/cancel/${jobId}`, stateResponseSchema);
  }

  pause(jobId: string): Promise<StateResponse> {
    return this.call("POST", `/upload/pause/${jobId}`, stateResponseSchema);
  }

  resume(jobId: string): Promise<StateResponse> {
    return this.call("POST", `/upload/resume/${jobId}`, stateResponseSchema);
  }

  limits(): Promise<LimitsResponse> {
    return this.call("GET", "/upload/limits", limitsResponseSchema);
  }

  putChunk(
    jobId: string,
    index: number,
    data: Uint8Array,
    checksum: string,
    signal?: AbortSignal
  ): Promise<CommitResponse> {
    return this.call(
      "PUT",
      `/upload/chunk/${jobId}/${index}`,
      commitResponseSchema,
      {
        body: data,
        headers: {
          "content-type": "application/octet-stream",
          [checksumHeader]: checksum,
        },
        signal,
      }
    );
  }

  private async call<T>(
    method: Dispatcher.HttpMethod,
    path: string,
    schema: Joi.ObjectSchema<T>,
    { body, headers, signal }: CallOptions = {}
  ): Promise<T> {
    const url = `${this.endpoint}${path}`;
    const response = await request(url, {
      method,
      body,
      headers,
      signal,
      dispatcher: this.dispatcher,
    });
    const { statusCode } = response;
    const data: unknown = await response.body.json().catch(() => undefined);
    if (statusCode >= 200 && statusCode < 300) {
      const { error, value } = schema.required().validate(data);
      if (error !== undefined) {
        throw new InvalidResponseError(
          `Invalid response from ${method} ${path}: ${error.message}`
        );
      }
      return value;
    }

    const { error: invalid, value } = errorResponseSchema.required().validate(data);
    const code = invalid === undefined ? value.error : "Unknown";
    const message =
      invalid === undefined ? value.message : `Received status code ${statusCode}`;
    debug("%s %s failed with %d: %s", method, path, statusCode, message);
    // A garbled chunk or a busy server is worth another attempt
    if (
      isRetryableStatus(statusCode) ||
      statusCode === Http.UnprocessableEntity
    ) {
      throw new Error(`${code} (${statusCode}): ${message}`);
    }
    if (code === "IntegrityError") {
      throw new IntegrityError(message);
    }
    throw new ApiError(statusCode, code, message);
  }
}

/**
 * Sends chunks to the server with one PUT request each.
 */
export class HttpChunkTransport implements ChunkTransport {
  private api: UploadApi;

  constructor(api: UploadApi) {
    this.api = api;
  }

  async send(
    jobId: string,
    chunk: ChunkDescriptor,
    data: Uint8Array,
    checksum: string,
    signal: AbortSignal
  ): Promise<ChunkAck> {
    const response = await this.api.putChunk(
      jobId,
      chunk.index,
      data,
      checksum,
      signal
    );
    return { checksum: response.checksum, duplicate: response.duplicate };
  }
}
