import { stat } from "node:fs/promises";
import { basename } from "node:path";

import {
  GetObjectCommand,
  HeadObjectCommand,
  S3Client,
  S3ClientConfig,
} from "@aws-sdk/client-s3";
import Debug from "debug";
import { Dispatcher, request } from "undici";

import type { ChunkDescriptor } from "../chunk-planner.js";
import { InvalidConfigError } from "../errors.js";
import type { SourceDescriptor } from "../job/job.js";
import { InvalidResponseError, isRetryableStatus } from "../utils/http-client.js";
import { readRange } from "./fs.js";

const debug = Debug("client");

/**
 * Random access to the bytes of a dataset.
 */
export interface ChunkSource {
  readonly name: string;
  size(): Promise<number>;
  read(chunk: ChunkDescriptor, signal?: AbortSignal): Promise<Uint8Array>;
}

export class FileChunkSource implements ChunkSource {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  get name(): string {
    return basename(this.path);
  }

  async size(): Promise<number> {
    const stats = await stat(this.path);
    if (!stats.isFile()) {
      throw new InvalidConfigError(`${this.path} is not a file`);
    }
    return stats.size;
  }

  async read({ offset, length }: ChunkDescriptor): Promise<Uint8Array> {
    return readRange(this.path, offset, length);
  }
}

export class BufferChunkSource implements ChunkSource {
  readonly name: string;
  private data: Uint8Array;

  constructor(data: Uint8Array, name: string = "buffer") {
    this.data = data;
    this.name = name;
  }

  async size(): Promise<number> {
    return this.data.byteLength;
  }

  async read({ offset, length }: ChunkDescriptor): Promise<Uint8Array> {
    if (offset + length > this.data.byteLength) {
      throw new RangeError(
        `Cannot read ${length} bytes at ${offset} from ${this.data.byteLength}`
      );
    }
    return this.data.subarray(offset, offset + length);
  }
}

const checkStatusCode = (statusCode: number, url: string): void => {
  if (statusCode >= 200 && statusCode < 300) {
    return;
  }
  const message = `Received status code ${statusCode} from ${url}`;
  if (isRetryableStatus(statusCode)) {
    throw new Error(message);
  }
  throw new InvalidResponseError(message);
};

const headerValue = (
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined => {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
};

/**
 * Reads a dataset from an HTTP(S) server that supports range requests.
 */
export class UrlChunkSource implements ChunkSource {
  readonly url: string;
  private dispatcher: Dispatcher | undefined;
  private contentLength: number | undefined;

  constructor(url: string, dispatcher?: Dispatcher) {
    this.url = url;
    this.dispatcher = dispatcher;
  }

  get name(): string {
    return basename(new URL(this.url).pathname) || "download";
  }

  async size(): Promise<number> {
    if (this.contentLength !== undefined) {
      return this.contentLength;
    }
    const { statusCode, headers, body } = await request(this.url, {
      method: "HEAD",
      dispatcher: this.dispatcher,
    });
    await body.dump();
    checkStatusCode(statusCode, this.url);
    const contentLength = Number(headerValue(headers, "content-length"));
    if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
      throw new InvalidConfigError(`${this.url} did not report its size`);
    }
    debug("%s has %d bytes", this.url, contentLength);
    this.contentLength = contentLength;
    return contentLength;
  }

  async read(
    { offset, length }: ChunkDescriptor,
    signal?: AbortSignal
  ): Promise<Uint8Array> {
    if (length === 0) {
      return new Uint8Array(0);
    }
    const { statusCode, body } = await request(this.url, {
      method: "GET",
      headers: { range: `bytes=${offset}-${offset + length - 1}` },
      dispatcher: this.dispatcher,
      signal,
    });
    if (statusCode !== 206) {
      await body.dump();
      checkStatusCode(statusCode, this.url);
      throw new InvalidResponseError(
        `${this.url} does not support range requests`
      );
    }
    const data = new Uint8Array(await body.arrayBuffer());
    if (data.byteLength !== length) {
      throw new Error(
        `Received ${data.byteLength} bytes from ${this.url}, expected ${length}`
      );
    }
    return data;
  }
}

// Locations look like s3://bucket/path/to/key
export const parseObjectLocation = (
  location: string
): { bucket: string; key: string } => {
  let url: URL;
  try {
    url = new URL(location);
  } catch {
    throw new InvalidConfigError(`Invalid object location "${location}"`);
  }
  const bucket = url.hostname;
  const key = decodeURIComponent(url.pathname.replace(/^\//, ""));
  if (url.protocol !== "s3:" || bucket === "" || key === "") {
    throw new InvalidConfigError(
      `Object location "${location}" needs to look like s3://bucket/key`
    );
  }
  return { bucket, key };
};

/**
 * Reads a dataset from an S3-compatible object store with ranged GetObject
 * requests.
 */
export class ObjectChunkSource implements ChunkSource {
  readonly bucket: string;
  readonly key: string;
  private s3: S3Client;

  constructor(s3: S3Client, bucket: string, key: string) {
    this.s3 = s3;
    this.bucket = bucket;
    this.key = key;
  }

  get name(): string {
    return basename(this.key);
  }

  async size(): Promise<number> {
    const { ContentLength } = await this.s3.send(
      new HeadObjectCommand({ Bucket: this.bucket, Key: this.key })
    );
    if (ContentLength === undefined) {
      throw new InvalidConfigError(
        `s3://${this.bucket}/${this.key} did not report its size`
      );
    }
    return ContentLength;
  }

  async read({ offset, length }: ChunkDescriptor): Promise<Uint8Array> {
    if (length === 0) {
      return new Uint8Array(0);
    }
    const { Body } = await this.s3.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.key,
        Range: `bytes=${offset}-${offset + length - 1}`,
      })
    );
    if (Body === undefined) {
      throw new Error(`Empty response for s3://${this.bucket}/${this.key}`);
    }
    const data = await Body.transformToByteArray();
    if (data.byteLength !== length) {
      throw new Error(
        `Received ${data.byteLength} bytes from s3://${this.bucket}/${this.key}, expected ${length}`
      );
    }
    return data;
  }
}

/**
 * File name of a source, checking that its location can be read at all.
 */
export const sourceName = (source: SourceDescriptor): string => {
  const name = locationName(source);
  if (name === "") {
    throw new InvalidConfigError(`No file name in "${source.location}"`);
  }
  return name;
};

const locationName = ({ kind, location }: SourceDescriptor): string => {
  switch (kind) {
    case "local":
      return basename(location);
    case "url": {
      let url: URL;
      try {
        url = new URL(location);
      } catch {
        throw new InvalidConfigError(`Invalid URL "${location}"`);
      }
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        throw new InvalidConfigError(`Unsupported protocol in "${location}"`);
      }
      return basename(url.pathname);
    }
    case "cloud":
      return basename(parseObjectLocation(location).key);
  }
};

export type SourceFactory = (source: SourceDescriptor) => ChunkSource;

export interface SourceFactoryOptions {
  s3?: S3ClientConfig;
  dispatcher?: Dispatcher;
}

export const makeSourceFactory = ({
  s3: s3Config = {},
  dispatcher,
}: SourceFactoryOptions = {}): SourceFactory => {
  let s3: S3Client | undefined;
  return ({ kind, location }: SourceDescriptor): ChunkSource => {
    switch (kind) {
      case "local":
        return new FileChunkSource(location);
      case "url":
        return new UrlChunkSource(location, dispatcher);
      case "cloud": {
        const { bucket, key } = parseObjectLocation(location);
        s3 ??= new S3Client(s3Config);
        return new ObjectChunkSource(s3, bucket, key);
      }
    }
  };
};
