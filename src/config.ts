import { parse } from "bytes";
import dotenv from "dotenv";
import Joi, { CustomHelpers } from "joi";
import ms from "ms";

import { databaseTypes, DatabaseType } from "./entity/data-source.js";
import { InvalidConfigError } from "./errors.js";

dotenv.config();

export interface Config {
  port: number;
  dataDirectory: string;
  databaseType: DatabaseType;
  connectionString: string | undefined;
  maxConcurrentJobs: number;
  maxWorkers: number;
  defaultChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
  maxFileSize: number;
  chunkTimeoutMs: number;
  retentionMs: number;
  sweepIntervalMs: number;
  convertersFile: string;
  checksumAlgorithm: string;
  s3: {
    endpoint: string | undefined;
    region: string | undefined;
    accessKeyId: string | undefined;
    secretAccessKey: string | undefined;
  };
}

const megabyte = 1024 * 1024;
const minute = 60 * 1000;

// Sizes such as "64MB"
const byteSize = Joi.string().custom(
  (value: string, helpers: CustomHelpers): number | Joi.ErrorReport => {
    const size = parse(value);
    if (size === null || !Number.isSafeInteger(size) || size <= 0) {
      return helpers.error("any.invalid");
    }
    return size;
  },
  "byte size"
);
// Durations such as "1h"
const duration = Joi.string().custom(
  (value: string, helpers: CustomHelpers): number | Joi.ErrorReport => {
    const milliseconds = ms(value);
    if (!Number.isFinite(milliseconds) || milliseconds <= 0) {
      return helpers.error("any.invalid");
    }
    return milliseconds;
  },
  "duration"
);

interface Environment {
  PORT: number;
  DATA_DIRECTORY: string;
  DATABASE_TYPE: DatabaseType;
  CONNECTION_STRING?: string;
  MAX_CONCURRENT_JOBS: number;
  MAX_WORKERS: number;
  DEFAULT_CHUNK_SIZE: number;
  MIN_CHUNK_SIZE: number;
  MAX_CHUNK_SIZE: number;
  MAX_FILE_SIZE: number;
  CHUNK_TIMEOUT: number;
  JOB_RETENTION: number;
  SWEEP_INTERVAL: number;
  CONVERTERS_FILE: string;
  CHECKSUM_ALGORITHM: string;
  S3_ENDPOINT?: string;
  S3_REGION?: string;
  ACCESS_KEY_ID?: string;
  SECRET_ACCESS_KEY?: string;
}

const environmentSchema = Joi.object<Environment>({
  PORT: Joi.number().port().default(8080),
  DATA_DIRECTORY: Joi.string().default("data"),
  DATABASE_TYPE: Joi.string()
    .valid(...databaseTypes)
    .default("sqlite"),
  CONNECTION_STRING: Joi.string(),
  MAX_CONCURRENT_JOBS: Joi.number().integer().min(1).default(2),
  MAX_WORKERS: Joi.number().integer().min(1).default(4),
  DEFAULT_CHUNK_SIZE: byteSize.default(64 * megabyte),
  MIN_CHUNK_SIZE: byteSize.default(megabyte),
  MAX_CHUNK_SIZE: byteSize.default(1024 * megabyte),
  MAX_FILE_SIZE: byteSize.default(10 * 1024 * 1024 * megabyte),
  CHUNK_TIMEOUT: duration.default(5 * minute),
  JOB_RETENTION: duration.default(60 * minute),
  SWEEP_INTERVAL: duration.default(minute),
  CONVERTERS_FILE: Joi.string().default("config/converters.json"),
  CHECKSUM_ALGORITHM: Joi.string().default("md5"),
  S3_ENDPOINT: Joi.string().uri(),
  S3_REGION: Joi.string(),
  ACCESS_KEY_ID: Joi.string(),
  SECRET_ACCESS_KEY: Joi.string(),
}).unknown();

/**
 * Reads the configuration from the environment, after loading `.env`.
 */
export const getConfig = (
  env: Record<string, string | undefined> = process.env
): Config => {
  const { error, value } = environmentSchema.validate(env, {
    abortEarly: false,
  });
  if (error !== undefined) {
    throw new InvalidConfigError(`Invalid environment: ${error.message}`);
  }
  return {
    port: value.PORT,
    dataDirectory: value.DATA_DIRECTORY,
    databaseType: value.DATABASE_TYPE,
    connectionString: value.CONNECTION_STRING,
    maxConcurrentJobs: value.MAX_CONCURRENT_JOBS,
    maxWorkers: value.MAX_WORKERS,
    defaultChunkSize: value.DEFAULT_CHUNK_SIZE,
    minChunkSize: value.MIN_CHUNK_SIZE,
    maxChunkSize: value.MAX_CHUNK_SIZE,
    maxFileSize: value.MAX_FILE_SIZE,
    chunkTimeoutMs: value.CHUNK_TIMEOUT,
    retentionMs: value.JOB_RETENTION,
    sweepIntervalMs: value.SWEEP_INTERVAL,
    convertersFile: value.CONVERTERS_FILE,
    checksumAlgorithm: value.CHECKSUM_ALGORITHM,
    s3: {
      endpoint: value.S3_ENDPOINT,
      region: value.S3_REGION,
      accessKeyId: value.ACCESS_KEY_ID,
      secretAccessKey: value.SECRET_ACCESS_KEY,
    },
  };
};
