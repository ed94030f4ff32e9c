import Joi from "joi";

import {
  datasetIdPattern,
  maxTimeoutMinutes,
  sourceKinds,
  SourceKind,
  UploadJobRequest,
} from "../job/job.js";
import type { UploadProgress } from "../job/progress.js";
import { jobStatuses, JobStatus } from "../job/state-machine.js";
import { parseSensor } from "../conversion.js";
import type {
  CommitResult,
  InitiateResult,
  ResumeInfo,
  UploadLimits,
} from "../upload-service.js";

// JSON bodies of the HTTP API use snake_case keys

const megabyte = 1024 * 1024;

export const checksumHeader = "x-chunk-checksum";

export interface InitiateBody {
  source: { kind: SourceKind; location: string };
  dataset_name: string;
  user_email: string;
  sensor: string;
  file_size?: number;
  file_hash?: string;
  destination?: string;
  dataset_id?: string;
  // Either in bytes or in megabytes
  chunk_size?: number;
  chunk_size_mb?: number;
  convert?: boolean;
  verify_checksum?: boolean;
  is_public?: boolean;
  folder?: string;
  team_uuid?: string;
  max_retries?: number;
  retry_delay_seconds?: number;
  timeout_minutes?: number;
  resume_token?: string;
}

export const initiateBodySchema = Joi.object<InitiateBody>({
  source: Joi.object({
    kind: Joi.string()
      .valid(...sourceKinds)
      .required(),
    location: Joi.string().required(),
  }).required(),
  dataset_name: Joi.string().trim().min(1).required(),
  user_email: Joi.string().email().required(),
  sensor: Joi.string().required(),
  file_size: Joi.number().integer().min(0),
  file_hash: Joi.string().hex().length(64),
  destination: Joi.string().min(1),
  dataset_id: Joi.string().pattern(datasetIdPattern),
  chunk_size: Joi.number().integer().min(1),
  chunk_size_mb: Joi.number().positive(),
  convert: Joi.boolean(),
  verify_checksum: Joi.boolean(),
  is_public: Joi.boolean(),
  folder: Joi.string(),
  team_uuid: Joi.string(),
  max_retries: Joi.number().integer().min(1),
  retry_delay_seconds: Joi.number().min(0),
  timeout_minutes: Joi.number().positive().max(maxTimeoutMinutes),
  resume_token: Joi.string().min(1),
}).oxor("chunk_size", "chunk_size_mb");

export const toUploadJobRequest = (body: InitiateBody): UploadJobRequest => {
  const chunkSize =
    body.chunk_size_mb === undefined
      ? body.chunk_size
      : Math.round(body.chunk_size_mb * megabyte);
  return {
    source: { kind: body.source.kind, location: body.source.location },
    datasetName: body.dataset_name,
    userEmail: body.user_email,
    sensor: parseSensor(body.sensor),
    fileSize: body.file_size,
    fileHash: body.file_hash,
    destination: body.destination,
    datasetId: body.dataset_id,
    chunkSize,
    maxRetries: body.max_retries,
    retryDelaySeconds: body.retry_delay_seconds,
    timeoutMinutes: body.timeout_minutes,
    autoConvert: body.convert,
    verifyChecksum: body.verify_checksum,
    isPublic: body.is_public,
    folder: body.folder,
    teamUuid: body.team_uuid,
    resumeToken: body.resume_token,
  };
};

export interface InitiateResponse {
  job_id: string;
  status: JobStatus;
  chunk_size: number;
  total_chunks: number | null;
}

export const toInitiateResponse = ({
  jobId,
  status,
  chunkSize,
  totalChunks,
}: InitiateResult): InitiateResponse => ({
  job_id: jobId,
  status,
  chunk_size: chunkSize,
  total_chunks: totalChunks,
});

export interface CommitResponse {
  committed: boolean;
  duplicate: boolean;
  checksum: string;
}

export const toCommitResponse = ({
  committed,
  duplicate,
  checksum,
}: CommitResult): CommitResponse => ({ committed, duplicate, checksum });

export interface ResumeResponse {
  upload_id: string;
  missing_chunks: number[];
  total_chunks: number;
  chunk_size: number;
  can_resume: boolean;
}

export const toResumeResponse = ({
  uploadId,
  missingChunks,
  totalChunks,
  chunkSize,
  canResume,
}: ResumeInfo): ResumeResponse => ({
  upload_id: uploadId,
  missing_chunks: missingChunks,
  total_chunks: totalChunks,
  chunk_size: chunkSize,
  can_resume: canResume,
});

export interface StatusResponse {
  job_id: string;
  status: JobStatus;
  progress_percentage: number;
  bytes_uploaded: number;
  bytes_total: number;
  speed_mbps: number;
  eta_seconds: number;
  current_file: string;
  error_message: string;
  last_updated: string;
}

export const toStatusResponse = (progress: UploadProgress): StatusResponse => ({
  job_id: progress.jobId,
  status: progress.status,
  progress_percentage: progress.progressPercentage,
  bytes_uploaded: progress.bytesUploaded,
  bytes_total: progress.bytesTotal,
  speed_mbps: progress.speedMbps,
  eta_seconds: progress.etaSeconds,
  current_file: progress.currentFile,
  error_message: progress.errorMessage,
  last_updated: progress.lastUpdated.toISOString(),
});

export interface StateResponse {
  job_id: string;
  status: JobStatus;
}

export interface LimitsResponse {
  default_chunk_size: number;
  min_chunk_size: number;
  max_chunk_size: number;
  max_file_size: number;
  checksum_algorithm: string;
}

export const toLimitsResponse = (limits: UploadLimits): LimitsResponse => ({
  default_chunk_size: limits.defaultChunkSize,
  min_chunk_size: limits.minChunkSize,
  max_chunk_size: limits.maxChunkSize,
  max_file_size: limits.maxFileSize,
  checksum_algorithm: limits.checksumAlgorithm,
});

export interface ErrorResponse {
  error: string;
  message: string;
}

// Response schemas, checked by the client
const status = Joi.string()
  .valid(...jobStatuses)
  .required();

export const initiateResponseSchema = Joi.object<InitiateResponse>({
  job_id: Joi.string().required(),
  status,
  chunk_size: Joi.number().integer().min(1).required(),
  total_chunks: Joi.number().integer().min(0).allow(null).required(),
});

export const commitResponseSchema = Joi.object<CommitResponse>({
  committed: Joi.boolean().required(),
  duplicate: Joi.boolean().required(),
  checksum: Joi.string().required(),
});

export const resumeResponseSchema = Joi.object<ResumeResponse>({
  upload_id: Joi.string().required(),
  missing_chunks: Joi.array().items(Joi.number().integer().min(0)).required(),
  total_chunks: Joi.number().integer().min(0).required(),
  chunk_size: Joi.number().integer().min(1).required(),
  can_resume: Joi.boolean().required(),
});

export const statusResponseSchema = Joi.object<StatusResponse>({
  job_id: Joi.string().required(),
  status,
  progress_percentage: Joi.number().required(),
  bytes_uploaded: Joi.number().required(),
  bytes_total: Joi.number().required(),
  speed_mbps: Joi.number().required(),
  eta_seconds: Joi.number().required(),
  current_file: Joi.string().allow("").required(),
  error_message: Joi.string().allow("").required(),
  last_updated: Joi.string().isoDate().required(),
});

export const stateResponseSchema = Joi.object<StateResponse>({
  job_id: Joi.string().required(),
  status,
});

export const limitsResponseSchema = Joi.object<LimitsResponse>({
  default_chunk_size: Joi.number().integer().min(1).required(),
  min_chunk_size: Joi.number().integer().min(1).required(),
  max_chunk_size: Joi.number().integer().min(1).required(),
  max_file_size: Joi.number().integer().min(0).required(),
  checksum_algorithm: Joi.string().required(),
});

export const errorResponseSchema = Joi.object<ErrorResponse>({
  error: Joi.string().required(),
  message: Joi.string().allow("").required(),
}).unknown();
