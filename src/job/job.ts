import type { Sensor } from "../conversion.js";

export const sourceKinds = ["local", "cloud", "url"] as const;
export type SourceKind = (typeof sourceKinds)[number];

/**
 * Where the bytes of a dataset come from. A `local` file lives on the client,
 * which pushes its chunks. `url` and `cloud` sources are pulled by the server.
 */
export interface SourceDescriptor {
  kind: SourceKind;
  location: string;
}

export const isPulled = ({ kind }: SourceDescriptor): boolean =>
  kind !== "local";

export interface UploadJobRequest {
  source: SourceDescriptor;
  datasetName: string;
  userEmail: string;
  sensor: Sensor;
  // Bytes; optional for pulled sources
  fileSize?: number;
  // Hex SHA-256 of the whole file
  fileHash?: string;
  destination?: string;
  datasetId?: string;
  chunkSize?: number;
  maxRetries?: number;
  retryDelaySeconds?: number;
  timeoutMinutes?: number;
  autoConvert?: boolean;
  verifyChecksum?: boolean;
  isPublic?: boolean;
  folder?: string;
  teamUuid?: string;
  resumeToken?: string;
}

export interface UploadJobConfig {
  readonly jobId: string;
  readonly source: SourceDescriptor;
  readonly datasetId: string;
  readonly datasetName: string;
  readonly userEmail: string;
  readonly sensor: Sensor;
  readonly destination: string;
  readonly fileName: string;
  readonly fileHash: string | undefined;
  readonly chunkSize: number;
  readonly maxRetries: number;
  readonly retryDelaySeconds: number;
  readonly timeoutMinutes: number;
  readonly autoConvert: boolean;
  readonly verifyChecksum: boolean;
  readonly isPublic: boolean;
  readonly folder: string | undefined;
  readonly teamUuid: string | undefined;
  readonly resumeToken: string | undefined;
  readonly createdAt: Date;
}

export const jobDefaults = {
  maxRetries: 3,
  retryDelaySeconds: 30,
  timeoutMinutes: 120,
  autoConvert: true,
  verifyChecksum: true,
  isPublic: false,
};

// Longest delay a Node.js timer takes
export const maxTimeoutMinutes = Math.floor((2 ** 31 - 1) / 60000);

// Dataset ids name a directory of converted files
export const datasetIdPattern = /^(?!\.{1,2}$)[^/\\]+$/;
