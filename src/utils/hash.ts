import { createHash, getHashes } from "node:crypto";

export const defaultChecksumAlgorithm = "md5";

export const isSupportedAlgorithm = (algorithm: string): boolean =>
  getHashes().includes(algorithm);

export const checksum = (
  data: Uint8Array,
  algorithm: string = defaultChecksumAlgorithm
): string => createHash(algorithm).update(data).digest("hex");
