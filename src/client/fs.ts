import { createHash } from "node:crypto";
import {
  CreateReadStreamOptions,
  FileHandle,
  mkdir,
  open,
} from "node:fs/promises";
import { dirname } from "node:path";
import { pipeline } from "node:stream/promises";

import { Range } from "../utils/range.js";

export const calculateChecksum = async (
  path: string,
  algorithm: string,
  range?: Range
): Promise<string> => {
  const options: CreateReadStreamOptions = {};
  if (range) {
    options.start = range.start;
    options.end = range.end;
  }

  const hash = createHash(algorithm);

  let fileHandle: FileHandle | undefined;
  try {
    fileHandle = await open(path);
    const readStream = fileHandle.createReadStream(options);
    await pipeline(readStream, hash);
  } finally {
    await fileHandle?.close();
  }

  return hash.digest("hex");
};

export const readRange = async (
  path: string,
  offset: number,
  length: number
): Promise<Buffer> => {
  const buffer = Buffer.alloc(length);
  let fileHandle: FileHandle | undefined;
  try {
    fileHandle = await open(path, "r");
    let position = 0;
    while (position < length) {
      const { bytesRead } = await fileHandle.read(
        buffer,
        position,
        length - position,
        offset + position
      );
      if (bytesRead === 0) {
        throw new Error(
          `Unexpected end of ${path} at ${offset + position}, wanted ${length} bytes from ${offset}`
        );
      }
      position += bytesRead;
    }
  } finally {
    await fileHandle?.close();
  }
  return buffer;
};

export const touch = async (path: string): Promise<void> => {
  // Create directory if it does not exist
  await mkdir(dirname(path), { recursive: true });

  // Create empty file if it does not exist
  let fileHandle;
  try {
    fileHandle = await open(path, "a");
  } finally {
    await fileHandle?.close();
  }
};
