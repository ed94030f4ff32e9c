import { createHash } from "node:crypto";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { planChunks } from "../chunk-planner.js";
import { IntegrityError } from "../errors.js";
import { chunkFileName, StagingStore } from "../staging.js";

const pattern = (length: number): Buffer =>
  Buffer.from(Array.from({ length }, (_, index) => index % 251));

describe("staging store", () => {
  let temporaryDirectory: string;
  let staging: StagingStore;

  beforeEach(async () => {
    temporaryDirectory = await mkdtemp(join(tmpdir(), "staging-"));
    staging = new StagingStore(join(temporaryDirectory, "staging"));
  });
  afterEach(async () => {
    await rm(temporaryDirectory, { recursive: true, force: true });
  });

  const stage = async (jobId: string, data: Buffer, chunkSize: number) => {
    for (const { index, offset, length } of planChunks(data.length, chunkSize)) {
      const path = await staging.writeTemp(
        jobId,
        index,
        data.subarray(offset, offset + length)
      );
      await staging.promote(path, jobId, index);
    }
  };

  it("names chunk files by index", () => {
    expect(chunkFileName(7)).toBe("chunk_000007");
    expect(staging.chunkPath("job", 12)).toBe(
      join(temporaryDirectory, "staging", "job", "chunk_000012")
    );
  });

  it("only keeps promoted chunks", async () => {
    const kept = await staging.writeTemp("job", 0, pattern(10));
    const dropped = await staging.writeTemp("job", 1, pattern(10));
    await staging.promote(kept, "job", 0);
    await staging.discard(dropped);
    expect(await staging.hasChunk("job", 0)).toBe(true);
    expect(await staging.hasChunk("job", 1)).toBe(false);
    expect(await readdir(staging.directory("job"))).toStrictEqual([
      "chunk_000000",
    ]);
  });

  it("assembles chunks into the destination", async () => {
    const data = pattern(2500);
    await stage("job", data, 1000);
    const destination = join(temporaryDirectory, "uploads", "scan.raw");
    const fileHash = createHash("sha256").update(data).digest("hex");
    await staging.assemble("job", planChunks(2500, 1000), destination, {
      fileHash,
    });
    expect((await readFile(destination)).equals(data)).toBe(true);
  });

  it("refuses to assemble with a missing chunk", async () => {
    const data = pattern(2500);
    await stage("job", data, 1000);
    await rm(staging.chunkPath("job", 1));
    await expect(
      staging.assemble(
        "job",
        planChunks(2500, 1000),
        join(temporaryDirectory, "scan.raw")
      )
    ).rejects.toThrow(new IntegrityError("Chunk 1 of job is missing"));
  });

  it("refuses to assemble a chunk of the wrong size", async () => {
    await stage("job", pattern(2500), 1000);
    await expect(
      staging.assemble(
        "job",
        planChunks(2400, 1000),
        join(temporaryDirectory, "scan.raw")
      )
    ).rejects.toThrow(
      new IntegrityError("Chunk 2 of job has 500 bytes, expected 400")
    );
  });

  it("checks the hash of the assembled file", async () => {
    await stage("job", pattern(100), 30);
    await expect(
      staging.assemble(
        "job",
        planChunks(100, 30),
        join(temporaryDirectory, "scan.raw"),
        { fileHash: "0".repeat(64) }
      )
    ).rejects.toThrow(IntegrityError);
  });

  it("hands staged chunks to another job", async () => {
    await stage("old", pattern(30), 10);
    await staging.adopt("old", "new");
    expect(await staging.hasChunk("old", 0)).toBe(false);
    expect(await staging.hasChunk("new", 2)).toBe(true);
    // Nothing staged, nothing to move
    await staging.adopt("none", "other");
    expect(await staging.hasChunk("other", 0)).toBe(false);
  });

  it("can be purged", async () => {
    await stage("job", pattern(30), 10);
    await staging.purge("job");
    expect(await staging.hasChunk("job", 0)).toBe(false);
    await staging.purge("job");
  });
});
