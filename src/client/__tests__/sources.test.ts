import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { MockAgent } from "undici";

import { planChunks } from "../../chunk-planner.js";
import { InvalidConfigError } from "../../errors.js";
import { InvalidResponseError } from "../../utils/http-client.js";
import {
  BufferChunkSource,
  FileChunkSource,
  parseObjectLocation,
  sourceName,
  UrlChunkSource,
} from "../sources.js";

const pattern = (length: number): Buffer =>
  Buffer.from(Array.from({ length }, (_, index) => index % 251));

describe("file chunk source", () => {
  let temporaryDirectory: string;

  beforeEach(async () => {
    temporaryDirectory = await mkdtemp(join(tmpdir(), "sources-"));
  });
  afterEach(async () => {
    await rm(temporaryDirectory, { recursive: true, force: true });
  });

  it("reads chunks of a file", async () => {
    const path = join(temporaryDirectory, "scan.raw");
    const data = pattern(95);
    await writeFile(path, data);
    const source = new FileChunkSource(path);
    expect(source.name).toBe("scan.raw");
    expect(await source.size()).toBe(95);
    const [, second] = planChunks(95, 40);
    if (second === undefined) {
      throw new Error("Expected a second chunk");
    }
    expect(Buffer.from(await source.read(second))).toStrictEqual(
      data.subarray(40, 80)
    );
  });

  it("only reads files", async () => {
    await expect(new FileChunkSource(temporaryDirectory).size()).rejects.toThrow(
      InvalidConfigError
    );
  });
});

describe("buffer chunk source", () => {
  it("reads within its bounds", async () => {
    const source = new BufferChunkSource(pattern(10));
    expect(await source.size()).toBe(10);
    expect(Array.from(await source.read({ index: 1, offset: 5, length: 3 })))
      .toStrictEqual([5, 6, 7]);
    await expect(
      source.read({ index: 2, offset: 8, length: 5 })
    ).rejects.toThrow(RangeError);
  });
});

describe("url chunk source", () => {
  const origin = "http://data.test";
  const url = `${origin}/files/scan.raw`;
  const data = pattern(95);
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });
  afterEach(async () => {
    await agent.close();
  });

  it("reads its size from the headers", async () => {
    agent
      .get(origin)
      .intercept({ path: "/files/scan.raw", method: "HEAD" })
      .reply(200, "", { headers: { "content-length": "95" } });
    const source = new UrlChunkSource(url, agent);
    expect(source.name).toBe("scan.raw");
    expect(await source.size()).toBe(95);
  });

  it("reads chunks with range requests", async () => {
    agent
      .get(origin)
      .intercept({
        path: "/files/scan.raw",
        method: "GET",
        headers: { range: "bytes=10-19" },
      })
      .reply(206, data.subarray(10, 20));
    const source = new UrlChunkSource(url, agent);
    const read = await source.read({ index: 1, offset: 10, length: 10 });
    expect(Buffer.from(read)).toStrictEqual(data.subarray(10, 20));
  });

  it("needs range requests", async () => {
    agent
      .get(origin)
      .intercept({ path: "/files/scan.raw", method: "GET" })
      .reply(200, data);
    const source = new UrlChunkSource(url, agent);
    await expect(
      source.read({ index: 0, offset: 0, length: 10 })
    ).rejects.toThrow(
      new InvalidResponseError(`${url} does not support range requests`)
    );
  });

  it("tells retryable errors apart", async () => {
    const pool = agent.get(origin);
    pool.intercept({ path: "/files/scan.raw", method: "GET" }).reply(503, "");
    pool.intercept({ path: "/files/scan.raw", method: "GET" }).reply(404, "");
    const source = new UrlChunkSource(url, agent);
    const chunk = { index: 0, offset: 0, length: 10 };

    const unavailable = await source.read(chunk).catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(Error);
    expect(unavailable).not.toBeInstanceOf(InvalidResponseError);
    expect(unavailable).toHaveProperty(
      "message",
      `Received status code 503 from ${url}`
    );

    await expect(source.read(chunk)).rejects.toThrow(InvalidResponseError);
  });
});

describe("source locations", () => {
  it("parse object locations", () => {
    expect(parseObjectLocation("s3://bucket/path/to/scan%20a.raw")).toStrictEqual(
      { bucket: "bucket", key: "path/to/scan a.raw" }
    );
    expect(() => parseObjectLocation("https://bucket/key")).toThrow(
      InvalidConfigError
    );
    expect(() => parseObjectLocation("s3://bucket/")).toThrow(
      InvalidConfigError
    );
    expect(() => parseObjectLocation("not a location")).toThrow(
      InvalidConfigError
    );
  });

  it("give file names", () => {
    expect(sourceName({ kind: "local", location: "/data/scan.raw" })).toBe(
      "scan.raw"
    );
    expect(
      sourceName({ kind: "url", location: "https://data.test/a/scan.h5?v=2" })
    ).toBe("scan.h5");
    expect(sourceName({ kind: "cloud", location: "s3://bucket/run/scan.nc" })).toBe(
      "scan.nc"
    );
    expect(() =>
      sourceName({ kind: "url", location: "ftp://data.test/scan.raw" })
    ).toThrow(InvalidConfigError);
    expect(() => sourceName({ kind: "url", location: "https://data.test/" })).toThrow(
      InvalidConfigError
    );
  });
});
