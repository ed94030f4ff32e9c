import {
  countChunks,
  missingChunks,
  planChunks,
  toRange,
} from "../chunk-planner.js";
import { InvalidConfigError } from "../errors.js";
import { reduceRanges } from "../utils/range.js";

const megabyte = 1024 * 1024;

describe("chunk planner", () => {
  it("splits a file into chunks with a remainder", () => {
    expect(planChunks(25 * megabyte, 10 * megabyte)).toStrictEqual([
      { index: 0, offset: 0, length: 10 * megabyte },
      { index: 1, offset: 10 * megabyte, length: 10 * megabyte },
      { index: 2, offset: 20 * megabyte, length: 5 * megabyte },
    ]);
  });
  it("has no remainder for an exact multiple", () => {
    const chunks = planChunks(30, 10);
    expect(chunks.map(({ length }) => length)).toStrictEqual([10, 10, 10]);
    expect(countChunks(30, 10)).toBe(3);
  });
  it("gives an empty file one empty chunk", () => {
    expect(planChunks(0, 10)).toStrictEqual([{ index: 0, offset: 0, length: 0 }]);
    expect(toRange({ index: 0, offset: 0, length: 0 })).toBeNull();
  });
  it("is deterministic", () => {
    expect(planChunks(1234567, 4096)).toStrictEqual(planChunks(1234567, 4096));
  });
  it("tiles the whole file", () => {
    const fileSize = 1000003;
    const ranges = planChunks(fileSize, 65536).flatMap((chunk) => {
      const range = toRange(chunk);
      return range === null ? [] : [range];
    });
    expect(reduceRanges(ranges)).toStrictEqual([{ start: 0, end: fileSize - 1 }]);
  });
  it("rejects invalid sizes", () => {
    expect(() => planChunks(100, 0)).toThrow(InvalidConfigError);
    expect(() => planChunks(100, 1.5)).toThrow(InvalidConfigError);
    expect(() => planChunks(-1, 10)).toThrow(InvalidConfigError);
  });
  it("lists missing chunks", () => {
    const manifest = planChunks(100, 10);
    expect(missingChunks(manifest, [0, 2, 5])).toStrictEqual([
      1, 3, 4, 6, 7, 8, 9,
    ]);
    expect(missingChunks(manifest, manifest.map(({ index }) => index))).toStrictEqual(
      []
    );
  });
});
