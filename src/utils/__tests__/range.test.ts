import type { Range } from "../range.js";
import { overlaps, reduceRanges, size, touches } from "../range.js";

describe("range", () => {
  it("can be reduced", () => {
    const ranges: Range[] = [
      { start: 11, end: 20 },
      { start: 0, end: 10 },
    ];
    const reduced = reduceRanges(ranges);
    expect(reduced).toStrictEqual([{ start: 0, end: 20 }]);
    expect(size({ start: 0, end: 20 })).toBe(21);
  });
  it("keeps gaps between ranges", () => {
    const reduced = reduceRanges([
      { start: 30, end: 39 },
      { start: 0, end: 9 },
      { start: 10, end: 19 },
    ]);
    expect(reduced).toStrictEqual([
      { start: 0, end: 19 },
      { start: 30, end: 39 },
    ]);
  });
  it("does not modify its input", () => {
    const ranges: Range[] = [
      { start: 0, end: 9 },
      { start: 10, end: 19 },
    ];
    reduceRanges(ranges);
    expect(ranges[0]).toStrictEqual({ start: 0, end: 9 });
  });
  it("can detect overlapping and touching ranges", () => {
    const a = { start: 0, end: 10 };
    const b = { start: 5, end: 15 };
    expect(overlaps(a, b)).toBe(true);
    expect(touches(a, { start: 11, end: 12 })).toBe(true);

    const c = { start: 0, end: 16783122 };
    const d = { start: 67132492, end: 83915614 };
    expect(overlaps(c, d)).toBe(false);
    expect(touches(c, d)).toBe(false);
  });
  it("throws an error when reducing overlapping ranges", () => {
    const ranges = [
      { start: 0, end: 10 },
      { start: 5, end: 15 },
    ];
    expect(() => reduceRanges(ranges)).toThrow("Overlapping ranges 0-10 and 5-15");
  });
});
