export interface Range {
  start: number; // inclusive
  end: number; // inclusive
}

export const size = (range: Range): number => {
  return range.end - range.start + 1;
};

export const touches = (a: Range, b: Range): boolean => {
  return a.end + 1 == b.start || b.end + 1 == a.start;
};
export const overlaps = (a: Range, b: Range): boolean => {
  return a.end >= b.start && b.end >= a.start;
};

export const toString = (range: Range): string => {
  return `${range.start}-${range.end}`;
};

const byStart = (a: Range, b: Range): number => a.start - b.start;

/**
 * Merges touching ranges into one. Overlapping ranges mean that the same
 * bytes were accounted for twice, which is an error.
 */
export const reduceRanges = (ranges: Range[]): Range[] =>
  [...ranges]
    .sort(byStart)
    .reduce((array: Range[], range: Range): Range[] => {
      const previous = array[array.length - 1];
      if (previous === undefined) {
        array.push({ ...range });
        return array;
      }
      if (overlaps(previous, range)) {
        throw new Error(
          `Overlapping ranges ${toString(previous)} and ${toString(range)}`
        );
      }
      if (touches(previous, range)) {
        previous.end = range.end;
      } else {
        array.push({ ...range });
      }
      return array;
    }, new Array<Range>());
