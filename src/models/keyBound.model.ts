import { KeyBound, KeyRange, KeyValue, MaxKey, MinKey } from "@/interfaces/keyRange.interface";

export const MIN_KEY: MinKey = Object.freeze({ $minKey: 1 });
export const MAX_KEY: MaxKey = Object.freeze({ $maxKey: 1 });

export const GLOBAL_MIN: KeyBound = Object.freeze({ primary: MIN_KEY, tiebreaker: MIN_KEY });
export const GLOBAL_MAX: KeyBound = Object.freeze({ primary: MAX_KEY, tiebreaker: MAX_KEY });

export const isMinKey = (value: KeyValue): value is MinKey => typeof value === "object" && "$minKey" in value;

// MinKey < numbers < strings < MaxKey, the same order the cluster sorts shard key values in
const typeRank = (value: KeyValue): number => {
  if (typeof value === "number") return 1;
  if (typeof value === "string") return 2;
  return isMinKey(value) ? 0 : 3;
};

export const compareValues = (a: KeyValue, b: KeyValue): number => {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) {
    return Math.sign(rankDiff);
  }
  if (typeof a === "number" && typeof b === "number") {
    return Math.sign(a - b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return 0;
};

export const compareBounds = (a: KeyBound, b: KeyBound): number =>
  compareValues(a.primary, b.primary) || compareValues(a.tiebreaker, b.tiebreaker);

export const boundsEqual = (a: KeyBound, b: KeyBound): boolean => compareBounds(a, b) === 0;

export const rangeContains = (range: KeyRange, key: KeyBound): boolean =>
  compareBounds(range.lowerBound, key) <= 0 && compareBounds(key, range.upperBound) < 0;

const formatValue = (value: KeyValue): string => {
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return JSON.stringify(value);
  return isMinKey(value) ? "MinKey" : "MaxKey";
};

export const formatBound = (bound: KeyBound): string => `{${formatValue(bound.primary)}, ${formatValue(bound.tiebreaker)}}`;

export const formatRange = (range: KeyRange): string => `[${formatBound(range.lowerBound)}, ${formatBound(range.upperBound)})`;
