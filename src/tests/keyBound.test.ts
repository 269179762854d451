import { compareBounds, compareValues, formatBound, GLOBAL_MAX, GLOBAL_MIN, MAX_KEY, MIN_KEY, rangeContains } from "@/models/keyBound.model";

describe("Testing key ordering", () => {
  it("orders MinKey < numbers < strings < MaxKey", () => {
    expect(compareValues(MIN_KEY, -1e9)).toBe(-1);
    expect(compareValues(5, "0")).toBe(-1);
    expect(compareValues("zzz", MAX_KEY)).toBe(-1);
    expect(compareValues(MAX_KEY, MAX_KEY)).toBe(0);
  });

  it("compares numbers numerically and strings by code unit", () => {
    expect(compareValues(9, 10)).toBe(-1);
    expect(compareValues("9", "10")).toBe(1);
    expect(compareValues(3, 3)).toBe(0);
  });

  it("compares the tiebreaker only when primaries are equal", () => {
    expect(compareBounds({ primary: 4, tiebreaker: MAX_KEY }, { primary: 5, tiebreaker: MIN_KEY })).toBe(-1);
    expect(compareBounds({ primary: 5, tiebreaker: 100 }, { primary: 5, tiebreaker: MIN_KEY })).toBe(1);
  });

  it("treats ranges as half-open", () => {
    const range = { lowerBound: { primary: 1, tiebreaker: MIN_KEY }, upperBound: { primary: 2, tiebreaker: MIN_KEY } };
    expect(rangeContains(range, { primary: 1, tiebreaker: MIN_KEY })).toBe(true);
    expect(rangeContains(range, { primary: 1, tiebreaker: 999999 })).toBe(true);
    expect(rangeContains(range, { primary: 2, tiebreaker: MIN_KEY })).toBe(false);
  });

  it("formats bounds for logs", () => {
    expect(formatBound(GLOBAL_MIN)).toBe("{MinKey, MinKey}");
    expect(formatBound(GLOBAL_MAX)).toBe("{MaxKey, MaxKey}");
    expect(formatBound({ primary: "books", tiebreaker: 7 })).toBe('{"books", 7}');
  });
});
