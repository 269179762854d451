export interface MinKey {
  readonly $minKey: 1;
}

export interface MaxKey {
  readonly $maxKey: 1;
}

export type KeyValue = number | string | MinKey | MaxKey;

// a point of the composite shard key
export interface KeyBound {
  primary: KeyValue;
  tiebreaker: KeyValue;
}

// half-open: [lowerBound, upperBound)
export interface KeyRange {
  lowerBound: KeyBound;
  upperBound: KeyBound;
}

export interface ShardKey {
  primaryField: string;
  tiebreakerField: string;
}

export interface IntegerDomain {
  kind: "integer";
  // inclusive
  min: number;
  max: number;
}

export interface OrderedDomain {
  kind: "ordered";
  values: (string | number)[];
}

export type KeyDomain = IntegerDomain | OrderedDomain;
