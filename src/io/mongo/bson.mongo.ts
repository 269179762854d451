import { Document, MaxKey, MinKey } from "mongodb";
import { KeyBound, KeyValue } from "@/interfaces/keyRange.interface";
import { MAX_KEY, MIN_KEY, isMinKey } from "@/models/keyBound.model";

// ordered field names of a collection's shard key, e.g. ["category_id", "product_id"]
export type KeyFields = readonly [string, string];

export const toBsonValue = (value: KeyValue): number | string | MinKey | MaxKey => {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  return isMinKey(value) ? new MinKey() : new MaxKey();
};

export const fromBsonValue = (value: unknown): KeyValue => {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (value instanceof MinKey) {
    return MIN_KEY;
  }
  if (value instanceof MaxKey) {
    return MAX_KEY;
  }
  throw new TypeError(`unsupported shard key value: ${JSON.stringify(value)}`);
};

export const toDocument = (fields: KeyFields, bound: KeyBound): Document => ({
  [fields[0]]: toBsonValue(bound.primary),
  [fields[1]]: toBsonValue(bound.tiebreaker),
});

export const fromDocument = (fields: KeyFields, document: Document): KeyBound => ({
  primary: fromBsonValue(document[fields[0]]),
  tiebreaker: fromBsonValue(document[fields[1]]),
});
