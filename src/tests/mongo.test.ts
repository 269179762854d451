import { MaxKey, MinKey, MongoNetworkError, MongoServerError } from "mongodb";
import { ClusterOperationException } from "@/exceptions/PlannerException";
import { fromDocument, toBsonValue, toDocument } from "@/io/mongo/bson.mongo";
import { parseShardHost } from "@/io/mongo/controlPlane.mongo";
import { isTransientMongoError, toClusterError } from "@/io/mongo/errors.mongo";
import { GLOBAL_MAX, MIN_KEY } from "@/models/keyBound.model";

const FIELDS = ["category_id", "product_id"] as const;

describe("Testing MongoDB adapters", () => {
  describe("shard key documents", () => {
    it("maps sentinels to BSON MinKey and MaxKey", () => {
      expect(toBsonValue(MIN_KEY)).toBeInstanceOf(MinKey);
      expect(toBsonValue(7)).toBe(7);
      const doc = toDocument(FIELDS, GLOBAL_MAX);
      expect(doc.category_id).toBeInstanceOf(MaxKey);
      expect(doc.product_id).toBeInstanceOf(MaxKey);
    });

    it("reads chunk bounds back", () => {
      expect(fromDocument(FIELDS, { category_id: 12, product_id: new MinKey() })).toStrictEqual({ primary: 12, tiebreaker: MIN_KEY });
      expect(() => fromDocument(FIELDS, { category_id: 12 })).toThrow(TypeError);
    });
  });

  describe("parseShardHost", () => {
    it("splits the replica set name from the hosts", () => {
      expect(parseShardHost("rs0/mongo1:27017,mongo2:27017")).toStrictEqual({ replicaSetName: "rs0", endpoint: "mongo1:27017,mongo2:27017" });
      expect(parseShardHost("mongo3:27017")).toStrictEqual({ replicaSetName: "", endpoint: "mongo3:27017" });
    });
  });

  describe("errors", () => {
    it("treats network failures and lock contention as transient", () => {
      expect(isTransientMongoError(new MongoNetworkError("connection reset"))).toBe(true);
      expect(isTransientMongoError(new MongoServerError({ message: "lock busy", code: 46 }))).toBe(true);
      expect(isTransientMongoError(new MongoServerError({ message: "bad split point", code: 2 }))).toBe(false);
      expect(isTransientMongoError(new Error("other"))).toBe(false);
    });

    it("wraps driver errors with the operation name", () => {
      const error = toClusterError("splitAt", new MongoServerError({ message: "bad split point", code: 2 }));
      expect(error).toBeInstanceOf(ClusterOperationException);
      expect(error.message).toBe("splitAt: MongoServerError: bad split point");
      expect(error.transient).toBe(false);
    });

    it("passes cluster errors through", () => {
      const original = new ClusterOperationException("moveRange", "timed out after 5ms", true);
      expect(toClusterError("moveRange", original)).toBe(original);
    });
  });
});
