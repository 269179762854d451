import { MongoError, MongoNetworkError, MongoServerError, MongoServerSelectionError } from "mongodb";
import { ClusterOperationException } from "@/exceptions/PlannerException";
import { ClusterOperation } from "@/interfaces/cluster.interface";
import { describeError } from "@/utils/util";

// server error codes worth another attempt: metadata lock contention and
// migrations/elections in progress
const TRANSIENT_CODES = new Set([
  46, // LockBusy
  117, // ConflictingOperationInProgress
  189, // PrimarySteppedDown
  10107, // NotWritablePrimary
  11600, // InterruptedAtShutdown
  11602, // InterruptedDueToReplStateChange
  13435, // NotPrimaryNoSecondaryOk
]);

export const isTransientMongoError = (error: unknown): boolean => {
  if (error instanceof MongoNetworkError || error instanceof MongoServerSelectionError) {
    return true;
  }
  if (error instanceof MongoServerError) {
    return error.hasErrorLabel("RetryableWriteError") || (typeof error.code === "number" && TRANSIENT_CODES.has(error.code));
  }
  return false;
};

export const toClusterError = (operation: ClusterOperation, error: unknown): ClusterOperationException => {
  if (error instanceof ClusterOperationException) {
    return error;
  }
  const message = error instanceof MongoError ? `${error.name}: ${error.message}` : describeError(error);
  return new ClusterOperationException(operation, message, isTransientMongoError(error), { cause: error });
};
