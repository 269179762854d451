import { HttpException } from "@/exceptions/HttpException";
import { ClusterOperation } from "@/interfaces/cluster.interface";
import { describeError } from "@/utils/util";


/**
 * Bad split input: split count below 1, a malformed domain, or fewer distinct
 * values than requested ranges. Never retried.
 */
export class InvalidDomainException extends HttpException {
  public code = "InvalidDomain";

  constructor(message: string) {
    super(400, `invalid key domain: ${message}`);
    this.name = "InvalidDomainException";
  }
}

export class EmptyShardSetException extends HttpException {
  public code = "EmptyShardSet";

  constructor(message = "no shards available") {
    super(409, message);
    this.name = "EmptyShardSetException";
  }
}

/**
 * Raised by cluster adapters. `transient` failures (network, timeouts, busy
 * metadata locks) are retried by callers; anything else is surfaced at once.
 */
export class ClusterOperationException extends HttpException {
  public code = "ClusterOperation";
  public readonly operation: ClusterOperation;
  public readonly transient: boolean;

  constructor(operation: ClusterOperation, message: string, transient: boolean, options?: ErrorOptions) {
    super(502, `${operation}: ${message}`, options);
    this.name = "ClusterOperationException";
    this.operation = operation;
    this.transient = transient;
  }
}

export class PlacementFailedException extends HttpException {
  public code = "PlacementFailed";
  public readonly entryIndex: number;
  public readonly operation: string;

  constructor(entryIndex: number, operation: string, cause: unknown) {
    super(502, `entry ${entryIndex} failed during ${operation}: ${describeError(cause)}`, { cause });
    this.name = "PlacementFailedException";
    this.entryIndex = entryIndex;
    this.operation = operation;
  }
}

export class BalancerStateException extends HttpException {
  public code = "BalancerStateError";
  public readonly operation: "suspend" | "resume" | "state";
  // failure of the work that ran while the balancer was suspended, if any
  public readonly workError?: unknown;

  constructor(operation: "suspend" | "resume" | "state", cause: unknown, workError?: unknown) {
    const suffix = workError === undefined ? "" : ` (after suspended work failed: ${describeError(workError)})`;
    super(503, `balancer ${operation} failed: ${describeError(cause)}${suffix}`, { cause });
    this.name = "BalancerStateException";
    this.operation = operation;
    this.workError = workError;
  }
}

export class VerificationUnavailableException extends HttpException {
  public code = "VerificationUnavailable";

  constructor(collection: string, cause: unknown) {
    super(503, `distribution of ${collection} unavailable: ${describeError(cause)}`, { cause });
    this.name = "VerificationUnavailableException";
  }
}

export const isTransient = (error: unknown): boolean => error instanceof ClusterOperationException && error.transient;
