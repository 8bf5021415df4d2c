/**
 * Sweep error taxonomy for discovery and deletion
 *
 * Every failure raised by the provider adapter is one of five classes:
 * unavailable, throttled, conflict, not found, or (at the discovery call site)
 * discovery failed. Callers branch on the class, never on AWS error codes.
 *
 */

import { BaseError } from "./errors.js";

/**
 * AWS error names that signal rate limiting
 *
 * @internal
 */
const THROTTLING_ERROR_NAMES = new Set([
  "Throttling",
  "ThrottlingException",
  "ThrottledException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "RequestThrottled",
  "RequestThrottledException",
  "SlowDown",
  "ProvisionedThroughputExceededException",
]);

/**
 * AWS error names that mean the target no longer exists
 *
 * @internal
 */
const NOT_FOUND_ERROR_NAMES = new Set([
  "NoSuchBucket",
  "NoSuchEntity",
  "InvalidInstanceID.NotFound",
  "ClusterNotFoundException",
  "ServiceNotFoundException",
  "ServiceNotActiveException",
  "RepositoryNotFoundException",
  "PipelineNotFoundException",
  "ResourceNotFoundException",
]);

/**
 * AWS error names that mean an unmet precondition blocks the deletion
 *
 * @internal
 */
const CONFLICT_ERROR_NAMES = new Set([
  "BucketNotEmpty",
  "DeleteConflict",
  "ClusterContainsServicesException",
  "ClusterContainsTasksException",
  "ClusterContainsContainerInstancesException",
  "ResourceInUseException",
  "RepositoryNotEmptyException",
  "OperationNotPermitted",
]);

/**
 * Provider unreachable, credentials rejected, or any unclassified failure
 *
 * @public
 */
export class ProviderUnavailableError extends BaseError {
  /**
   * @param message - User-friendly error message
   * @param operation - Provider operation that failed
   * @param cause - Underlying SDK or network error
   * @param metadata - Additional context
   */
  constructor(
    message: string,
    operation?: string,
    cause?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "PROVIDER_UNAVAILABLE", { operation, ...metadata }, cause);
  }
}

/**
 * Provider rate limited the call
 *
 * @public
 */
export class ProviderThrottledError extends BaseError {
  /**
   * @param message - User-friendly error message
   * @param operation - Provider operation that was throttled
   * @param cause - Underlying SDK error
   */
  constructor(message: string, operation?: string, cause?: unknown) {
    super(message, "PROVIDER_THROTTLED", { operation }, cause);
  }
}

/**
 * Discovery could not produce a complete candidate set
 *
 * @public
 */
export class DiscoveryFailedError extends BaseError {
  /**
   * @param kind - Resource kind being discovered
   * @param cause - Error that aborted discovery
   */
  constructor(kind: string, cause: unknown) {
    super(
      `Discovery of ${kind} resources failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      "DISCOVERY_FAILED",
      { kind },
      cause,
    );
  }
}

/**
 * Provider refused a deletion because a precondition is unmet
 *
 * @public
 */
export class DeleteConflictError extends BaseError {
  /**
   * @param message - Provider's reason string
   * @param resourceId - Resource that could not be deleted
   * @param cause - Underlying SDK error
   */
  constructor(message: string, resourceId?: string, cause?: unknown) {
    super(message, "DELETE_CONFLICT", { resourceId }, cause);
  }
}

/**
 * Resource is already gone; callers treat this as a successful deletion
 *
 * @public
 */
export class DeleteNotFoundError extends BaseError {
  constructor(message: string, resourceId?: string, cause?: unknown) {
    super(message, "DELETE_NOT_FOUND", { resourceId }, cause);
  }
}

/**
 * A dependent could not be removed, so its owner was not deleted
 *
 * @public
 */
export class DependentDeletionFailedError extends BaseError {
  /**
   * @param resourceId - Owner whose deletion was abandoned
   * @param dependent - Kind and id of the dependent that failed
   * @param cause - The dependent's own failure
   */
  constructor(resourceId: string, dependent: { kind: string; id: string }, cause: unknown) {
    super(
      `Dependent ${dependent.kind} ${dependent.id} could not be deleted: ${cause instanceof Error ? cause.message : String(cause)}`,
      "DEPENDENT_DELETION_FAILED",
      { resourceId, dependentKind: dependent.kind, dependentId: dependent.id },
      cause,
    );
  }
}

/**
 * The run was interrupted before the operation could start or finish
 *
 * @public
 */
export class OperationCancelledError extends BaseError {
  constructor(operation: string) {
    super(`Operation cancelled: ${operation}`, "OPERATION_CANCELLED", { operation });
  }
}

/**
 * A resource state change that would move backwards or skip a state
 *
 * @public
 */
export class InvalidStateTransitionError extends BaseError {
  constructor(resourceId: string, from: string, to: string) {
    super(
      `Resource ${resourceId} cannot move from ${from} to ${to}`,
      "INVALID_STATE_TRANSITION",
      { resourceId, from, to },
    );
  }
}

/**
 * Union of the errors the provider adapter may raise
 *
 * @public
 */
export type ProviderError =
  | ProviderUnavailableError
  | ProviderThrottledError
  | DeleteConflictError
  | DeleteNotFoundError;

/**
 * Read the AWS error name of an SDK exception
 *
 * @param error - Value thrown by an AWS SDK client
 * @returns The error name or code, when present
 *
 * @public
 */
export function getAwsErrorName(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("Code" in error && typeof error.Code === "string") {
    return error.Code;
  }
  if ("name" in error && typeof error.name === "string") {
    return error.name;
  }
  return undefined;
}

/**
 * Check whether the SDK marked an error as throttling
 *
 * @internal
 */
function isSdkThrottling(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("$retryable" in error)) {
    return false;
  }
  const retryable = error.$retryable;
  return (
    typeof retryable === "object" &&
    retryable !== null &&
    "throttling" in retryable &&
    retryable.throttling === true
  );
}

/**
 * Check whether an error is a provider throttling signal
 *
 * @public
 */
export function isThrottledError(error: unknown): error is ProviderThrottledError {
  return error instanceof ProviderThrottledError;
}

/**
 * Translate an AWS SDK exception into the sweep error taxonomy
 *
 * @param error - Value thrown by an AWS SDK client
 * @param operation - Operation label such as `s3:DeleteBucket`
 * @param resourceId - Target resource, for deletions
 * @returns The classified error; taxonomy errors pass through unchanged
 *
 * @public
 */
export function classifyProviderError(
  error: unknown,
  operation: string,
  resourceId?: string,
): ProviderError {
  if (
    error instanceof ProviderUnavailableError ||
    error instanceof ProviderThrottledError ||
    error instanceof DeleteConflictError ||
    error instanceof DeleteNotFoundError
  ) {
    return error;
  }

  const name = getAwsErrorName(error);
  const message = error instanceof Error ? error.message : String(error);

  if ((name !== undefined && THROTTLING_ERROR_NAMES.has(name)) || isSdkThrottling(error)) {
    return new ProviderThrottledError(`${operation} was throttled: ${message}`, operation, error);
  }
  if (name !== undefined && NOT_FOUND_ERROR_NAMES.has(name)) {
    return new DeleteNotFoundError(message, resourceId, error);
  }
  if (name !== undefined && CONFLICT_ERROR_NAMES.has(name)) {
    return new DeleteConflictError(message, resourceId, error);
  }

  return new ProviderUnavailableError(`${operation} failed: ${message}`, operation, error, {
    awsErrorName: name,
    resourceId,
  });
}

/**
 * Get user guidance for a sweep failure
 *
 * @param error - Error raised during discovery or deletion
 * @returns Guidance text, empty when there is nothing to add
 *
 * @public
 */
export function getSweepErrorGuidance(error: unknown): string {
  if (error instanceof DiscoveryFailedError) {
    return `${getSweepErrorGuidance(error.cause)} No resources were deleted because the candidate list was incomplete.`.trim();
  }
  if (error instanceof ProviderThrottledError) {
    return "AWS is rate limiting requests. Re-run later or lower --concurrency.";
  }
  if (error instanceof DeleteConflictError) {
    return "The resource still has something attached or in use. Remove it first or re-run once it has drained.";
  }
  if (error instanceof DependentDeletionFailedError) {
    return "Fix the dependent resource named above, then re-run the same command.";
  }
  if (error instanceof ProviderUnavailableError) {
    const name = getAwsErrorName(error.cause);
    if (name === "AccessDenied" || name === "AccessDeniedException" || name === "UnauthorizedOperation") {
      return "The current credentials lack permission for this operation. Check the IAM policy of the selected profile.";
    }
    if (name === "ExpiredToken" || name === "ExpiredTokenException" || name === "CredentialsProviderError") {
      return "Credentials are missing or expired. Refresh them (for SSO profiles run 'aws sso login') and retry.";
    }
    return "Check network connectivity, the selected --profile and --region.";
  }
  return "";
}

/**
 * Format a sweep failure with guidance for terminal output
 *
 * @param error - Error to format
 * @param operation - Operation description such as "discover S3 buckets"
 * @param verbose - Include the stack trace
 * @returns Formatted error message
 *
 * @public
 */
export function formatSweepError(error: unknown, operation: string, verbose: boolean): string {
  const guidance = getSweepErrorGuidance(error);
  const errorMessage = error instanceof Error ? error.message : String(error);

  let formattedMessage = `Failed to ${operation}: ${errorMessage}`;

  if (guidance) {
    formattedMessage += `\n\nGuidance: ${guidance}`;
  }

  if (verbose && error instanceof Error && error.stack) {
    formattedMessage += `\n\nStack trace:\n${error.stack}`;
  }

  return formattedMessage;
}
