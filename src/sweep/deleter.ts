/**
 * @module deleter
 * Dependency-aware deleter
 *
 * Deletes each resource tree depth-first and post-order: every dependent
 * reaches a terminal state before its owner's `deleteOne` is issued. Trees are
 * independent; a bounded pool of workers takes top-level resources from a
 * shared queue, while each tree is always walked sequentially.
 *
 * Per call:
 * - throttling gets one retry with backoff
 * - a conflict fails the resource immediately
 * - not found counts as deleted
 *
 * @public
 */

import { Logger } from "../lib/logger.js";
import { retryWithBackoff, type RetryConfig } from "../lib/retry.js";
import {
  DeleteNotFoundError,
  DependentDeletionFailedError,
  InvalidStateTransitionError,
  isThrottledError,
  OperationCancelledError,
} from "../lib/sweep-errors.js";
import type { ProviderClientAdapter } from "./adapter.js";
import { BatchReport, toOutcomeError, type BatchOutcome } from "./report.js";
import { transition, type Resource } from "./resource.js";

/**
 * Deleter options
 *
 * @public
 */
export interface DeleterOptions {
  /** Top-level trees processed at once (default: 1) */
  concurrency?: number;
  /** Report every candidate as skipped without calling the provider */
  dryRun?: boolean;
  signal?: AbortSignal;
  /** Backoff policy for deletions (default: 2 attempts) */
  retry?: Pick<RetryConfig, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
  logger?: Logger;
  onOutcome?: (outcome: BatchOutcome) => void;
}

/**
 * Deletes resource trees and records one outcome per top-level resource
 *
 * @public
 */
export class DependencyAwareDeleter {
  private readonly logger: Logger;
  private readonly failures = new WeakMap<Resource, unknown>();

  constructor(
    private readonly adapter: ProviderClientAdapter,
    private readonly options: DeleterOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger()).child({}, "deleter");
  }

  /**
   * Delete every resource with its dependents
   *
   * @param resources - Top-level candidates from discovery
   * @returns Report holding one outcome per resource that reached a terminal
   *   state; after cancellation, resources never started are left out
   */
  async deleteAll(resources: readonly Resource[]): Promise<BatchReport> {
    const report = new BatchReport();

    if (this.options.dryRun) {
      for (const resource of resources) {
        this.logger.info(`Would delete ${resource.kind} ${resource.name}`, {
          dependents: resource.dependents.length,
        });
        this.emit(report, {
          resourceId: resource.id,
          kind: resource.kind,
          name: resource.name,
          state: resource.state,
          skipped: true,
        });
      }
      return report;
    }

    const queue = [...resources];
    const workerCount = Math.max(1, Math.min(this.options.concurrency ?? 1, queue.length));

    const worker = async (): Promise<void> => {
      for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
        if (this.options.signal?.aborted) {
          return;
        }
        await this.deleteTree(next);
        this.emit(report, {
          resourceId: next.id,
          kind: next.kind,
          name: next.name,
          state: next.state,
          ...(next.state === "Failed" && { error: toOutcomeError(this.failures.get(next)) }),
        });
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return report;
  }

  /**
   * Delete one tree; resolves to the failure, if any, instead of throwing
   */
  private async deleteTree(resource: Resource): Promise<unknown> {
    if (resource.state === "Deleted") {
      return undefined;
    }
    if (resource.state !== "Discovered") {
      return (
        this.failures.get(resource) ??
        new InvalidStateTransitionError(resource.id, resource.state, "PendingDelete")
      );
    }
    if (this.options.signal?.aborted) {
      return new OperationCancelledError(`delete ${resource.kind} ${resource.id}`);
    }

    transition(resource, "PendingDelete");

    for (const dependent of resource.dependents) {
      const failure = await this.deleteTree(dependent);
      if (failure !== undefined) {
        return this.fail(
          resource,
          failure instanceof OperationCancelledError
            ? failure
            : new DependentDeletionFailedError(resource.id, dependent, failure),
        );
      }
    }

    if (this.options.signal?.aborted) {
      return this.fail(
        resource,
        new OperationCancelledError(`delete ${resource.kind} ${resource.id}`),
      );
    }

    try {
      await retryWithBackoff(() => this.adapter.deleteOne(resource), {
        maxAttempts: 2,
        ...this.options.retry,
        ...(this.options.signal && { signal: this.options.signal }),
        shouldRetry: isThrottledError,
        onRetry: (_error, attempt, delayMs) => {
          this.logger.debug(`Delete throttled, retrying in ${delayMs}ms`, {
            kind: resource.kind,
            id: resource.id,
            attempt,
          });
        },
      });
    } catch (error) {
      if (!(error instanceof DeleteNotFoundError)) {
        return this.fail(resource, error);
      }
      this.logger.debug(`${resource.kind} ${resource.id} was already gone`);
    }

    transition(resource, "Deleted");
    this.logger.info(`Deleted ${resource.kind} ${resource.name}`);
    return undefined;
  }

  private fail(resource: Resource, error: unknown): unknown {
    transition(resource, "Failed");
    this.failures.set(resource, error);
    this.logger.warn(`Failed to delete ${resource.kind} ${resource.name}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return error;
  }

  private emit(report: BatchReport, outcome: BatchOutcome): void {
    report.record(outcome);
    this.options.onOutcome?.(outcome);
  }
}
