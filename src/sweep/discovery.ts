/**
 * @module discovery
 * Discovery engine
 *
 * Lists every page of a kind, filters each page before accumulating it, then
 * builds the dependent tree of each candidate by discovering the dependent
 * kinds scoped to that candidate. Discovery is all or nothing: any failure
 * that survives the retry policy aborts with {@link DiscoveryFailedError}.
 *
 * @public
 */

import { Logger } from "../lib/logger.js";
import { retryWithBackoff, type RetryConfig } from "../lib/retry.js";
import {
  DiscoveryFailedError,
  isThrottledError,
  OperationCancelledError,
} from "../lib/sweep-errors.js";
import type { ListPageRequest, ProviderClientAdapter } from "./adapter.js";
import { compileFilter, extractTagFilter, type Filter } from "./filter.js";
import {
  DEPENDENCY_RULES,
  type DependencyRules,
  type Resource,
  type ResourceKind,
  type Scope,
} from "./resource.js";

/**
 * Page-level progress notification
 *
 * @public
 */
export interface DiscoveryProgress {
  kind: ResourceKind;
  /** 1-based page number */
  page: number;
  /** Candidates accumulated so far for this listing */
  candidates: number;
  /** Owner id when listing dependents */
  parentId?: string;
}

/**
 * Discovery engine options
 *
 * @public
 */
export interface DiscoveryOptions {
  /** Backoff policy for page fetches (default: 5 attempts, 200ms doubling) */
  retry?: Pick<RetryConfig, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
  signal?: AbortSignal;
  logger?: Logger;
  /** Dependent kinds per kind (default: {@link DEPENDENCY_RULES}) */
  dependencyRules?: DependencyRules;
  onPage?: (progress: DiscoveryProgress) => void;
}

/**
 * Produces complete, filtered candidate sets with their dependent trees
 *
 * @public
 */
export class DiscoveryEngine {
  private readonly rules: DependencyRules;
  private readonly logger: Logger;

  constructor(
    private readonly adapter: ProviderClientAdapter,
    private readonly options: DiscoveryOptions = {},
  ) {
    this.rules = options.dependencyRules ?? DEPENDENCY_RULES;
    this.logger = (options.logger ?? new Logger()).child({}, "discovery");
  }

  /**
   * Discover all resources of a kind that match a filter
   *
   * @param kind - Resource kind to list
   * @param scope - Profile and region
   * @param filter - Candidate filter; dependents are listed unfiltered
   * @param parent - Owner resource when discovering dependents
   * @returns Candidates with `dependents` populated, each listed once
   * @throws {@link DiscoveryFailedError} when any page cannot be fetched
   * @throws {@link OperationCancelledError} when the signal aborts
   */
  async discover(
    kind: ResourceKind,
    scope: Scope,
    filter?: Filter,
    parent?: Resource,
  ): Promise<Resource[]> {
    try {
      const candidates = await this.listAll(kind, scope, filter, parent);

      for (const candidate of candidates) {
        await this.resolveDependents(candidate);
      }

      return candidates;
    } catch (error) {
      if (error instanceof OperationCancelledError || error instanceof DiscoveryFailedError) {
        throw error;
      }
      throw new DiscoveryFailedError(kind, error);
    }
  }

  private async listAll(
    kind: ResourceKind,
    scope: Scope,
    filter: Filter | undefined,
    parent: Resource | undefined,
  ): Promise<Resource[]> {
    const matches = filter ? compileFilter(filter) : () => true;
    const tagFilter = filter ? extractTagFilter(filter) : undefined;
    const candidates = new Map<string, Resource>();

    let pageToken: string | undefined;
    let page = 0;

    do {
      this.throwIfCancelled(`list ${kind}`);

      const request: ListPageRequest = {
        kind,
        scope,
        ...(pageToken !== undefined && { pageToken }),
        ...(parent && { parent }),
        ...(tagFilter && { tagFilter }),
      };

      const result = await retryWithBackoff(() => this.adapter.listPage(request), {
        ...this.options.retry,
        ...(this.options.signal && { signal: this.options.signal }),
        shouldRetry: isThrottledError,
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug(`Page fetch throttled, retrying in ${delayMs}ms`, {
            kind,
            attempt,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      });
      page++;

      for (const resource of result.resources) {
        if (!candidates.has(resource.id) && matches(resource)) {
          candidates.set(resource.id, resource);
        }
      }

      this.options.onPage?.({
        kind,
        page,
        candidates: candidates.size,
        ...(parent && { parentId: parent.id }),
      });
      this.logger.debug("Fetched page", {
        kind,
        page,
        listed: result.resources.length,
        candidates: candidates.size,
        ...(parent && { parent: parent.id }),
      });

      pageToken = result.nextPageToken;
    } while (pageToken !== undefined);

    return [...candidates.values()];
  }

  private async resolveDependents(resource: Resource): Promise<void> {
    const dependents: Resource[] = [];

    for (const dependentKind of this.rules[resource.kind]) {
      const found = await this.discover(dependentKind, resource.scope, undefined, resource);
      dependents.push(...found);
    }

    resource.dependents = dependents;
  }

  private throwIfCancelled(operation: string): void {
    if (this.options.signal?.aborted) {
      throw new OperationCancelledError(operation);
    }
  }
}
