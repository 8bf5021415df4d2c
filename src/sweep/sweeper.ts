/**
 * @module sweeper
 * Pairs a discovery engine and a deleter over one adapter
 *
 * Commands differ only in the kind they sweep and how they build the
 * filter; everything between the parsed flags and the report lives here.
 *
 * @public
 */

import { Logger } from "../lib/logger.js";
import type { RetryConfig } from "../lib/retry.js";
import { SWEEP_DEFAULTS } from "../lib/sweep-config.js";
import type { ProviderClientAdapter } from "./adapter.js";
import { DependencyAwareDeleter } from "./deleter.js";
import { DiscoveryEngine, type DiscoveryProgress } from "./discovery.js";
import type { Filter } from "./filter.js";
import type { BatchOutcome, BatchReport } from "./report.js";
import type { Resource, ResourceKind, Scope } from "./resource.js";

/**
 * Options shared by discovery and deletion
 *
 * @public
 */
export interface SweeperOptions {
  concurrency?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  /** Replaces the timer between retries */
  sleep?: RetryConfig["sleep"];
  onPage?: (progress: DiscoveryProgress) => void;
  onOutcome?: (outcome: BatchOutcome) => void;
}

/**
 * What a command sweeps
 *
 * @public
 */
export interface SweepTarget {
  kind: ResourceKind;
  scope: Scope;
  filter?: Filter;
  /** Owner to list the kind under, e.g. the cluster of ECS services */
  parent?: Resource;
}

/**
 * Discovery and deletion for one run
 *
 * @public
 */
export interface Sweeper {
  readonly discovery: DiscoveryEngine;
  readonly deleter: DependencyAwareDeleter;
  /** Candidates of the target with their dependent trees */
  discover(target: SweepTarget): Promise<Resource[]>;
  /** Delete (or, in dry-run, report) the candidates */
  delete(candidates: readonly Resource[]): Promise<BatchReport>;
}

/**
 * Build the discovery engine and deleter for a run
 *
 * @param adapter - Provider access
 * @param options - Run options
 *
 * @public
 */
export function createSweeper(adapter: ProviderClientAdapter, options: SweeperOptions = {}): Sweeper {
  const logger = options.logger ?? new Logger();
  const sleep = options.sleep ? { sleep: options.sleep } : {};
  const signal = options.signal ? { signal: options.signal } : {};

  const discovery = new DiscoveryEngine(adapter, {
    logger,
    retry: { ...SWEEP_DEFAULTS.discoveryRetry, ...sleep },
    ...signal,
    ...(options.onPage && { onPage: options.onPage }),
  });

  const deleter = new DependencyAwareDeleter(adapter, {
    logger,
    concurrency: options.concurrency ?? SWEEP_DEFAULTS.concurrency,
    dryRun: options.dryRun ?? false,
    retry: { ...SWEEP_DEFAULTS.deletionRetry, ...sleep },
    ...signal,
    ...(options.onOutcome && { onOutcome: options.onOutcome }),
  });

  return {
    discovery,
    deleter,
    discover: (target) => discovery.discover(target.kind, target.scope, target.filter, target.parent),
    delete: (candidates) => deleter.deleteAll(candidates),
  };
}
