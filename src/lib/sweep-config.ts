/**
 * Defaults and environment variables for sweep runs
 *
 */

/**
 * Environment variables read by the CLI
 *
 * @public
 */
export const SWEEP_ENV = {
  profile: "AWS_PROFILE",
  region: "AWS_REGION",
  dryRun: "AWS_SWEEP_DRY_RUN",
  autoApprove: "AWS_SWEEP_AUTO_APPROVE",
  /** Endpoint override for local emulators */
  endpoint: "AWS_SWEEP_ENDPOINT",
} as const;

/**
 * Run defaults
 *
 * @public
 */
export const SWEEP_DEFAULTS = {
  concurrency: 1,
  maxConcurrency: 16,
  /** Page fetches during discovery */
  discoveryRetry: { maxAttempts: 5, baseDelayMs: 200, maxDelayMs: 5000 },
  /** `deleteOne` calls: one retry on throttling */
  deletionRetry: { maxAttempts: 2, baseDelayMs: 200, maxDelayMs: 5000 },
} as const;

/**
 * Process exit codes
 *
 * @public
 */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
  /** 128 + SIGINT */
  interrupted: 130,
} as const;
