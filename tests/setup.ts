/**
 * Global test setup for unit and integration tests
 *
 */

import { allCustomMatcher } from "aws-sdk-client-mock-vitest";
import { beforeEach, expect } from "vitest";

expect.extend(allCustomMatcher);

/**
 * Isolate every test from the developer's AWS configuration
 */
beforeEach(() => {
  for (const name of [
    "AWS_REGION",
    "AWS_PROFILE",
    "AWS_ACCESS_KEY_ID",
    "AWS_SECRET_ACCESS_KEY",
    "AWS_SESSION_TOKEN",
    "AWS_CONFIG_FILE",
    "AWS_SHARED_CREDENTIALS_FILE",
    "AWS_DEFAULT_REGION",
    "AWS_DEFAULT_PROFILE",
    "AWS_SWEEP_DRY_RUN",
    "AWS_SWEEP_AUTO_APPROVE",
    "AWS_SWEEP_ENDPOINT",
    "LOG_LEVEL",
  ]) {
    delete process.env[name];
  }

  process.env.NODE_ENV = "test";
  // Static credentials keep the provider chain away from the filesystem and IMDS
  process.env.AWS_ACCESS_KEY_ID = "test-access-key";
  process.env.AWS_SECRET_ACCESS_KEY = "test-secret";
});
