#!/usr/bin/env node

/**
 * aws-sweep - Main entry point
 *
 * Oclif-based command-line interface that discovers AWS resources by kind
 * and deletes them in dependency order.
 *
 */

import { execute } from "@oclif/core";

/**
 * CLI application entry point
 */
async function run(): Promise<void> {
  await execute({ dir: import.meta.url });
}

/**
 * Errors that escape oclif's own handling are rendered by its handler, which
 * also sets the exit code
 */
try {
  await run();
} catch (error: unknown) {
  const { handle } = await import("@oclif/core/handle");
  await handle(error instanceof Error ? error : new Error(String(error)));
}
