/**
 * @module base-command
 * Base command class for standardized command patterns
 *
 * Provides the flags, error formatting, logging and progress indicators
 * shared by every command.
 *
 * @example Basic command implementation
 * ```typescript
 * export default class MyCommand extends BaseCommand {
 *   static override readonly description = "My command description";
 *
 *   static override readonly flags = {
 *     ...BaseCommand.commonFlags,
 *     myFlag: Flags.string({ description: "Custom flag" }),
 *   };
 *
 *   async run(): Promise<void> {
 *     const { flags } = await this.parse(MyCommand);
 *
 *     try {
 *       // ...
 *     } catch (error) {
 *       this.error(this.formatError(error, flags.verbose, "my operation"), { exit: 1 });
 *     }
 *   }
 * }
 * ```
 *
 * @public
 */

import { Command, Flags } from "@oclif/core";
import ora from "ora";
import { ZodError } from "zod";
import { BaseError, sanitizeMetadata } from "../lib/errors.js";
import { Logger, LogLevel } from "../lib/logger.js";
import { SWEEP_ENV } from "../lib/sweep-config.js";
import { getSweepErrorGuidance } from "../lib/sweep-errors.js";

/**
 * Progress indicator; a no-op stand-in replaces ora where output is not a terminal
 *
 * @public
 */
export interface Spinner {
  text: string;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

/**
 * Whether animated progress output makes sense in this process
 */
function progressEnabled(): boolean {
  return (
    process.stderr.isTTY === true &&
    !process.env.CI &&
    !process.env.VITEST &&
    process.env.NODE_ENV !== "test"
  );
}

/**
 * Base command class providing common functionality for all commands
 *
 * @public
 */
export abstract class BaseCommand extends Command {
  /**
   * Common flags shared across all commands
   *
   * @example
   * ```typescript
   * static override readonly flags = {
   *   ...BaseCommand.commonFlags,
   *   customFlag: Flags.string({ description: "Custom flag" }),
   * };
   * ```
   */
  static readonly commonFlags = {
    region: Flags.string({
      char: "r",
      description: "AWS region (defaults to the profile's region)",
      helpValue: "REGION",
      env: SWEEP_ENV.region,
    }),

    profile: Flags.string({
      char: "p",
      description: "AWS profile to use for authentication",
      helpValue: "PROFILE_NAME",
      env: SWEEP_ENV.profile,
    }),

    format: Flags.string({
      char: "f",
      description: "Report format",
      options: ["table", "json", "jsonl"],
      default: "table",
      helpValue: "FORMAT",
    }),

    verbose: Flags.boolean({
      char: "v",
      description: "Enable verbose output with debug information",
      default: false,
    }),
  };

  /**
   * Format an error with context and guidance
   *
   * @param error - Error to format
   * @param verbose - Include metadata, cause and stack trace
   * @param context - Operation context for the message
   */
  protected formatError(error: unknown, verbose = false, context?: string): string {
    const contextPrefix = context ? `${context}: ` : "";

    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      return `${contextPrefix}Validation failed - ${issues}`;
    }

    if (!(error instanceof Error)) {
      return `${contextPrefix}${String(error)}`;
    }

    let message = `${contextPrefix}${error.message}`;

    const guidance = getSweepErrorGuidance(error);
    if (guidance) {
      message += `\n\nGuidance: ${guidance}`;
    }

    if (verbose && error instanceof BaseError && Object.keys(error.metadata).length > 0) {
      message += `\n\nMetadata:\n${JSON.stringify(sanitizeMetadata(error.metadata), undefined, 2)}`;
    }

    if (verbose && error.cause !== undefined) {
      message += `\n\nCause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n\nStack trace:\n${error.stack}`;
    }

    return message;
  }

  /**
   * Root logger for a run; `--verbose` switches to debug output
   *
   * @param verbose - Verbose flag
   * @param prefix - Prepended to every message
   */
  protected createLogger(verbose: boolean, prefix?: string): Logger {
    return new Logger({
      level: verbose ? LogLevel.DEBUG : Logger.levelFromEnvironment(),
      component: this.id ?? "aws-sweep",
      ...(prefix && { prefix }),
    });
  }

  /**
   * Start a progress spinner on stderr
   */
  protected createSpinner(text: string): Spinner {
    if (progressEnabled()) {
      return ora({ text, stream: process.stderr }).start();
    }
    return {
      text,
      succeed: () => {},
      fail: () => {},
      stop: () => {},
    };
  }
}
