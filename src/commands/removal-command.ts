/**
 * @module removal-command
 * Shared flow of every removal command
 *
 * discover → show plan → confirm → delete → report. Validation failures exit
 * with 2 before any provider call, an incomplete discovery exits with 1 before
 * any deletion, a failed outcome exits with 1 and an interrupt with 130.
 *
 * @public
 */

import { Flags } from "@oclif/core";
import enquirer from "enquirer";
import { readIdsFile } from "../lib/ids-file.js";
import type { Logger } from "../lib/logger.js";
import { EXIT_CODES, SWEEP_DEFAULTS, SWEEP_ENV } from "../lib/sweep-config.js";
import { OperationCancelledError, formatSweepError } from "../lib/sweep-errors.js";
import {
  buildFilter,
  SweepCommandInputSchema,
  type SweepCommandInput,
} from "../lib/sweep-schemas.js";
import {
  AwsProviderAdapter,
  createAwsServices,
  type AwsServicesOptions,
} from "../services/aws-provider-adapter.js";
import type { Filter } from "../sweep/filter.js";
import { describeFilter } from "../sweep/filter.js";
import type { BatchReport } from "../sweep/report.js";
import { countTree, type Resource, type ResourceKind, type Scope } from "../sweep/resource.js";
import { createSweeper, type Sweeper, type SweepTarget } from "../sweep/sweeper.js";
import { BaseCommand, type Spinner } from "./base-command.js";

/**
 * Parsed flags of a removal command
 *
 * @public
 */
export interface RemovalFlags {
  region?: string | undefined;
  profile?: string | undefined;
  format: string;
  verbose: boolean;
  "dry-run": boolean;
  yes: boolean;
  concurrency: number;
  name?: string | undefined;
  tag?: string[] | undefined;
  id?: string[] | undefined;
  "ids-file"?: string | undefined;
}

/**
 * What one command removes
 *
 * @public
 */
export interface RemovalPlan {
  kind: ResourceKind;
  /** Plural noun for messages, e.g. "S3 buckets" */
  noun: string;
  /** Identifiers taken from positional arguments */
  ids?: string[];
  /** Owner the kind is listed under */
  parent?: (scope: Scope) => Resource;
  services?: Pick<AwsServicesOptions, "waitForTermination">;
}

/**
 * Base class of every removal command
 *
 * @public
 */
export abstract class RemovalCommand extends BaseCommand {
  private spinner: Spinner | undefined;

  /**
   * Flags shared by every removal command
   */
  static readonly removalFlags = {
    ...BaseCommand.commonFlags,

    "dry-run": Flags.boolean({
      description: "Discover and print the plan without deleting anything",
      default: false,
      env: SWEEP_ENV.dryRun,
    }),

    yes: Flags.boolean({
      char: "y",
      description: "Delete without asking for confirmation",
      default: false,
      env: SWEEP_ENV.autoApprove,
    }),

    concurrency: Flags.integer({
      description: `Top-level resources deleted at once (1-${SWEEP_DEFAULTS.maxConcurrency})`,
      default: SWEEP_DEFAULTS.concurrency,
    }),

    name: Flags.string({
      description: "Name glob; * matches any run of characters, ? exactly one",
      helpValue: "PATTERN",
    }),

    tag: Flags.string({
      description: "Required tag, Key=Value[,Value]; repeat for several keys",
      helpValue: "KEY=VALUE",
      multiple: true,
    }),

    id: Flags.string({
      description: "Identifier, name or ARN; repeatable",
      helpValue: "ID",
      multiple: true,
    }),

    "ids-file": Flags.string({
      description: "File with one identifier per line",
      helpValue: "PATH",
    }),
  };

  /**
   * Run the removal flow for one kind
   *
   * @param flags - Parsed flags
   * @param plan - Kind and command-specific inputs
   */
  protected async sweep(flags: RemovalFlags, plan: RemovalPlan): Promise<void> {
    const { input, filter } = await this.validate(flags, plan);

    if (filter === undefined) {
      return this.error(
        `No filter given for ${plan.noun}: pass --name, --tag, --id or --ids-file (use --name '*' to match everything)`,
        { exit: EXIT_CODES.usage },
      );
    }

    const logger = this.createLogger(input.verbose, input.dryRun ? "[DRY-RUN] " : undefined);
    const endpoint = process.env[SWEEP_ENV.endpoint];
    const services = createAwsServices({
      logger,
      ...plan.services,
      ...(endpoint && { endpoint }),
    });
    const adapter = new AwsProviderAdapter(services);

    let region: string;
    try {
      region = input.region ?? (await services.credentials.resolveRegion(input.profile));
    } catch (error) {
      return this.error(this.formatError(error, input.verbose), { exit: EXIT_CODES.usage });
    }
    const scope: Scope = { region, ...(input.profile && { profile: input.profile }) };

    const controller = new AbortController();
    const onInterrupt = (): void => {
      logger.warn("Interrupted, finishing deletions in flight");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      let deleted = 0;
      let total = 0;
      const sweeper = createSweeper(adapter, {
        concurrency: input.concurrency,
        dryRun: input.dryRun,
        signal: controller.signal,
        logger,
        onPage: ({ kind, page, candidates }) => {
          this.updateSpinner(`Discovering ${kind}: page ${page}, ${candidates} found`);
        },
        onOutcome: () => {
          deleted++;
          this.updateSpinner(`Deleting ${deleted}/${total}`);
        },
      });

      const target: SweepTarget = {
        kind: plan.kind,
        scope,
        filter,
        ...(plan.parent && { parent: plan.parent(scope) }),
      };
      const candidates = await this.discover(sweeper, target, plan.noun, input.verbose);
      total = candidates.length;

      this.printPlan(candidates, plan.noun, scope, filter);

      if (candidates.length > 0 && !input.dryRun && !input.yes) {
        const confirmed = await this.confirm(adapter, candidates, plan.noun, scope, input.verbose);
        if (!confirmed) {
          this.logToStderr("Nothing was deleted.");
          return;
        }
      }

      const report = await this.deleteCandidates(sweeper, candidates, logger);
      this.log(report.render(input.format));

      if (controller.signal.aborted) {
        this.exit(EXIT_CODES.interrupted);
      }
      if (!report.success) {
        this.exit(EXIT_CODES.failure);
      }
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }

  private async validate(
    flags: RemovalFlags,
    plan: RemovalPlan,
  ): Promise<{ input: SweepCommandInput; filter: Filter | undefined }> {
    try {
      const fileIds = flags["ids-file"] ? await readIdsFile(flags["ids-file"]) : [];
      const input = SweepCommandInputSchema.parse({
        region: flags.region,
        profile: flags.profile,
        format: flags.format,
        verbose: flags.verbose,
        dryRun: flags["dry-run"],
        yes: flags.yes,
        concurrency: flags.concurrency,
        name: flags.name,
        tags: flags.tag ?? [],
        ids: [...(plan.ids ?? []), ...(flags.id ?? []), ...fileIds],
      });
      return { input, filter: buildFilter(input) };
    } catch (error) {
      return this.error(this.formatError(error, flags.verbose, "Invalid input"), {
        exit: EXIT_CODES.usage,
      });
    }
  }

  private updateSpinner(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    }
  }

  private async discover(
    sweeper: Sweeper,
    target: SweepTarget,
    noun: string,
    verbose: boolean,
  ): Promise<Resource[]> {
    const spinner = this.createSpinner(`Discovering ${noun} in ${target.scope.region}`);
    this.spinner = spinner;
    try {
      const candidates = await sweeper.discover(target);
      spinner.succeed(`Discovered ${candidates.length} ${noun}`);
      return candidates;
    } catch (error) {
      spinner.fail();
      if (error instanceof OperationCancelledError) {
        this.logToStderr("Interrupted during discovery; nothing was deleted.");
        return this.exit(EXIT_CODES.interrupted);
      }
      return this.error(formatSweepError(error, `discover ${noun}`, verbose), {
        exit: EXIT_CODES.failure,
      });
    } finally {
      this.spinner = undefined;
    }
  }

  private printPlan(candidates: Resource[], noun: string, scope: Scope, filter: Filter | undefined): void {
    const where = `${scope.region}${scope.profile ? ` (profile ${scope.profile})` : ""}`;
    const matching = filter ? ` matching ${describeFilter(filter)}` : "";

    if (candidates.length === 0) {
      this.logToStderr(`No ${noun}${matching} found in ${where}.`);
      return;
    }

    const total = candidates.reduce((sum, candidate) => sum + countTree(candidate), 0);
    this.logToStderr(`${candidates.length} ${noun}${matching} in ${where}, ${total} resources in total:`);
    for (const candidate of candidates) {
      const dependents = countTree(candidate) - 1;
      this.logToStderr(`  ${candidate.name}${dependents > 0 ? ` (+${dependents} dependents)` : ""}`);
    }
  }

  private async confirm(
    adapter: AwsProviderAdapter,
    candidates: Resource[],
    noun: string,
    scope: Scope,
    verbose: boolean,
  ): Promise<boolean> {
    if (!process.stdin.isTTY) {
      return this.error("Refusing to delete without confirmation: pass --yes to run non-interactively", {
        exit: EXIT_CODES.usage,
      });
    }

    let account: string;
    try {
      const summary = await adapter.describeAccount(scope);
      account = summary.aliases.length > 0 ? `${summary.account} (${summary.aliases.join(", ")})` : summary.account;
    } catch (error) {
      return this.error(formatSweepError(error, "identify the target account", verbose), {
        exit: EXIT_CODES.failure,
      });
    }

    try {
      const { proceed } = await enquirer.prompt<{ proceed: boolean }>({
        type: "confirm",
        name: "proceed",
        message: `Delete ${candidates.length} ${noun} in account ${account}, region ${scope.region}?`,
        initial: false,
      });
      return proceed;
    } catch {
      // enquirer rejects when the prompt itself is interrupted
      return this.exit(EXIT_CODES.interrupted);
    }
  }

  private async deleteCandidates(
    sweeper: Sweeper,
    candidates: Resource[],
    logger: Logger,
  ): Promise<BatchReport> {
    const spinner = this.createSpinner(`Deleting 0/${candidates.length}`);
    this.spinner = spinner;
    const started = Date.now();
    try {
      const report = await sweeper.delete(candidates);
      logger.debug("Deletion finished", {
        durationMs: Date.now() - started,
        outcomes: report.outcomes.length,
      });
      return report;
    } finally {
      spinner.stop();
      this.spinner = undefined;
    }
  }
}
