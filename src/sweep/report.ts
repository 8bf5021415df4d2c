/**
 * @module report
 * Batch report
 *
 * Ordered record of the terminal state of every top-level resource handled in
 * a run. Run-level success (`failedCount === 0`) is the sole input to the
 * process exit status.
 *
 * @public
 */

import { BaseError } from "../lib/errors.js";
import type { ResourceKind, ResourceState } from "./resource.js";

/**
 * Error detail carried by a failed outcome
 *
 * @public
 */
export interface OutcomeError {
  code: string;
  message: string;
}

/**
 * Final state of one top-level resource
 *
 * @public
 */
export interface BatchOutcome {
  resourceId: string;
  kind: ResourceKind;
  name: string;
  state: ResourceState;
  /** Set for dry-run entries, which stay `Discovered` */
  skipped?: boolean;
  error?: OutcomeError;
}

/**
 * Aggregated view of a report
 *
 * @public
 */
export interface BatchSummary {
  deletedCount: number;
  failedCount: number;
  skippedCount: number;
  failures: BatchOutcome[];
}

/**
 * Output format of a rendered report
 *
 * @public
 */
export type ReportFormat = "table" | "json" | "jsonl";

/**
 * Convert a thrown value into outcome error detail
 *
 * @public
 */
export function toOutcomeError(error: unknown): OutcomeError {
  if (error instanceof BaseError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: error.name, message: error.message };
  }
  return { code: "UNKNOWN_ERROR", message: String(error) };
}

/**
 * Ordered sequence of batch outcomes
 *
 * @public
 */
export class BatchReport {
  private readonly entries: BatchOutcome[] = [];

  /**
   * Append an outcome in completion order
   */
  record(outcome: BatchOutcome): void {
    this.entries.push(outcome);
  }

  get outcomes(): readonly BatchOutcome[] {
    return this.entries;
  }

  summarize(): BatchSummary {
    const failures = this.entries.filter((outcome) => outcome.state === "Failed");
    return {
      deletedCount: this.entries.filter((outcome) => outcome.state === "Deleted").length,
      failedCount: failures.length,
      skippedCount: this.entries.filter((outcome) => outcome.skipped === true).length,
      failures,
    };
  }

  /**
   * True when no resource failed
   */
  get success(): boolean {
    return this.summarize().failedCount === 0;
  }

  /**
   * Render the report for stdout
   *
   * @param format - `table` for people, `json` or `jsonl` for scripts
   * @returns Lines to print, without trailing newline
   */
  render(format: ReportFormat): string {
    const summary = this.summarize();

    switch (format) {
      case "json": {
        return JSON.stringify(
          {
            success: summary.failedCount === 0,
            deleted: summary.deletedCount,
            failed: summary.failedCount,
            skipped: summary.skippedCount,
            outcomes: this.entries,
          },
          undefined,
          2,
        );
      }
      case "jsonl": {
        return this.entries.map((outcome) => JSON.stringify(outcome)).join("\n");
      }
      case "table": {
        return this.renderTable(summary);
      }
    }
  }

  private renderTable(summary: BatchSummary): string {
    const lines: string[] = [];

    if (this.entries.length > 0) {
      const rows = this.entries.map((outcome) => [
        outcome.skipped ? "SKIPPED" : outcome.state.toUpperCase(),
        outcome.kind,
        outcome.name,
      ]);
      const widths = [0, 1].map((column) =>
        Math.max(...rows.map((row) => (row[column] ?? "").length)),
      );
      for (const row of rows) {
        lines.push(
          row
            .map((cell, column) => cell.padEnd(widths[column] ?? 0))
            .join("  ")
            .trimEnd(),
        );
      }
      lines.push("");
    }

    const parts = [`${summary.deletedCount} deleted`, `${summary.failedCount} failed`];
    if (summary.skippedCount > 0) {
      parts.push(`${summary.skippedCount} skipped`);
    }
    lines.push(parts.join(", "));

    for (const failure of summary.failures) {
      lines.push(
        `  ${failure.kind} ${failure.name}: ${failure.error?.message ?? "unknown error"}`,
      );
    }

    return lines.join("\n");
  }
}
