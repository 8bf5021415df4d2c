/**
 * Zod schemas for removal command input
 *
 * Flags are validated into a {@link SweepCommandInput}; {@link buildFilter}
 * turns the filter flags into one discovery filter.
 *
 */

import { z } from "zod";
import { combineFilters, type Filter, type TagFilter } from "../sweep/filter.js";
import { SWEEP_DEFAULTS } from "./sweep-config.js";

/**
 * AWS region validation schema
 *
 * @public
 */
export const AwsRegionSchema = z
  .string()
  .min(1, "AWS region is required")
  .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, "AWS region must look like eu-west-1");

/**
 * AWS profile validation schema
 *
 * @public
 */
export const AwsProfileSchema = z
  .string()
  .min(1, "AWS profile name is required")
  .max(64, "AWS profile name must be 64 characters or less")
  .regex(
    /^[a-zA-Z0-9._-]+$/,
    "AWS profile name can only contain letters, numbers, dots, underscores, and hyphens",
  );

/**
 * One `--tag` value: `Key=Value[,Value...]`; `Key` or `Key=` accepts any value
 *
 * @public
 */
export const TagFlagSchema = z
  .string()
  .regex(/^[^=]+(=.*)?$/s, "Tag must be in the form Key=Value[,Value]")
  .transform((raw) => {
    const separator = raw.indexOf("=");
    const key = (separator === -1 ? raw : raw.slice(0, separator)).trim();
    const values =
      separator === -1
        ? []
        : raw
            .slice(separator + 1)
            .split(",")
            .map((value) => value.trim())
            .filter((value) => value.length > 0);
    return { key, values };
  })
  .refine((tag) => tag.key.length > 0, "Tag key must not be empty");

/**
 * Parsed `--tag` value
 *
 * @public
 */
export type TagFlag = z.infer<typeof TagFlagSchema>;

/**
 * Report format schema
 *
 * @public
 */
export const ReportFormatSchema = z.enum(["table", "json", "jsonl"]).default("table");

/**
 * Input of every removal command
 *
 * @public
 */
export const SweepCommandInputSchema = z.object({
  region: AwsRegionSchema.optional(),
  profile: AwsProfileSchema.optional(),
  format: ReportFormatSchema,
  verbose: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  yes: z.boolean().default(false),
  concurrency: z
    .number()
    .int("Concurrency must be a whole number")
    .min(1, "Concurrency must be at least 1")
    .max(SWEEP_DEFAULTS.maxConcurrency, `Concurrency must be ${SWEEP_DEFAULTS.maxConcurrency} or less`)
    .default(SWEEP_DEFAULTS.concurrency),
  name: z.string().min(1, "Name pattern must not be empty").optional(),
  tags: z.array(TagFlagSchema).default([]),
  ids: z.array(z.string().trim().min(1, "Identifier must not be empty")).default([]),
});

/**
 * Validated removal command input
 *
 * @public
 */
export type SweepCommandInput = z.infer<typeof SweepCommandInputSchema>;

/**
 * Merge repeated `--tag` flags; values of the same key accumulate
 *
 * @public
 */
export function mergeTagFlags(tags: readonly TagFlag[]): TagFilter {
  const merged = new Map<string, string[]>();
  for (const { key, values } of tags) {
    const existing = merged.get(key);
    if (existing === undefined) {
      merged.set(key, [...values]);
    } else if (values.length === 0) {
      // No values accepts any value
      existing.length = 0;
    } else if (existing.length > 0) {
      existing.push(...values.filter((value) => !existing.includes(value)));
    }
  }
  return Object.fromEntries(merged);
}

/**
 * Combine the filter flags into one filter
 *
 * @returns The filter, or undefined when no filter flag was given
 *
 * @public
 */
export function buildFilter(input: Pick<SweepCommandInput, "name" | "tags" | "ids">): Filter | undefined {
  const filters: Filter[] = [];

  if (input.name !== undefined) {
    filters.push({ type: "name-glob", pattern: input.name });
  }
  if (input.tags.length > 0) {
    filters.push({ type: "tags", tags: mergeTagFlags(input.tags) });
  }
  if (input.ids.length > 0) {
    filters.push({ type: "ids", ids: [...new Set(input.ids)] });
  }

  return combineFilters(filters);
}
