/**
 * ARN parsing and compound page tokens
 *
 */

import { z } from "zod";

/**
 * Components of an Amazon Resource Name
 *
 * @public
 */
export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  account: string;
  /** Everything after the account, e.g. `cluster/prod` or `my-bucket` */
  resource: string;
}

/**
 * Split an ARN into its components
 *
 * @param arn - ARN such as `arn:aws:ecs:eu-west-1:123456789012:cluster/prod`
 * @returns Parsed components, or undefined when the value is not an ARN
 *
 * @public
 */
export function parseArn(arn: string): ParsedArn | undefined {
  const [prefix, partition, service, region, account, ...rest] = arn.split(":");
  if (
    prefix !== "arn" ||
    partition === undefined ||
    service === undefined ||
    region === undefined ||
    account === undefined ||
    rest.length === 0
  ) {
    return undefined;
  }
  return { partition, service, region, account, resource: rest.join(":") };
}

/**
 * Resource segments of an ARN after a type prefix
 *
 * @example
 * ```typescript
 * arnResourcePath("arn:aws:ecs:eu-west-1:123456789012:service/prod/api", "service");
 * // ["prod", "api"]
 * ```
 *
 * @public
 */
export function arnResourcePath(arn: string, resourceType: string): string[] | undefined {
  const parsed = parseArn(arn);
  if (!parsed?.resource.startsWith(`${resourceType}/`)) {
    return undefined;
  }
  return parsed.resource.slice(resourceType.length + 1).split("/");
}

/**
 * Encode a structured pagination state as an opaque token
 *
 * @public
 */
export function encodePageToken(state: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(state), "utf8").toString("base64url");
}

/**
 * Decode a token produced by {@link encodePageToken}
 *
 * @param token - Opaque token, or undefined for the first page
 * @param schema - Expected shape of the state
 * @returns The state, or undefined for the first page
 * @throws ZodError when the token was not produced for this schema
 *
 * @public
 */
export function decodePageToken<T>(
  token: string | undefined,
  schema: z.ZodType<T>,
): T | undefined {
  if (token === undefined) {
    return undefined;
  }
  const decoded: unknown = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  return schema.parse(decoded);
}
