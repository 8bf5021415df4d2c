/**
 * Kind handler shape shared by the AWS service classes
 *
 */

import type { KindHandler } from "../sweep/adapter.js";
import type { Resource, ResourceKind, ResourceNode, Scope } from "../sweep/resource.js";

/**
 * Kind handler with optional Resource Groups Tagging API support
 *
 * @public
 */
export interface AwsKindHandler<K extends ResourceKind> extends KindHandler<K> {
  /**
   * Resource type filter for `tag:GetResources`, e.g. `ecs:cluster`.
   * Kinds without one are always listed natively.
   */
  taggingResourceType?: string;

  /**
   * Build a resource from a tagged ARN; undefined skips the ARN
   */
  fromArn?: (
    arn: string,
    tags: Record<string, string>,
    scope: Scope,
    parent?: Resource,
  ) => ResourceNode<K> | undefined;
}

/**
 * Handlers for a subset of kinds
 *
 * @public
 */
export type AwsKindHandlers<K extends ResourceKind> = { [P in K]: AwsKindHandler<P> };
