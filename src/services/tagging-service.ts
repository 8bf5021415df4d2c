/**
 * @module tagging-service
 * Tag-filtered listing through the Resource Groups Tagging API
 *
 * `GetResources` narrows the listing server-side: keys are ANDed and the
 * values of one key are ORed, the same semantics as {@link TagFilter}. An
 * empty `PaginationToken` marks the last page.
 */

import {
  GetResourcesCommand,
  ResourceGroupsTaggingAPIClient,
} from "@aws-sdk/client-resource-groups-tagging-api";
import { tagListToRecord } from "../lib/tags.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import type { TagFilter } from "../sweep/filter.js";
import type { Scope } from "../sweep/resource.js";

/**
 * Configuration options for the tagging service
 *
 * @public
 */
export type TaggingServiceOptions = BaseServiceOptions;

/**
 * One resource returned by the tagging API
 *
 * @public
 */
export interface TaggedResource {
  arn: string;
  tags: Record<string, string>;
}

/**
 * One page of tagged resources
 *
 * @public
 */
export interface TaggedResourcePage {
  resources: TaggedResource[];
  nextPageToken?: string;
}

/**
 * Resource Groups Tagging API access
 *
 * @public
 */
export class TaggingService extends BaseAwsService<ResourceGroupsTaggingAPIClient> {
  constructor(options: TaggingServiceOptions = {}) {
    super((config) => new ResourceGroupsTaggingAPIClient(config), options);
  }

  /**
   * List one page of resources of a type carrying the required tags
   *
   * @param scope - Region and profile
   * @param resourceType - Type filter such as `ecs:cluster`
   * @param tagFilter - Required tags
   * @param pageToken - Token from the previous page
   */
  async getResources(
    scope: Scope,
    resourceType: string,
    tagFilter: TagFilter,
    pageToken?: string,
  ): Promise<TaggedResourcePage> {
    const response = await this.call("tag:GetResources", scope, (client) =>
      client.send(
        new GetResourcesCommand({
          ResourceTypeFilters: [resourceType],
          TagFilters: Object.entries(tagFilter).map(([key, values]) => ({
            Key: key,
            ...(values.length > 0 && { Values: [...values] }),
          })),
          ResourcesPerPage: 100,
          ...(pageToken && { PaginationToken: pageToken }),
        }),
      ),
    );

    const resources = (response.ResourceTagMappingList ?? []).flatMap((mapping) =>
      mapping.ResourceARN ? [{ arn: mapping.ResourceARN, tags: tagListToRecord(mapping.Tags) }] : [],
    );

    return {
      resources,
      ...(response.PaginationToken && { nextPageToken: response.PaginationToken }),
    };
  }
}
