/**
 * @module ecr-service
 * ECR repository discovery and removal
 *
 * Repositories are deleted with `force`, which removes every image they hold,
 * so images are not modelled as dependents.
 */

import {
  DeleteRepositoryCommand,
  DescribeRepositoriesCommand,
  ECRClient,
} from "@aws-sdk/client-ecr";
import { arnResourcePath } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import { createResource, type ResourceNode } from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for ECR service
 *
 * @public
 */
export type ECRServiceOptions = BaseServiceOptions;

/**
 * ECR repository discovery and removal
 *
 * @public
 */
export class ECRService extends BaseAwsService<ECRClient> {
  constructor(options: ECRServiceOptions = {}) {
    super((config) => new ECRClient(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"ECRRepository"> {
    return {
      ECRRepository: {
        listPage: (request) => this.listRepositories(request),
        deleteOne: (repository) => this.deleteRepository(repository),
        taggingResourceType: "ecr:repository",
        fromArn: (arn, tags, scope) => {
          // Repository names may contain slashes
          const name = arnResourcePath(arn, "repository")?.join("/");
          return name ? createResource("ECRRepository", { id: name, arn, scope, tags, meta: {} }) : undefined;
        },
      },
    };
  }

  /**
   * List one page of repositories in the default registry
   */
  async listRepositories(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("ecr:DescribeRepositories", scope, (client) =>
      client.send(
        new DescribeRepositoriesCommand({
          maxResults: 1000,
          ...(request.pageToken && { nextToken: request.pageToken }),
        }),
      ),
    );

    const resources = (response.repositories ?? []).flatMap((repository) =>
      repository.repositoryName
        ? [
            createResource("ECRRepository", {
              id: repository.repositoryName,
              arn: repository.repositoryArn,
              scope,
              meta: { ...(repository.registryId && { registryId: repository.registryId }) },
            }),
          ]
        : [],
    );

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  /**
   * Delete a repository together with its images
   */
  async deleteRepository(repository: ResourceNode<"ECRRepository">): Promise<void> {
    await this.call(
      "ecr:DeleteRepository",
      repository.scope,
      (client) =>
        client.send(
          new DeleteRepositoryCommand({
            repositoryName: repository.id,
            force: true,
            ...(repository.meta.registryId && { registryId: repository.meta.registryId }),
          }),
        ),
      repository.id,
    );
  }
}
