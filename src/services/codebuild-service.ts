/**
 * CodeBuild project discovery and removal
 *
 */

import { CodeBuildClient, DeleteProjectCommand, ListProjectsCommand } from "@aws-sdk/client-codebuild";
import { arnResourcePath } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import { createResource, type ResourceNode } from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for CodeBuild service
 *
 * @public
 */
export type CodeBuildServiceOptions = BaseServiceOptions;

/**
 * CodeBuild project discovery and removal
 *
 * @public
 */
export class CodeBuildService extends BaseAwsService<CodeBuildClient> {
  constructor(options: CodeBuildServiceOptions = {}) {
    super((config) => new CodeBuildClient(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"CodeBuildProject"> {
    return {
      CodeBuildProject: {
        listPage: (request) => this.listProjects(request),
        deleteOne: (project) => this.deleteProject(project),
        taggingResourceType: "codebuild:project",
        fromArn: (arn, tags, scope) => {
          const name = arnResourcePath(arn, "project")?.join("/");
          return name ? createResource("CodeBuildProject", { id: name, arn, scope, tags, meta: {} }) : undefined;
        },
      },
    };
  }

  /**
   * List one page of project names
   */
  async listProjects(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("codebuild:ListProjects", scope, (client) =>
      client.send(new ListProjectsCommand({ ...(request.pageToken && { nextToken: request.pageToken }) })),
    );

    const resources = (response.projects ?? []).map((name) =>
      createResource("CodeBuildProject", { id: name, scope, meta: {} }),
    );

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  async deleteProject(project: ResourceNode<"CodeBuildProject">): Promise<void> {
    await this.call(
      "codebuild:DeleteProject",
      project.scope,
      (client) => client.send(new DeleteProjectCommand({ name: project.id })),
      project.id,
    );
  }
}
