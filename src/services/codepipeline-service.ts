/**
 * CodePipeline pipeline discovery and removal
 *
 */

import {
  CodePipelineClient,
  DeletePipelineCommand,
  ListPipelinesCommand,
} from "@aws-sdk/client-codepipeline";
import { parseArn } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import { createResource, type ResourceNode } from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for CodePipeline service
 *
 * @public
 */
export type CodePipelineServiceOptions = BaseServiceOptions;

/**
 * CodePipeline pipeline discovery and removal
 *
 * @public
 */
export class CodePipelineService extends BaseAwsService<CodePipelineClient> {
  constructor(options: CodePipelineServiceOptions = {}) {
    super((config) => new CodePipelineClient(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"CodePipelinePipeline"> {
    return {
      CodePipelinePipeline: {
        listPage: (request) => this.listPipelines(request),
        deleteOne: (pipeline) => this.deletePipeline(pipeline),
        taggingResourceType: "codepipeline:pipeline",
        // Pipeline ARNs carry the bare name: arn:aws:codepipeline:region:account:name
        fromArn: (arn, tags, scope) => {
          const name = parseArn(arn)?.resource;
          return name
            ? createResource("CodePipelinePipeline", { id: name, arn, scope, tags, meta: {} })
            : undefined;
        },
      },
    };
  }

  /**
   * List one page of pipelines
   */
  async listPipelines(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("codepipeline:ListPipelines", scope, (client) =>
      client.send(new ListPipelinesCommand({ ...(request.pageToken && { nextToken: request.pageToken }) })),
    );

    const resources = (response.pipelines ?? []).flatMap((pipeline) =>
      pipeline.name ? [createResource("CodePipelinePipeline", { id: pipeline.name, scope, meta: {} })] : [],
    );

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  async deletePipeline(pipeline: ResourceNode<"CodePipelinePipeline">): Promise<void> {
    await this.call(
      "codepipeline:DeletePipeline",
      pipeline.scope,
      (client) => client.send(new DeletePipelineCommand({ name: pipeline.id })),
      pipeline.id,
    );
  }
}
