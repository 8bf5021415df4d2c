/**
 * @module dynamodb-service
 * DynamoDB table discovery and removal
 *
 * Tables with deletion protection enabled fail with a validation error and
 * are reported as failed.
 */

import { DeleteTableCommand, DynamoDBClient, ListTablesCommand } from "@aws-sdk/client-dynamodb";
import { arnResourcePath } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import { createResource, type ResourceNode } from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for DynamoDB service
 *
 * @public
 */
export type DynamoDBServiceOptions = BaseServiceOptions;

/**
 * DynamoDB table discovery and removal
 *
 * @public
 */
export class DynamoDBService extends BaseAwsService<DynamoDBClient> {
  constructor(options: DynamoDBServiceOptions = {}) {
    super((config) => new DynamoDBClient(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"DynamoDBTable"> {
    return {
      DynamoDBTable: {
        listPage: (request) => this.listTables(request),
        deleteOne: (table) => this.deleteTable(table),
        taggingResourceType: "dynamodb:table",
        fromArn: (arn, tags, scope) => {
          const [name] = arnResourcePath(arn, "table") ?? [];
          return name ? createResource("DynamoDBTable", { id: name, arn, scope, tags, meta: {} }) : undefined;
        },
      },
    };
  }

  /**
   * List one page of table names
   */
  async listTables(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("dynamodb:ListTables", scope, (client) =>
      client.send(
        new ListTablesCommand({
          Limit: 100,
          ...(request.pageToken && { ExclusiveStartTableName: request.pageToken }),
        }),
      ),
    );

    const resources = (response.TableNames ?? []).map((name) =>
      createResource("DynamoDBTable", { id: name, scope, meta: {} }),
    );

    return {
      resources,
      ...(response.LastEvaluatedTableName && { nextPageToken: response.LastEvaluatedTableName }),
    };
  }

  async deleteTable(table: ResourceNode<"DynamoDBTable">): Promise<void> {
    await this.call(
      "dynamodb:DeleteTable",
      table.scope,
      (client) => client.send(new DeleteTableCommand({ TableName: table.id })),
      table.id,
    );
  }
}
