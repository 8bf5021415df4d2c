/**
 * ECS cluster, service and task definition discovery and removal
 *
 * A cluster can only be deleted once it holds no services, no running tasks
 * and no registered container instances. Services are deleted with `force`
 * and waited on until inactive, since a draining service still blocks its
 * cluster. Task definitions are deregistered, then deleted.
 *
 */

import {
  DeleteClusterCommand,
  DeleteServiceCommand,
  DeleteTaskDefinitionsCommand,
  DeregisterContainerInstanceCommand,
  DeregisterTaskDefinitionCommand,
  DescribeClustersCommand,
  DescribeServicesCommand,
  DescribeTaskDefinitionCommand,
  ECSClient,
  ListClustersCommand,
  ListContainerInstancesCommand,
  ListServicesCommand,
  ListTaskDefinitionsCommand,
  ListTasksCommand,
  StopTaskCommand,
  waitUntilServicesInactive,
  waitUntilTasksStopped,
  type Tag,
} from "@aws-sdk/client-ecs";
import { z } from "zod";
import { arnResourcePath, decodePageToken, encodePageToken } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { DeleteConflictError, DeleteNotFoundError } from "../lib/sweep-errors.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import {
  createResource,
  type Resource,
  type ResourceNode,
  type Scope,
} from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for ECS service
 *
 * @public
 */
export interface ECSServiceOptions extends BaseServiceOptions {
  /**
   * Seconds to wait for a deleted service to become inactive or a stopped
   * task to stop (default: 600)
   */
  maxWaitSeconds?: number;
}

/**
 * `DescribeServices` accepts at most 10 services per call
 */
const DESCRIBE_SERVICES_LIMIT = 10;

const AllServicesPageTokenSchema = z.object({
  clusters: z.array(z.string()),
  clusterToken: z.string().optional(),
  serviceToken: z.string().optional(),
});

const TaskDefinitionPageTokenSchema = z.object({
  status: z.enum(["ACTIVE", "INACTIVE"]),
  token: z.string().optional(),
});

function tagsToRecord(tags: Tag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.key !== undefined) {
      record[tag.key] = tag.value ?? "";
    }
  }
  return record;
}

function clusterNameOf(cluster: string): string {
  return arnResourcePath(cluster, "cluster")?.[0] ?? cluster;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * ECS discovery and removal
 *
 * @public
 */
export class ECSService extends BaseAwsService<ECSClient> {
  private readonly maxWaitSeconds: number;
  /** Revisions already deregistered, so a retried deletion only deletes */
  private readonly deregistered = new WeakSet<Resource>();

  constructor(options: ECSServiceOptions = {}) {
    super((config) => new ECSClient(config), options);
    this.maxWaitSeconds = options.maxWaitSeconds ?? 600;
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<
    "ECSCluster" | "ECSService" | "ECSTask" | "ECSContainerInstance" | "ECSTaskDefinition"
  > {
    return {
      ECSCluster: {
        listPage: (request) => this.listClusters(request),
        deleteOne: (cluster) => this.deleteCluster(cluster),
        taggingResourceType: "ecs:cluster",
        fromArn: (arn, tags, scope) => {
          const name = arnResourcePath(arn, "cluster")?.[0];
          return name
            ? createResource("ECSCluster", { id: name, arn, scope, tags, meta: {} })
            : undefined;
        },
      },
      ECSService: {
        listPage: (request) => this.listServices(request),
        deleteOne: (service) => this.deleteService(service),
        taggingResourceType: "ecs:service",
        fromArn: (arn, tags, scope) => {
          const [cluster, name] = arnResourcePath(arn, "service") ?? [];
          return cluster && name
            ? createResource("ECSService", {
                id: `${cluster}/${name}`,
                name,
                arn,
                scope,
                tags,
                meta: { cluster },
              })
            : undefined;
        },
      },
      ECSTask: {
        listPage: (request) => this.listTasks(request),
        deleteOne: (task) => this.stopTask(task),
      },
      ECSContainerInstance: {
        listPage: (request) => this.listContainerInstances(request),
        deleteOne: (instance) => this.deregisterContainerInstance(instance),
      },
      ECSTaskDefinition: {
        listPage: (request) => this.listTaskDefinitions(request),
        deleteOne: (definition) => this.deleteTaskDefinition(definition),
        taggingResourceType: "ecs:task-definition",
        fromArn: (arn, tags, scope) => {
          const [familyRevision] = arnResourcePath(arn, "task-definition") ?? [];
          return familyRevision ? this.taskDefinitionResource(familyRevision, scope, arn, tags) : undefined;
        },
      },
    };
  }

  /**
   * List one page of active clusters
   */
  async listClusters(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("ecs:ListClusters", scope, (client) =>
      client.send(
        new ListClustersCommand({
          maxResults: 100,
          ...(request.pageToken && { nextToken: request.pageToken }),
        }),
      ),
    );

    const clusterArns = response.clusterArns ?? [];
    const resources: Resource[] = [];

    if (clusterArns.length > 0) {
      const described = await this.call("ecs:DescribeClusters", scope, (client) =>
        client.send(
          new DescribeClustersCommand({ clusters: clusterArns, include: ["TAGS"] }),
        ),
      );

      for (const cluster of described.clusters ?? []) {
        if (!cluster.clusterName || cluster.status === "INACTIVE") {
          continue;
        }
        resources.push(
          createResource("ECSCluster", {
            id: cluster.clusterName,
            arn: cluster.clusterArn,
            scope,
            tags: tagsToRecord(cluster.tags),
            meta: { ...(cluster.status && { status: cluster.status }) },
          }),
        );
      }
    }

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  /**
   * List one page of services, of the parent cluster or of every cluster
   */
  async listServices(request: ListPageRequest): Promise<ResourcePage> {
    if (request.parent) {
      if (request.parent.kind !== "ECSCluster") {
        return { resources: [] };
      }
      const cluster = request.parent.arn ?? request.parent.id;
      return this.listClusterServices(request.scope, cluster, request.pageToken);
    }

    return this.listAllServices(request);
  }

  /**
   * Walk every cluster in turn; the page token records the clusters still to
   * visit and the position inside the current one
   */
  private async listAllServices(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    let state = decodePageToken(request.pageToken, AllServicesPageTokenSchema);

    if (!state || (state.clusters.length === 0 && state.clusterToken)) {
      const clusterToken = state?.clusterToken;
      const response = await this.call("ecs:ListClusters", scope, (client) =>
        client.send(
          new ListClustersCommand({ maxResults: 100, ...(clusterToken && { nextToken: clusterToken }) }),
        ),
      );
      state = {
        clusters: response.clusterArns ?? [],
        ...(response.nextToken && { clusterToken: response.nextToken }),
      };
    }

    const [current, ...remaining] = state.clusters;
    if (current === undefined) {
      return state.clusterToken
        ? { resources: [], nextPageToken: encodePageToken({ clusters: [], clusterToken: state.clusterToken }) }
        : { resources: [] };
    }

    const page: ResourcePage = await this.listClusterServices(scope, current, state.serviceToken).catch((error: unknown) => {
      if (error instanceof DeleteNotFoundError) {
        this.logger.debug(`Cluster ${clusterNameOf(current)} vanished while listing its services`);
        return { resources: [] };
      }
      throw error;
    });

    const nextState = page.nextPageToken
      ? { ...state, serviceToken: page.nextPageToken }
      : {
          clusters: remaining,
          ...(state.clusterToken && { clusterToken: state.clusterToken }),
        };
    const hasMore = nextState.clusters.length > 0 || nextState.clusterToken !== undefined;

    return {
      resources: page.resources,
      ...(hasMore && { nextPageToken: encodePageToken(nextState) }),
    };
  }

  private async listClusterServices(
    scope: Scope,
    cluster: string,
    pageToken: string | undefined,
  ): Promise<ResourcePage> {
    const response = await this.call("ecs:ListServices", scope, (client) =>
      client.send(
        new ListServicesCommand({
          cluster,
          maxResults: 100,
          ...(pageToken && { nextToken: pageToken }),
        }),
      ),
    );

    const resources: Resource[] = [];
    const clusterName = clusterNameOf(cluster);

    for (const services of chunk(response.serviceArns ?? [], DESCRIBE_SERVICES_LIMIT)) {
      const described = await this.call("ecs:DescribeServices", scope, (client) =>
        client.send(new DescribeServicesCommand({ cluster, services, include: ["TAGS"] })),
      );

      for (const service of described.services ?? []) {
        if (!service.serviceName || service.status === "INACTIVE") {
          continue;
        }
        resources.push(
          createResource("ECSService", {
            id: `${clusterName}/${service.serviceName}`,
            name: service.serviceName,
            arn: service.serviceArn,
            scope,
            tags: tagsToRecord(service.tags),
            meta: { cluster: clusterName, ...(service.status && { status: service.status }) },
          }),
        );
      }
    }

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  /**
   * List one page of running tasks of the parent cluster
   */
  async listTasks(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "ECSCluster") {
      return { resources: [] };
    }

    const response = await this.call("ecs:ListTasks", scope, (client) =>
      client.send(
        new ListTasksCommand({
          cluster: parent.id,
          desiredStatus: "RUNNING",
          maxResults: 100,
          ...(request.pageToken && { nextToken: request.pageToken }),
        }),
      ),
    );

    const resources = (response.taskArns ?? []).map((arn) => {
      const taskId = arn.split("/").at(-1) ?? arn;
      return createResource("ECSTask", {
        id: `${parent.id}/${taskId}`,
        name: taskId,
        arn,
        scope,
        meta: { cluster: parent.id },
      });
    });

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  /**
   * List one page of container instances registered to the parent cluster
   */
  async listContainerInstances(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "ECSCluster") {
      return { resources: [] };
    }

    const response = await this.call("ecs:ListContainerInstances", scope, (client) =>
      client.send(
        new ListContainerInstancesCommand({
          cluster: parent.id,
          maxResults: 100,
          ...(request.pageToken && { nextToken: request.pageToken }),
        }),
      ),
    );

    const resources = (response.containerInstanceArns ?? []).map((arn) => {
      const instanceId = arn.split("/").at(-1) ?? arn;
      return createResource("ECSContainerInstance", {
        id: `${parent.id}/${instanceId}`,
        name: instanceId,
        arn,
        scope,
        meta: { cluster: parent.id },
      });
    });

    return { resources, ...(response.nextToken && { nextPageToken: response.nextToken }) };
  }

  /**
   * List one page of task definition revisions, active ones first
   */
  async listTaskDefinitions(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const state = decodePageToken(request.pageToken, TaskDefinitionPageTokenSchema) ?? {
      status: "ACTIVE" as const,
    };

    const response = await this.call("ecs:ListTaskDefinitions", scope, (client) =>
      client.send(
        new ListTaskDefinitionsCommand({
          status: state.status,
          maxResults: 100,
          ...(state.token && { nextToken: state.token }),
        }),
      ),
    );

    const resources = (response.taskDefinitionArns ?? []).flatMap((arn) => {
      const [familyRevision] = arnResourcePath(arn, "task-definition") ?? [];
      const resource = familyRevision
        ? this.taskDefinitionResource(familyRevision, scope, arn, {}, state.status)
        : undefined;
      return resource ? [resource] : [];
    });

    if (response.nextToken) {
      return {
        resources,
        nextPageToken: encodePageToken({ status: state.status, token: response.nextToken }),
      };
    }
    if (state.status === "ACTIVE") {
      return { resources, nextPageToken: encodePageToken({ status: "INACTIVE" }) };
    }
    return { resources };
  }

  /**
   * Delete an empty cluster
   */
  async deleteCluster(cluster: ResourceNode<"ECSCluster">): Promise<void> {
    await this.call(
      "ecs:DeleteCluster",
      cluster.scope,
      (client) => client.send(new DeleteClusterCommand({ cluster: cluster.id })),
      cluster.id,
    );
  }

  /**
   * Force-delete a service and wait until it is inactive
   *
   * @throws {@link DeleteConflictError} when the service keeps draining past the wait limit
   */
  async deleteService(service: ResourceNode<"ECSService">): Promise<void> {
    const { cluster } = service.meta;

    await this.call(
      "ecs:DeleteService",
      service.scope,
      (client) =>
        client.send(new DeleteServiceCommand({ cluster, service: service.name, force: true })),
      service.id,
    );

    try {
      await waitUntilServicesInactive(
        { client: this.getClient(service.scope), maxWaitTime: this.maxWaitSeconds },
        { cluster, services: [service.name] },
      );
    } catch (error) {
      throw new DeleteConflictError(
        `Service ${service.name} did not become inactive within ${this.maxWaitSeconds}s`,
        service.id,
        error,
      );
    }
  }

  /**
   * Stop a task and wait until it has stopped
   */
  async stopTask(task: ResourceNode<"ECSTask">): Promise<void> {
    const { cluster } = task.meta;

    await this.call(
      "ecs:StopTask",
      task.scope,
      (client) =>
        client.send(new StopTaskCommand({ cluster, task: task.name, reason: "Stopped by aws-sweep" })),
      task.id,
    );

    try {
      await waitUntilTasksStopped(
        { client: this.getClient(task.scope), maxWaitTime: this.maxWaitSeconds },
        { cluster, tasks: [task.name] },
      );
    } catch (error) {
      throw new DeleteConflictError(
        `Task ${task.name} did not stop within ${this.maxWaitSeconds}s`,
        task.id,
        error,
      );
    }
  }

  /**
   * Deregister a container instance, stopping whatever still runs on it
   */
  async deregisterContainerInstance(instance: ResourceNode<"ECSContainerInstance">): Promise<void> {
    await this.call(
      "ecs:DeregisterContainerInstance",
      instance.scope,
      (client) =>
        client.send(
          new DeregisterContainerInstanceCommand({
            cluster: instance.meta.cluster,
            containerInstance: instance.name,
            force: true,
          }),
        ),
      instance.id,
    );
  }

  /**
   * Deregister (when still active) and delete a task definition revision
   *
   * @throws {@link DeleteConflictError} when ECS reports a per-revision failure
   */
  async deleteTaskDefinition(definition: ResourceNode<"ECSTaskDefinition">): Promise<void> {
    const { scope } = definition;

    if (!this.deregistered.has(definition)) {
      const status = definition.meta.status ?? (await this.describeTaskDefinitionStatus(definition));
      if (status !== "INACTIVE" && status !== "DELETE_IN_PROGRESS") {
        await this.call(
          "ecs:DeregisterTaskDefinition",
          scope,
          (client) => client.send(new DeregisterTaskDefinitionCommand({ taskDefinition: definition.id })),
          definition.id,
        );
      }
      this.deregistered.add(definition);
    }

    const response = await this.call(
      "ecs:DeleteTaskDefinitions",
      scope,
      (client) => client.send(new DeleteTaskDefinitionsCommand({ taskDefinitions: [definition.id] })),
      definition.id,
    );

    const [failure] = response.failures ?? [];
    if (failure) {
      throw new DeleteConflictError(
        `Task definition ${definition.id} could not be deleted: ${failure.reason ?? "unknown reason"}${failure.detail ? ` (${failure.detail})` : ""}`,
        definition.id,
      );
    }
  }

  private async describeTaskDefinitionStatus(
    definition: ResourceNode<"ECSTaskDefinition">,
  ): Promise<string | undefined> {
    const response = await this.call(
      "ecs:DescribeTaskDefinition",
      definition.scope,
      (client) => client.send(new DescribeTaskDefinitionCommand({ taskDefinition: definition.id })),
      definition.id,
    );
    return response.taskDefinition?.status;
  }

  private taskDefinitionResource(
    familyRevision: string,
    scope: Scope,
    arn: string,
    tags: Record<string, string>,
    status?: string,
  ): ResourceNode<"ECSTaskDefinition"> | undefined {
    const separator = familyRevision.lastIndexOf(":");
    const revision = Number(familyRevision.slice(separator + 1));
    if (separator <= 0 || !Number.isInteger(revision)) {
      return undefined;
    }
    return createResource("ECSTaskDefinition", {
      id: familyRevision,
      arn,
      scope,
      tags,
      meta: { family: familyRevision.slice(0, separator), revision, ...(status && { status }) },
    });
  }
}
