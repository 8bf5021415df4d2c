/**
 * @module ec2-service
 * EC2 instance discovery and termination
 *
 * Instances that are already terminated are never listed. Instances are always
 * listed natively, since `DescribeInstances` returns their tags and the tagging
 * API keeps reporting terminated instances for a while. Termination can
 * optionally wait until the instance reaches the `terminated` state.
 */

import {
  DescribeInstancesCommand,
  EC2Client,
  TerminateInstancesCommand,
  waitUntilInstanceTerminated,
  type Instance,
} from "@aws-sdk/client-ec2";
import { tagListToRecord } from "../lib/tags.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { DeleteConflictError } from "../lib/sweep-errors.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import { createResource, type ResourceNode, type Scope } from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for EC2 service
 *
 * @public
 */
export interface EC2ServiceOptions extends BaseServiceOptions {
  /**
   * Wait for each instance to reach `terminated` before reporting it deleted
   */
  waitForTermination?: boolean;

  /**
   * Seconds to wait for termination (default: 300)
   */
  maxWaitSeconds?: number;
}

/**
 * States an instance can be listed in
 */
const LIVE_INSTANCE_STATES = ["pending", "running", "shutting-down", "stopping", "stopped"];

/**
 * EC2 instance discovery and termination
 *
 * @public
 */
export class EC2Service extends BaseAwsService<EC2Client> {
  private readonly waitForTermination: boolean;
  private readonly maxWaitSeconds: number;

  constructor(options: EC2ServiceOptions = {}) {
    super((config) => new EC2Client(config), options);
    this.waitForTermination = options.waitForTermination ?? false;
    this.maxWaitSeconds = options.maxWaitSeconds ?? 300;
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"EC2Instance"> {
    return {
      EC2Instance: {
        listPage: (request) => this.listInstances(request),
        deleteOne: (instance) => this.terminateInstance(instance),
      },
    };
  }

  /**
   * List one page of instances that are not yet terminated
   */
  async listInstances(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("ec2:DescribeInstances", scope, (client) =>
      client.send(
        new DescribeInstancesCommand({
          Filters: [{ Name: "instance-state-name", Values: LIVE_INSTANCE_STATES }],
          MaxResults: 1000,
          ...(request.pageToken && { NextToken: request.pageToken }),
        }),
      ),
    );

    const instances = (response.Reservations ?? []).flatMap(
      (reservation) => reservation.Instances ?? [],
    );

    const resources = instances.flatMap((instance) =>
      instance.InstanceId ? [this.instanceResource(instance, instance.InstanceId, scope)] : [],
    );

    return { resources, ...(response.NextToken && { nextPageToken: response.NextToken }) };
  }

  /**
   * Terminate an instance, optionally waiting until it is gone
   *
   * @throws {@link DeleteConflictError} when the wait times out
   */
  async terminateInstance(instance: ResourceNode<"EC2Instance">): Promise<void> {
    await this.call(
      "ec2:TerminateInstances",
      instance.scope,
      (client) => client.send(new TerminateInstancesCommand({ InstanceIds: [instance.id] })),
      instance.id,
    );

    if (!this.waitForTermination) {
      return;
    }

    try {
      await waitUntilInstanceTerminated(
        { client: this.getClient(instance.scope), maxWaitTime: this.maxWaitSeconds },
        { InstanceIds: [instance.id] },
      );
    } catch (error) {
      throw new DeleteConflictError(
        `Instance ${instance.id} did not terminate within ${this.maxWaitSeconds}s`,
        instance.id,
        error,
      );
    }
  }

  private instanceResource(instance: Instance, instanceId: string, scope: Scope): ResourceNode<"EC2Instance"> {
    const tags = tagListToRecord(instance.Tags);
    return createResource("EC2Instance", {
      id: instanceId,
      name: tags.Name ?? instanceId,
      scope,
      tags,
      meta: {
        ...(instance.State?.Name && { instanceState: instance.State.Name }),
        ...(instance.InstanceType && { instanceType: instance.InstanceType }),
      },
    });
  }
}
