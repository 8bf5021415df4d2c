/**
 * Unit tests for EC2 instance discovery and termination
 */

import { DescribeInstancesCommand, EC2Client, TerminateInstancesCommand } from "@aws-sdk/client-ec2";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { EC2Service } from "../../../src/services/ec2-service.js";
import { createResource } from "../../../src/sweep/resource.js";
import { awsError, serviceOptions } from "../../utils/aws-mocks.js";
import { TEST_SCOPE } from "../../utils/fake-adapter.js";

const ec2Mock = mockClient(EC2Client);

const instance = () =>
  createResource("EC2Instance", { id: "i-0abc", scope: TEST_SCOPE, meta: { instanceState: "running" } });

describe("EC2Service", () => {
  beforeEach(() => {
    ec2Mock.reset();
  });

  describe("listInstances", () => {
    it("should list live instances from every reservation", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              {
                InstanceId: "i-0abc",
                InstanceType: "t3.micro",
                State: { Name: "running" },
                Tags: [{ Key: "Name", Value: "web" }, { Key: "env", Value: "dev" }],
              },
            ],
          },
          { Instances: [{ InstanceId: "i-0def", State: { Name: "stopped" } }, {}] },
        ],
        NextToken: "n2",
      });
      const service = new EC2Service(serviceOptions());

      const page = await service.listInstances({ kind: "EC2Instance", scope: TEST_SCOPE });

      expect(page.nextPageToken).toBe("n2");
      expect(page.resources).toEqual([
        expect.objectContaining({
          id: "i-0abc",
          name: "web",
          tags: { Name: "web", env: "dev" },
          meta: { instanceState: "running", instanceType: "t3.micro" },
        }),
        expect.objectContaining({ id: "i-0def", name: "i-0def", meta: { instanceState: "stopped" } }),
      ]);
      expect(ec2Mock).toHaveReceivedCommandWith(DescribeInstancesCommand, {
        Filters: [
          { Name: "instance-state-name", Values: ["pending", "running", "shutting-down", "stopping", "stopped"] },
        ],
        MaxResults: 1000,
      });
    });
  });

  describe("terminateInstance", () => {
    it("should terminate without waiting by default", async () => {
      ec2Mock.on(TerminateInstancesCommand).resolves({});
      const service = new EC2Service(serviceOptions());

      await service.terminateInstance(instance());

      expect(ec2Mock).toHaveReceivedCommandWith(TerminateInstancesCommand, { InstanceIds: ["i-0abc"] });
      expect(ec2Mock).not.toHaveReceivedCommand(DescribeInstancesCommand);
    });

    it("should wait for the instance to terminate when asked", async () => {
      ec2Mock.on(TerminateInstancesCommand).resolves({});
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [{ InstanceId: "i-0abc", State: { Name: "terminated" } }] }],
      });
      const service = new EC2Service({ ...serviceOptions(), waitForTermination: true });

      await service.terminateInstance(instance());

      expect(ec2Mock).toHaveReceivedCommandWith(DescribeInstancesCommand, { InstanceIds: ["i-0abc"] });
    });

    it("should treat an unknown instance as already gone", async () => {
      ec2Mock.on(TerminateInstancesCommand).rejects(awsError("InvalidInstanceID.NotFound"));
      const service = new EC2Service(serviceOptions());

      await expect(service.terminateInstance(instance())).rejects.toMatchObject({
        code: "DELETE_NOT_FOUND",
        metadata: { resourceId: "i-0abc" },
      });
    });

    it("should report termination protection as the provider refusing the call", async () => {
      ec2Mock.on(TerminateInstancesCommand).rejects(awsError("OperationNotPermitted", "Termination protection is on"));
      const service = new EC2Service(serviceOptions());

      await expect(service.terminateInstance(instance())).rejects.toMatchObject({
        code: "DELETE_CONFLICT",
        message: "Termination protection is on",
      });
    });
  });
});
