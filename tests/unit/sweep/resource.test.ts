/**
 * Unit tests for the resource model
 */

import { describe, expect, it } from "vitest";
import { InvalidStateTransitionError } from "../../../src/lib/sweep-errors.js";
import {
  countTree,
  createResource,
  DEPENDENCY_RULES,
  isTerminal,
  transition,
  type ResourceState,
} from "../../../src/sweep/resource.js";
import { bucket, project, TEST_SCOPE, versionBatch } from "../../utils/fake-adapter.js";

describe("createResource", () => {
  it("should default the name to the id and start discovered", () => {
    const resource = createResource("ECSCluster", { id: "jobs", scope: TEST_SCOPE, meta: {} });

    expect(resource).toEqual({
      kind: "ECSCluster",
      id: "jobs",
      name: "jobs",
      scope: TEST_SCOPE,
      tags: {},
      meta: {},
      dependents: [],
      state: "Discovered",
    });
    expect("arn" in resource).toBe(false);
  });

  it("should keep the name, ARN and tags given", () => {
    const resource = createResource("ECSService", {
      id: "arn:aws:ecs:eu-west-1:123456789012:service/jobs/web",
      name: "web",
      arn: "arn:aws:ecs:eu-west-1:123456789012:service/jobs/web",
      scope: TEST_SCOPE,
      tags: { env: "dev" },
      meta: { cluster: "jobs" },
    });

    expect(resource.name).toBe("web");
    expect(resource.arn).toBe("arn:aws:ecs:eu-west-1:123456789012:service/jobs/web");
    expect(resource.tags).toEqual({ env: "dev" });
  });
});

describe("transition", () => {
  it("should move forward through the lifecycle", () => {
    const resource = project("p");

    transition(resource, "PendingDelete");
    transition(resource, "Failed");

    expect(resource.state).toBe("Failed");
  });

  it("should refuse to skip a state", () => {
    const resource = project("p");

    expect(() => transition(resource, "Deleted")).toThrow(InvalidStateTransitionError);
    expect(() => transition(resource, "Deleted")).toThrow("Resource p cannot move from Discovered to Deleted");
    expect(resource.state).toBe("Discovered");
  });

  it("should refuse to leave a terminal state", () => {
    const resource = project("p");
    transition(resource, "PendingDelete");
    transition(resource, "Deleted");

    expect(() => transition(resource, "PendingDelete")).toThrow(
      "Resource p cannot move from Deleted to PendingDelete",
    );
  });
});

describe("isTerminal", () => {
  it("should treat only Deleted and Failed as final", () => {
    const states: ResourceState[] = ["Discovered", "PendingDelete", "Deleted", "Failed"];

    expect(states.map((state) => isTerminal(state))).toEqual([false, false, true, true]);
  });
});

describe("countTree", () => {
  it("should count the resource and every nested dependent", () => {
    const owner = bucket("logs");
    const nested = versionBatch("batch-1", "logs");
    nested.dependents = [versionBatch("batch-2", "logs")];
    owner.dependents = [nested, versionBatch("batch-3", "logs")];

    expect(countTree(owner)).toBe(4);
    expect(countTree(project("alone"))).toBe(1);
  });
});

describe("DEPENDENCY_RULES", () => {
  it("should empty buckets before deleting them", () => {
    expect(DEPENDENCY_RULES.Bucket).toEqual(["S3ObjectVersionBatch"]);
  });

  it("should drain ECS clusters of services before tasks and container instances", () => {
    expect(DEPENDENCY_RULES.ECSCluster).toEqual(["ECSService", "ECSTask", "ECSContainerInstance"]);
  });

  it("should strip IAM users of credentials, memberships and policies", () => {
    expect(DEPENDENCY_RULES.IAMUser).toEqual([
      "IAMAccessKey",
      "IAMLoginProfile",
      "IAMMfaDevice",
      "IAMSshPublicKey",
      "IAMSigningCertificate",
      "IAMServiceSpecificCredential",
      "IAMGroupMembership",
      "IAMAttachedPolicy",
      "IAMInlinePolicy",
    ]);
  });

  it("should give leaf kinds no dependents", () => {
    expect(DEPENDENCY_RULES.S3ObjectVersionBatch).toEqual([]);
    expect(DEPENDENCY_RULES.DynamoDBTable).toEqual([]);
  });
});
