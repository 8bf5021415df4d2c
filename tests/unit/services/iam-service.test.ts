/**
 * Unit tests for IAM discovery and removal
 */

import {
  DeactivateMFADeviceCommand,
  DeleteRoleCommand,
  DeleteServiceSpecificCredentialCommand,
  DeleteSigningCertificateCommand,
  DeleteSSHPublicKeyCommand,
  DeleteUserPolicyCommand,
  DeleteVirtualMFADeviceCommand,
  DetachGroupPolicyCommand,
  DetachRolePolicyCommand,
  GetGroupCommand,
  GetLoginProfileCommand,
  IAMClient,
  ListAttachedRolePoliciesCommand,
  ListEntitiesForPolicyCommand,
  ListGroupsForUserCommand,
  ListPoliciesCommand,
  ListPolicyTagsCommand,
  ListPolicyVersionsCommand,
  ListRolesCommand,
  ListRoleTagsCommand,
  ListServiceSpecificCredentialsCommand,
  ListSigningCertificatesCommand,
  ListSSHPublicKeysCommand,
  ListUserPoliciesCommand,
  ListUsersCommand,
  ListUserTagsCommand,
  RemoveUserFromGroupCommand,
} from "@aws-sdk/client-iam";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { DeleteConflictError } from "../../../src/lib/sweep-errors.js";
import { IAMService } from "../../../src/services/iam-service.js";
import { createResource } from "../../../src/sweep/resource.js";
import { awsError, serviceOptions } from "../../utils/aws-mocks.js";
import { TEST_SCOPE } from "../../utils/fake-adapter.js";

const iamMock = mockClient(IAMClient);

const POLICY_ARN = "arn:aws:iam::123456789012:policy/deploy";

const role = (id: string) => createResource("IAMRole", { id, scope: TEST_SCOPE, meta: {} });
const user = (id: string) => createResource("IAMUser", { id, scope: TEST_SCOPE, meta: {} });
const group = (id: string) => createResource("IAMGroup", { id, scope: TEST_SCOPE, meta: {} });
const policy = () => createResource("IAMPolicy", { id: "deploy", arn: POLICY_ARN, scope: TEST_SCOPE, meta: {} });

describe("IAMService", () => {
  let service: IAMService;

  beforeEach(() => {
    iamMock.reset();
    service = new IAMService(serviceOptions());
  });

  describe("listRoles", () => {
    beforeEach(() => {
      iamMock.on(ListRolesCommand).resolves({
        Roles: [
          {
            RoleName: "app-runner",
            Arn: "arn:aws:iam::123456789012:role/app-runner",
            Path: "/",
            RoleId: "AROA1",
            CreateDate: new Date(0),
          },
          {
            RoleName: "AWSServiceRoleForECS",
            Arn: "arn:aws:iam::123456789012:role/aws-service-role/ecs.amazonaws.com/AWSServiceRoleForECS",
            Path: "/aws-service-role/ecs.amazonaws.com/",
            RoleId: "AROA2",
            CreateDate: new Date(0),
          },
        ],
        IsTruncated: true,
        Marker: "m2",
      });
    });

    it("should skip service-linked roles and page by marker", async () => {
      const page = await service.listRoles({ kind: "IAMRole", scope: TEST_SCOPE });

      expect(page.resources.map((resource) => resource.id)).toEqual(["app-runner"]);
      expect(page.resources[0]).toMatchObject({ meta: { path: "/" }, tags: {} });
      expect(page.nextPageToken).toBe("m2");
      expect(iamMock).not.toHaveReceivedCommand(ListRoleTagsCommand);
    });

    it("should fetch tags only when a tag filter is set", async () => {
      iamMock.on(ListRoleTagsCommand).resolves({ Tags: [{ Key: "env", Value: "dev" }] });

      const page = await service.listRoles({ kind: "IAMRole", scope: TEST_SCOPE, tagFilter: { env: ["dev"] } });

      expect(page.resources[0]?.tags).toEqual({ env: "dev" });
      expect(iamMock).toHaveReceivedCommandTimes(ListRoleTagsCommand, 1);
      expect(iamMock).toHaveReceivedCommandWith(ListRoleTagsCommand, { RoleName: "app-runner" });
    });
  });

  describe("tagged listing", () => {
    it("should skip an entity deleted between the listing and its tag lookup", async () => {
      iamMock.on(ListUsersCommand).resolves({
        Users: [
          { UserName: "gone", Path: "/", UserId: "AIDA1", Arn: "arn:aws:iam::123456789012:user/gone", CreateDate: new Date(0) },
          { UserName: "ci", Path: "/", UserId: "AIDA2", Arn: "arn:aws:iam::123456789012:user/ci", CreateDate: new Date(0) },
        ],
        IsTruncated: true,
        Marker: "m2",
      });
      iamMock
        .on(ListUserTagsCommand)
        .resolves({ Tags: [{ Key: "env", Value: "dev" }] })
        .on(ListUserTagsCommand, { UserName: "gone" })
        .rejects(awsError("NoSuchEntity", "The user with name gone cannot be found."));

      const page = await service.listUsers({ kind: "IAMUser", scope: TEST_SCOPE, tagFilter: { env: ["dev"] } });

      expect(page.resources.map((resource) => resource.id)).toEqual(["ci"]);
      expect(page.nextPageToken).toBe("m2");
    });

    it("should skip a policy deleted before its tags were read", async () => {
      iamMock.on(ListPoliciesCommand).resolves({
        Policies: [{ PolicyName: "deploy", Arn: POLICY_ARN }],
      });
      iamMock.on(ListPolicyTagsCommand).rejects(awsError("NoSuchEntity"));

      const page = await service.listPolicies({ kind: "IAMPolicy", scope: TEST_SCOPE, tagFilter: { env: ["dev"] } });

      expect(page).toEqual({ resources: [] });
    });

    it("should still fail on other tag lookup errors", async () => {
      iamMock.on(ListRolesCommand).resolves({
        Roles: [
          { RoleName: "app-runner", Arn: "arn:aws:iam::123456789012:role/app-runner", Path: "/", RoleId: "AROA1", CreateDate: new Date(0) },
        ],
      });
      iamMock.on(ListRoleTagsCommand).rejects(awsError("AccessDenied", "Access Denied"));

      await expect(
        service.listRoles({ kind: "IAMRole", scope: TEST_SCOPE, tagFilter: { env: ["dev"] } }),
      ).rejects.toThrow("Access Denied");
    });
  });

  describe("relations", () => {
    it("should list managed policies attached to a role", async () => {
      iamMock.on(ListAttachedRolePoliciesCommand).resolves({
        AttachedPolicies: [{ PolicyName: "deploy", PolicyArn: POLICY_ARN }],
      });

      const page = await service.listAttachedPolicies({
        kind: "IAMAttachedPolicy",
        scope: TEST_SCOPE,
        parent: role("app-runner"),
      });

      expect(page.resources).toEqual([
        expect.objectContaining({
          kind: "IAMAttachedPolicy",
          id: `role/app-runner:${POLICY_ARN}`,
          name: "deploy",
          meta: { principal: { type: "role", name: "app-runner" }, policyArn: POLICY_ARN },
        }),
      ]);
    });

    it("should list nothing for a parent that holds no policies", async () => {
      const page = await service.listAttachedPolicies({
        kind: "IAMAttachedPolicy",
        scope: TEST_SCOPE,
        parent: policy(),
      });

      expect(page).toEqual({ resources: [] });
      expect(iamMock).not.toHaveReceivedCommand(ListAttachedRolePoliciesCommand);
    });

    it("should list inline policies of a user", async () => {
      iamMock.on(ListUserPoliciesCommand).resolves({ PolicyNames: ["s3-read"], IsTruncated: false });

      const page = await service.listInlinePolicies({ kind: "IAMInlinePolicy", scope: TEST_SCOPE, parent: user("ci") });

      expect(page.resources.map((resource) => resource.id)).toEqual(["user/ci:s3-read"]);
      expect(page.nextPageToken).toBeUndefined();
    });

    it("should report a user without a console password as having none", async () => {
      iamMock.on(GetLoginProfileCommand).rejects(awsError("NoSuchEntity"));

      await expect(
        service.listLoginProfiles({ kind: "IAMLoginProfile", scope: TEST_SCOPE, parent: user("ci") }),
      ).resolves.toEqual({ resources: [] });
    });

    it("should list a console password when one exists", async () => {
      iamMock.on(GetLoginProfileCommand).resolves({});

      const page = await service.listLoginProfiles({ kind: "IAMLoginProfile", scope: TEST_SCOPE, parent: user("ci") });

      expect(page.resources).toEqual([
        expect.objectContaining({ id: "ci", name: "ci console password", meta: { userName: "ci" } }),
      ]);
    });

    it("should list SSH public keys of a user", async () => {
      iamMock.on(ListSSHPublicKeysCommand).resolves({
        SSHPublicKeys: [{ UserName: "ci", SSHPublicKeyId: "APKATEST", Status: "Active", UploadDate: new Date(0) }],
        IsTruncated: true,
        Marker: "k2",
      });

      const page = await service.listSshPublicKeys({ kind: "IAMSshPublicKey", scope: TEST_SCOPE, parent: user("ci") });

      expect(page.resources).toEqual([
        expect.objectContaining({
          kind: "IAMSshPublicKey",
          id: "APKATEST",
          name: "ci SSH key APKATEST",
          meta: { userName: "ci", sshPublicKeyId: "APKATEST" },
        }),
      ]);
      expect(page.nextPageToken).toBe("k2");
      expect(iamMock).toHaveReceivedCommandWith(ListSSHPublicKeysCommand, { UserName: "ci" });
    });

    it("should list signing certificates of a user", async () => {
      iamMock.on(ListSigningCertificatesCommand).resolves({
        Certificates: [
          { UserName: "ci", CertificateId: "CERTTEST", CertificateBody: "test-body", Status: "Active" },
        ],
      });

      const page = await service.listSigningCertificates({
        kind: "IAMSigningCertificate",
        scope: TEST_SCOPE,
        parent: user("ci"),
      });

      expect(page).toEqual({
        resources: [
          expect.objectContaining({
            kind: "IAMSigningCertificate",
            id: "CERTTEST",
            name: "ci certificate CERTTEST",
            meta: { userName: "ci", certificateId: "CERTTEST" },
          }),
        ],
      });
    });

    it("should list service-specific credentials of a user", async () => {
      iamMock.on(ListServiceSpecificCredentialsCommand).resolves({
        ServiceSpecificCredentials: [
          {
            UserName: "ci",
            Status: "Active",
            ServiceUserName: "ci-at-123456789012",
            CreateDate: new Date(0),
            ServiceSpecificCredentialId: "ACCATEST",
            ServiceName: "codecommit.amazonaws.com",
          },
        ],
      });

      const page = await service.listServiceSpecificCredentials({
        kind: "IAMServiceSpecificCredential",
        scope: TEST_SCOPE,
        parent: user("ci"),
      });

      expect(page).toEqual({
        resources: [
          expect.objectContaining({
            kind: "IAMServiceSpecificCredential",
            id: "ACCATEST",
            name: "ci codecommit.amazonaws.com credential",
            meta: { userName: "ci", credentialId: "ACCATEST" },
          }),
        ],
      });
    });

    it("should list no user credentials under a role", async () => {
      const parent = role("app-runner");

      await expect(
        service.listSshPublicKeys({ kind: "IAMSshPublicKey", scope: TEST_SCOPE, parent }),
      ).resolves.toEqual({ resources: [] });
      await expect(
        service.listServiceSpecificCredentials({ kind: "IAMServiceSpecificCredential", scope: TEST_SCOPE, parent }),
      ).resolves.toEqual({ resources: [] });
      expect(iamMock.calls()).toHaveLength(0);
    });

    it("should list group memberships from both sides", async () => {
      iamMock.on(ListGroupsForUserCommand).resolves({
        Groups: [{ GroupName: "devs", Path: "/", GroupId: "G1", Arn: "arn:aws:iam::123456789012:group/devs", CreateDate: new Date(0) }],
      });
      iamMock.on(GetGroupCommand).resolves({
        Users: [{ UserName: "ci", Path: "/", UserId: "U1", Arn: "arn:aws:iam::123456789012:user/ci", CreateDate: new Date(0) }],
      });

      const fromUser = await service.listGroupMemberships({ kind: "IAMGroupMembership", scope: TEST_SCOPE, parent: user("ci") });
      const fromGroup = await service.listGroupMemberships({ kind: "IAMGroupMembership", scope: TEST_SCOPE, parent: group("devs") });

      expect(fromUser.resources.map((resource) => resource.id)).toEqual(["devs:ci"]);
      expect(fromGroup.resources.map((resource) => resource.name)).toEqual(["ci in devs"]);
    });

    it("should list every entity a policy is attached to", async () => {
      iamMock.on(ListEntitiesForPolicyCommand).resolves({
        PolicyRoles: [{ RoleName: "app-runner" }],
        PolicyUsers: [{ UserName: "ci" }],
        PolicyGroups: [{ GroupName: "devs" }, {}],
      });

      const page = await service.listPolicyAttachments({ kind: "IAMPolicyAttachment", scope: TEST_SCOPE, parent: policy() });

      expect(page.resources.map((resource) => resource.name)).toEqual([
        "deploy on role app-runner",
        "deploy on user ci",
        "deploy on group devs",
      ]);
      expect(iamMock).toHaveReceivedCommandWith(ListEntitiesForPolicyCommand, { PolicyArn: POLICY_ARN });
    });

    it("should list only non-default policy versions", async () => {
      iamMock.on(ListPolicyVersionsCommand).resolves({
        Versions: [
          { VersionId: "v2", IsDefaultVersion: true },
          { VersionId: "v1", IsDefaultVersion: false },
        ],
      });

      const page = await service.listPolicyVersions({ kind: "IAMPolicyVersion", scope: TEST_SCOPE, parent: policy() });

      expect(page.resources).toEqual([
        expect.objectContaining({
          id: `${POLICY_ARN}:v1`,
          name: "deploy v1",
          meta: { policyArn: POLICY_ARN, versionId: "v1" },
        }),
      ]);
    });
  });

  describe("deletion", () => {
    it("should detach a policy through the principal's own call", async () => {
      iamMock.on(DetachGroupPolicyCommand).resolves({});
      const attachment = createResource("IAMPolicyAttachment", {
        id: `${POLICY_ARN}:group/devs`,
        scope: TEST_SCOPE,
        meta: { policyArn: POLICY_ARN, principal: { type: "group", name: "devs" } },
      });

      await service.handlers().IAMPolicyAttachment.deleteOne(attachment);

      expect(iamMock).toHaveReceivedCommandWith(DetachGroupPolicyCommand, { GroupName: "devs", PolicyArn: POLICY_ARN });
      expect(iamMock).not.toHaveReceivedCommand(DetachRolePolicyCommand);
    });

    it("should delete an inline policy of a user", async () => {
      iamMock.on(DeleteUserPolicyCommand).resolves({});
      const inline = createResource("IAMInlinePolicy", {
        id: "user/ci:s3-read",
        scope: TEST_SCOPE,
        meta: { principal: { type: "user", name: "ci" }, policyName: "s3-read" },
      });

      await service.handlers().IAMInlinePolicy.deleteOne(inline);

      expect(iamMock).toHaveReceivedCommandWith(DeleteUserPolicyCommand, { UserName: "ci", PolicyName: "s3-read" });
    });

    it("should remove a user from a group", async () => {
      iamMock.on(RemoveUserFromGroupCommand).resolves({});
      const membership = createResource("IAMGroupMembership", {
        id: "devs:ci",
        scope: TEST_SCOPE,
        meta: { userName: "ci", groupName: "devs" },
      });

      await service.handlers().IAMGroupMembership.deleteOne(membership);

      expect(iamMock).toHaveReceivedCommandWith(RemoveUserFromGroupCommand, { UserName: "ci", GroupName: "devs" });
    });

    it("should delete the credentials that block a user's deletion", async () => {
      iamMock.on(DeleteSSHPublicKeyCommand).resolves({});
      iamMock.on(DeleteSigningCertificateCommand).resolves({});
      iamMock.on(DeleteServiceSpecificCredentialCommand).resolves({});
      const handlers = service.handlers();

      await handlers.IAMSshPublicKey.deleteOne(
        createResource("IAMSshPublicKey", {
          id: "APKATEST",
          scope: TEST_SCOPE,
          meta: { userName: "ci", sshPublicKeyId: "APKATEST" },
        }),
      );
      await handlers.IAMSigningCertificate.deleteOne(
        createResource("IAMSigningCertificate", {
          id: "CERTTEST",
          scope: TEST_SCOPE,
          meta: { userName: "ci", certificateId: "CERTTEST" },
        }),
      );
      await handlers.IAMServiceSpecificCredential.deleteOne(
        createResource("IAMServiceSpecificCredential", {
          id: "ACCATEST",
          scope: TEST_SCOPE,
          meta: { userName: "ci", credentialId: "ACCATEST" },
        }),
      );

      expect(iamMock).toHaveReceivedCommandWith(DeleteSSHPublicKeyCommand, {
        UserName: "ci",
        SSHPublicKeyId: "APKATEST",
      });
      expect(iamMock).toHaveReceivedCommandWith(DeleteSigningCertificateCommand, {
        UserName: "ci",
        CertificateId: "CERTTEST",
      });
      expect(iamMock).toHaveReceivedCommandWith(DeleteServiceSpecificCredentialCommand, {
        UserName: "ci",
        ServiceSpecificCredentialId: "ACCATEST",
      });
    });

    it("should deactivate and delete a virtual MFA device", async () => {
      iamMock.on(DeactivateMFADeviceCommand).resolves({});
      iamMock.on(DeleteVirtualMFADeviceCommand).resolves({});
      const serialNumber = "arn:aws:iam::123456789012:mfa/ci";
      const device = createResource("IAMMfaDevice", {
        id: serialNumber,
        scope: TEST_SCOPE,
        meta: { userName: "ci", serialNumber },
      });

      await service.handlers().IAMMfaDevice.deleteOne(device);

      expect(iamMock).toHaveReceivedCommandWith(DeactivateMFADeviceCommand, { UserName: "ci", SerialNumber: serialNumber });
      expect(iamMock).toHaveReceivedCommandWith(DeleteVirtualMFADeviceCommand, { SerialNumber: serialNumber });
    });

    it("should only deactivate a hardware MFA device", async () => {
      iamMock.on(DeactivateMFADeviceCommand).resolves({});
      const device = createResource("IAMMfaDevice", {
        id: "GAHT12345678",
        scope: TEST_SCOPE,
        meta: { userName: "ci", serialNumber: "GAHT12345678" },
      });

      await service.handlers().IAMMfaDevice.deleteOne(device);

      expect(iamMock).not.toHaveReceivedCommand(DeleteVirtualMFADeviceCommand);
    });

    it("should report a role that is still referenced as a conflict", async () => {
      iamMock.on(DeleteRoleCommand).rejects(awsError("DeleteConflict", "Cannot delete entity, must detach all policies first."));

      const error = await service.handlers().IAMRole.deleteOne(role("app-runner")).catch((error_: unknown) => error_);

      expect(error).toBeInstanceOf(DeleteConflictError);
      expect(error).toMatchObject({
        message: "Cannot delete entity, must detach all policies first.",
        metadata: { resourceId: "app-runner" },
      });
    });
  });
});
