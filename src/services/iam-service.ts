/**
 * IAM role, user, group and customer managed policy discovery and removal
 *
 * IAM refuses to delete an entity while anything still references it, so each
 * entity kind has relation kinds as dependents: attached and inline policies,
 * group memberships, instance profile memberships, user credentials of every
 * sort, policy attachments and non-default policy versions.
 * Deleting a relation detaches or removes it; the related entity survives.
 *
 */

import {
  DeactivateMFADeviceCommand,
  DeleteAccessKeyCommand,
  DeleteGroupCommand,
  DeleteGroupPolicyCommand,
  DeleteLoginProfileCommand,
  DeletePolicyCommand,
  DeletePolicyVersionCommand,
  DeleteRoleCommand,
  DeleteRolePolicyCommand,
  DeleteServiceSpecificCredentialCommand,
  DeleteSigningCertificateCommand,
  DeleteSSHPublicKeyCommand,
  DeleteUserCommand,
  DeleteUserPolicyCommand,
  DeleteVirtualMFADeviceCommand,
  DetachGroupPolicyCommand,
  DetachRolePolicyCommand,
  DetachUserPolicyCommand,
  GetGroupCommand,
  GetLoginProfileCommand,
  IAMClient,
  ListAccessKeysCommand,
  ListAccountAliasesCommand,
  ListAttachedGroupPoliciesCommand,
  ListAttachedRolePoliciesCommand,
  ListAttachedUserPoliciesCommand,
  ListEntitiesForPolicyCommand,
  ListGroupPoliciesCommand,
  ListGroupsCommand,
  ListGroupsForUserCommand,
  ListInstanceProfilesForRoleCommand,
  ListMFADevicesCommand,
  ListPoliciesCommand,
  ListPolicyTagsCommand,
  ListPolicyVersionsCommand,
  ListRolePoliciesCommand,
  ListRolesCommand,
  ListRoleTagsCommand,
  ListServiceSpecificCredentialsCommand,
  ListSigningCertificatesCommand,
  ListSSHPublicKeysCommand,
  ListUserPoliciesCommand,
  ListUsersCommand,
  ListUserTagsCommand,
  RemoveRoleFromInstanceProfileCommand,
  RemoveUserFromGroupCommand,
  type AttachedPolicy,
} from "@aws-sdk/client-iam";
import { type AwsTag, tagListToRecord } from "../lib/tags.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { DeleteNotFoundError } from "../lib/sweep-errors.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import {
  createResource,
  type IamPrincipal,
  type Resource,
  type ResourceNode,
  type Scope,
} from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for IAM service
 *
 * @public
 */
export type IAMServiceOptions = BaseServiceOptions;

/**
 * Path prefix of roles owned by AWS services, which only the service may delete
 */
const SERVICE_LINKED_ROLE_PATH = "/aws-service-role/";

type IamKind =
  | "IAMRole"
  | "IAMUser"
  | "IAMGroup"
  | "IAMPolicy"
  | "IAMInstanceProfileMembership"
  | "IAMAttachedPolicy"
  | "IAMInlinePolicy"
  | "IAMAccessKey"
  | "IAMLoginProfile"
  | "IAMMfaDevice"
  | "IAMSshPublicKey"
  | "IAMSigningCertificate"
  | "IAMServiceSpecificCredential"
  | "IAMGroupMembership"
  | "IAMPolicyAttachment"
  | "IAMPolicyVersion";

interface MarkerPage {
  IsTruncated?: boolean | undefined;
  Marker?: string | undefined;
}

interface AttachedPoliciesPage extends MarkerPage {
  AttachedPolicies?: AttachedPolicy[] | undefined;
}

interface InlinePoliciesPage extends MarkerPage {
  PolicyNames?: string[] | undefined;
}

/**
 * The IAM entity a relation belongs to
 */
function principalOf(parent: Resource | undefined): IamPrincipal | undefined {
  switch (parent?.kind) {
    case "IAMRole": {
      return { type: "role", name: parent.id };
    }
    case "IAMUser": {
      return { type: "user", name: parent.id };
    }
    case "IAMGroup": {
      return { type: "group", name: parent.id };
    }
    default: {
      return undefined;
    }
  }
}

function markerPage(response: MarkerPage): { nextPageToken?: string } {
  return response.IsTruncated && response.Marker ? { nextPageToken: response.Marker } : {};
}

/**
 * IAM discovery and removal
 *
 * @public
 */
export class IAMService extends BaseAwsService<IAMClient> {
  constructor(options: IAMServiceOptions = {}) {
    super((config) => new IAMClient(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<IamKind> {
    return {
      IAMRole: {
        listPage: (request) => this.listRoles(request),
        deleteOne: (role) => this.delete("iam:DeleteRole", role, (client) =>
          client.send(new DeleteRoleCommand({ RoleName: role.id })),
        ),
      },
      IAMUser: {
        listPage: (request) => this.listUsers(request),
        deleteOne: (user) => this.delete("iam:DeleteUser", user, (client) =>
          client.send(new DeleteUserCommand({ UserName: user.id })),
        ),
      },
      IAMGroup: {
        listPage: (request) => this.listGroups(request),
        deleteOne: (group) => this.delete("iam:DeleteGroup", group, (client) =>
          client.send(new DeleteGroupCommand({ GroupName: group.id })),
        ),
      },
      IAMPolicy: {
        listPage: (request) => this.listPolicies(request),
        deleteOne: (policy) => this.delete("iam:DeletePolicy", policy, (client) =>
          client.send(new DeletePolicyCommand({ PolicyArn: policy.arn ?? policy.id })),
        ),
      },
      IAMInstanceProfileMembership: {
        listPage: (request) => this.listInstanceProfileMemberships(request),
        deleteOne: (membership) =>
          this.delete("iam:RemoveRoleFromInstanceProfile", membership, (client) =>
            client.send(
              new RemoveRoleFromInstanceProfileCommand({
                RoleName: membership.meta.roleName,
                InstanceProfileName: membership.meta.instanceProfileName,
              }),
            ),
          ),
      },
      IAMAttachedPolicy: {
        listPage: (request) => this.listAttachedPolicies(request),
        deleteOne: (attached) => this.detachPolicy(attached, attached.meta.principal, attached.meta.policyArn),
      },
      IAMInlinePolicy: {
        listPage: (request) => this.listInlinePolicies(request),
        deleteOne: (inline) => this.deleteInlinePolicy(inline),
      },
      IAMAccessKey: {
        listPage: (request) => this.listAccessKeys(request),
        deleteOne: (key) => this.delete("iam:DeleteAccessKey", key, (client) =>
          client.send(
            new DeleteAccessKeyCommand({ UserName: key.meta.userName, AccessKeyId: key.meta.accessKeyId }),
          ),
        ),
      },
      IAMLoginProfile: {
        listPage: (request) => this.listLoginProfiles(request),
        deleteOne: (profile) => this.delete("iam:DeleteLoginProfile", profile, (client) =>
          client.send(new DeleteLoginProfileCommand({ UserName: profile.meta.userName })),
        ),
      },
      IAMMfaDevice: {
        listPage: (request) => this.listMfaDevices(request),
        deleteOne: (device) => this.deactivateMfaDevice(device),
      },
      IAMSshPublicKey: {
        listPage: (request) => this.listSshPublicKeys(request),
        deleteOne: (key) => this.delete("iam:DeleteSSHPublicKey", key, (client) =>
          client.send(
            new DeleteSSHPublicKeyCommand({ UserName: key.meta.userName, SSHPublicKeyId: key.meta.sshPublicKeyId }),
          ),
        ),
      },
      IAMSigningCertificate: {
        listPage: (request) => this.listSigningCertificates(request),
        deleteOne: (certificate) => this.delete("iam:DeleteSigningCertificate", certificate, (client) =>
          client.send(
            new DeleteSigningCertificateCommand({
              UserName: certificate.meta.userName,
              CertificateId: certificate.meta.certificateId,
            }),
          ),
        ),
      },
      IAMServiceSpecificCredential: {
        listPage: (request) => this.listServiceSpecificCredentials(request),
        deleteOne: (credential) => this.delete("iam:DeleteServiceSpecificCredential", credential, (client) =>
          client.send(
            new DeleteServiceSpecificCredentialCommand({
              UserName: credential.meta.userName,
              ServiceSpecificCredentialId: credential.meta.credentialId,
            }),
          ),
        ),
      },
      IAMGroupMembership: {
        listPage: (request) => this.listGroupMemberships(request),
        deleteOne: (membership) => this.delete("iam:RemoveUserFromGroup", membership, (client) =>
          client.send(
            new RemoveUserFromGroupCommand({
              UserName: membership.meta.userName,
              GroupName: membership.meta.groupName,
            }),
          ),
        ),
      },
      IAMPolicyAttachment: {
        listPage: (request) => this.listPolicyAttachments(request),
        deleteOne: (attachment) =>
          this.detachPolicy(attachment, attachment.meta.principal, attachment.meta.policyArn),
      },
      IAMPolicyVersion: {
        listPage: (request) => this.listPolicyVersions(request),
        deleteOne: (version) => this.delete("iam:DeletePolicyVersion", version, (client) =>
          client.send(
            new DeletePolicyVersionCommand({
              PolicyArn: version.meta.policyArn,
              VersionId: version.meta.versionId,
            }),
          ),
        ),
      },
    };
  }

  /**
   * Account aliases, shown when asking for confirmation
   */
  async listAccountAliases(scope: Scope): Promise<string[]> {
    const response = await this.call("iam:ListAccountAliases", scope, (client) =>
      client.send(new ListAccountAliasesCommand({})),
    );
    return response.AccountAliases ?? [];
  }

  /**
   * List one page of roles, excluding service-linked roles
   */
  async listRoles(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("iam:ListRoles", scope, (client) =>
      client.send(new ListRolesCommand({ MaxItems: 1000, ...(request.pageToken && { Marker: request.pageToken }) })),
    );

    const resources: Resource[] = [];
    for (const role of response.Roles ?? []) {
      if (!role.RoleName || role.Path?.startsWith(SERVICE_LINKED_ROLE_PATH)) {
        continue;
      }
      const roleName = role.RoleName;
      const tags = request.tagFilter
        ? await this.fetchTags("iam:ListRoleTags", scope, (client) =>
            client.send(new ListRoleTagsCommand({ RoleName: roleName })),
          )
        : {};
      if (tags === undefined) {
        continue;
      }
      resources.push(
        createResource("IAMRole", {
          id: roleName,
          arn: role.Arn,
          scope,
          tags,
          meta: { ...(role.Path && { path: role.Path }) },
        }),
      );
    }

    return { resources, ...markerPage(response) };
  }

  /**
   * List one page of users
   */
  async listUsers(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("iam:ListUsers", scope, (client) =>
      client.send(new ListUsersCommand({ MaxItems: 1000, ...(request.pageToken && { Marker: request.pageToken }) })),
    );

    const resources: Resource[] = [];
    for (const user of response.Users ?? []) {
      if (!user.UserName) {
        continue;
      }
      const userName = user.UserName;
      const tags = request.tagFilter
        ? await this.fetchTags("iam:ListUserTags", scope, (client) =>
            client.send(new ListUserTagsCommand({ UserName: userName })),
          )
        : {};
      if (tags === undefined) {
        continue;
      }
      resources.push(
        createResource("IAMUser", {
          id: userName,
          arn: user.Arn,
          scope,
          tags,
          meta: { ...(user.Path && { path: user.Path }) },
        }),
      );
    }

    return { resources, ...markerPage(response) };
  }

  /**
   * List one page of groups; IAM groups carry no tags
   */
  async listGroups(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("iam:ListGroups", scope, (client) =>
      client.send(new ListGroupsCommand({ MaxItems: 1000, ...(request.pageToken && { Marker: request.pageToken }) })),
    );

    const resources = (response.Groups ?? []).flatMap((group) =>
      group.GroupName
        ? [
            createResource("IAMGroup", {
              id: group.GroupName,
              arn: group.Arn,
              scope,
              meta: { ...(group.Path && { path: group.Path }) },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List one page of customer managed policies
   */
  async listPolicies(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("iam:ListPolicies", scope, (client) =>
      client.send(
        new ListPoliciesCommand({
          Scope: "Local",
          MaxItems: 1000,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources: Resource[] = [];
    for (const policy of response.Policies ?? []) {
      if (!policy.PolicyName || !policy.Arn) {
        continue;
      }
      const policyArn = policy.Arn;
      const tags = request.tagFilter
        ? await this.fetchTags("iam:ListPolicyTags", scope, (client) =>
            client.send(new ListPolicyTagsCommand({ PolicyArn: policyArn })),
          )
        : {};
      if (tags === undefined) {
        continue;
      }
      resources.push(
        createResource("IAMPolicy", {
          id: policy.PolicyName,
          arn: policyArn,
          scope,
          tags,
          meta: { ...(policy.DefaultVersionId && { defaultVersionId: policy.DefaultVersionId }) },
        }),
      );
    }

    return { resources, ...markerPage(response) };
  }

  /**
   * List instance profiles the parent role belongs to
   */
  async listInstanceProfileMemberships(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMRole") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListInstanceProfilesForRole", scope, (client) =>
      client.send(
        new ListInstanceProfilesForRoleCommand({
          RoleName: parent.id,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.InstanceProfiles ?? []).flatMap((profile) =>
      profile.InstanceProfileName
        ? [
            createResource("IAMInstanceProfileMembership", {
              id: `${parent.id}:${profile.InstanceProfileName}`,
              name: profile.InstanceProfileName,
              scope,
              meta: { roleName: parent.id, instanceProfileName: profile.InstanceProfileName },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List managed policies attached to the parent role, user or group
   */
  async listAttachedPolicies(request: ListPageRequest): Promise<ResourcePage> {
    const principal = principalOf(request.parent);
    if (!principal) {
      return { resources: [] };
    }

    const marker = request.pageToken ? { Marker: request.pageToken } : {};
    const response = await this.call<AttachedPoliciesPage>(
      `iam:ListAttached${capitalize(principal.type)}Policies`,
      request.scope,
      (client) => {
        switch (principal.type) {
          case "role": {
            return client.send(new ListAttachedRolePoliciesCommand({ RoleName: principal.name, ...marker }));
          }
          case "user": {
            return client.send(new ListAttachedUserPoliciesCommand({ UserName: principal.name, ...marker }));
          }
          case "group": {
            return client.send(new ListAttachedGroupPoliciesCommand({ GroupName: principal.name, ...marker }));
          }
        }
      },
    );

    const resources = (response.AttachedPolicies ?? []).flatMap((policy) =>
      policy.PolicyArn
        ? [
            createResource("IAMAttachedPolicy", {
              id: `${principal.type}/${principal.name}:${policy.PolicyArn}`,
              name: policy.PolicyName ?? policy.PolicyArn,
              scope: request.scope,
              meta: { principal, policyArn: policy.PolicyArn },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List inline policies embedded in the parent role, user or group
   */
  async listInlinePolicies(request: ListPageRequest): Promise<ResourcePage> {
    const principal = principalOf(request.parent);
    if (!principal) {
      return { resources: [] };
    }

    const marker = request.pageToken ? { Marker: request.pageToken } : {};
    const response = await this.call<InlinePoliciesPage>(
      `iam:List${capitalize(principal.type)}Policies`,
      request.scope,
      (client) => {
        switch (principal.type) {
          case "role": {
            return client.send(new ListRolePoliciesCommand({ RoleName: principal.name, ...marker }));
          }
          case "user": {
            return client.send(new ListUserPoliciesCommand({ UserName: principal.name, ...marker }));
          }
          case "group": {
            return client.send(new ListGroupPoliciesCommand({ GroupName: principal.name, ...marker }));
          }
        }
      },
    );

    const resources = (response.PolicyNames ?? []).map((policyName) =>
      createResource("IAMInlinePolicy", {
        id: `${principal.type}/${principal.name}:${policyName}`,
        name: policyName,
        scope: request.scope,
        meta: { principal, policyName },
      }),
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List access keys of the parent user
   */
  async listAccessKeys(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListAccessKeys", scope, (client) =>
      client.send(
        new ListAccessKeysCommand({
          UserName: parent.id,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.AccessKeyMetadata ?? []).flatMap((key) =>
      key.AccessKeyId
        ? [
            createResource("IAMAccessKey", {
              id: key.AccessKeyId,
              scope,
              meta: { userName: parent.id, accessKeyId: key.AccessKeyId },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List the console password of the parent user, if one exists
   */
  async listLoginProfiles(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    try {
      await this.call("iam:GetLoginProfile", scope, (client) =>
        client.send(new GetLoginProfileCommand({ UserName: parent.id })),
      );
    } catch (error) {
      if (error instanceof DeleteNotFoundError) {
        return { resources: [] };
      }
      throw error;
    }

    return {
      resources: [
        createResource("IAMLoginProfile", {
          id: parent.id,
          name: `${parent.id} console password`,
          scope,
          meta: { userName: parent.id },
        }),
      ],
    };
  }

  /**
   * List MFA devices of the parent user
   */
  async listMfaDevices(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListMFADevices", scope, (client) =>
      client.send(
        new ListMFADevicesCommand({
          UserName: parent.id,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.MFADevices ?? []).flatMap((device) =>
      device.SerialNumber
        ? [
            createResource("IAMMfaDevice", {
              id: device.SerialNumber,
              scope,
              meta: { userName: parent.id, serialNumber: device.SerialNumber },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List SSH public keys uploaded for the parent user
   */
  async listSshPublicKeys(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListSSHPublicKeys", scope, (client) =>
      client.send(
        new ListSSHPublicKeysCommand({
          UserName: parent.id,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.SSHPublicKeys ?? []).flatMap((key) =>
      key.SSHPublicKeyId
        ? [
            createResource("IAMSshPublicKey", {
              id: key.SSHPublicKeyId,
              name: `${parent.id} SSH key ${key.SSHPublicKeyId}`,
              scope,
              meta: { userName: parent.id, sshPublicKeyId: key.SSHPublicKeyId },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List X.509 signing certificates of the parent user
   */
  async listSigningCertificates(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListSigningCertificates", scope, (client) =>
      client.send(
        new ListSigningCertificatesCommand({
          UserName: parent.id,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.Certificates ?? []).flatMap((certificate) =>
      certificate.CertificateId
        ? [
            createResource("IAMSigningCertificate", {
              id: certificate.CertificateId,
              name: `${parent.id} certificate ${certificate.CertificateId}`,
              scope,
              meta: { userName: parent.id, certificateId: certificate.CertificateId },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List service-specific credentials (CodeCommit, Keyspaces...) of the parent user
   *
   * The operation is not paginated.
   */
  async listServiceSpecificCredentials(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMUser") {
      return { resources: [] };
    }

    const response = await this.call("iam:ListServiceSpecificCredentials", scope, (client) =>
      client.send(new ListServiceSpecificCredentialsCommand({ UserName: parent.id })),
    );

    const resources = (response.ServiceSpecificCredentials ?? []).flatMap((credential) =>
      credential.ServiceSpecificCredentialId
        ? [
            createResource("IAMServiceSpecificCredential", {
              id: credential.ServiceSpecificCredentialId,
              name: `${parent.id} ${credential.ServiceName ?? "service"} credential`,
              scope,
              meta: { userName: parent.id, credentialId: credential.ServiceSpecificCredentialId },
            }),
          ]
        : [],
    );

    return { resources };
  }

  /**
   * List group memberships of the parent user, or members of the parent group
   */
  async listGroupMemberships(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    const marker = request.pageToken ? { Marker: request.pageToken } : {};

    if (parent?.kind === "IAMUser") {
      const response = await this.call("iam:ListGroupsForUser", scope, (client) =>
        client.send(new ListGroupsForUserCommand({ UserName: parent.id, ...marker })),
      );
      const resources = (response.Groups ?? []).flatMap((group) =>
        group.GroupName ? [this.groupMembership(group.GroupName, parent.id, scope)] : [],
      );
      return { resources, ...markerPage(response) };
    }

    if (parent?.kind === "IAMGroup") {
      const response = await this.call("iam:GetGroup", scope, (client) =>
        client.send(new GetGroupCommand({ GroupName: parent.id, ...marker })),
      );
      const resources = (response.Users ?? []).flatMap((user) =>
        user.UserName ? [this.groupMembership(parent.id, user.UserName, scope)] : [],
      );
      return { resources, ...markerPage(response) };
    }

    return { resources: [] };
  }

  /**
   * List roles, users and groups the parent policy is attached to
   */
  async listPolicyAttachments(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMPolicy" || !parent.arn) {
      return { resources: [] };
    }
    const policyArn = parent.arn;

    const response = await this.call("iam:ListEntitiesForPolicy", scope, (client) =>
      client.send(
        new ListEntitiesForPolicyCommand({
          PolicyArn: policyArn,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const principals: IamPrincipal[] = [
      ...(response.PolicyRoles ?? []).map((role) => ({ type: "role" as const, name: role.RoleName })),
      ...(response.PolicyUsers ?? []).map((user) => ({ type: "user" as const, name: user.UserName })),
      ...(response.PolicyGroups ?? []).map((group) => ({ type: "group" as const, name: group.GroupName })),
    ].flatMap((entry) => (entry.name ? [{ type: entry.type, name: entry.name }] : []));

    const resources = principals.map((principal) =>
      createResource("IAMPolicyAttachment", {
        id: `${policyArn}:${principal.type}/${principal.name}`,
        name: `${parent.id} on ${principal.type} ${principal.name}`,
        scope,
        meta: { policyArn, principal },
      }),
    );

    return { resources, ...markerPage(response) };
  }

  /**
   * List non-default versions of the parent policy
   */
  async listPolicyVersions(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "IAMPolicy" || !parent.arn) {
      return { resources: [] };
    }
    const policyArn = parent.arn;

    const response = await this.call("iam:ListPolicyVersions", scope, (client) =>
      client.send(
        new ListPolicyVersionsCommand({
          PolicyArn: policyArn,
          ...(request.pageToken && { Marker: request.pageToken }),
        }),
      ),
    );

    const resources = (response.Versions ?? []).flatMap((version) =>
      version.VersionId && !version.IsDefaultVersion
        ? [
            createResource("IAMPolicyVersion", {
              id: `${policyArn}:${version.VersionId}`,
              name: `${parent.id} ${version.VersionId}`,
              scope,
              meta: { policyArn, versionId: version.VersionId },
            }),
          ]
        : [],
    );

    return { resources, ...markerPage(response) };
  }

  private async detachPolicy(
    resource: ResourceNode<"IAMAttachedPolicy"> | ResourceNode<"IAMPolicyAttachment">,
    principal: IamPrincipal,
    policyArn: string,
  ): Promise<void> {
    await this.call<unknown>(
      `iam:Detach${capitalize(principal.type)}Policy`,
      resource.scope,
      (client) => {
        switch (principal.type) {
          case "role": {
            return client.send(new DetachRolePolicyCommand({ RoleName: principal.name, PolicyArn: policyArn }));
          }
          case "user": {
            return client.send(new DetachUserPolicyCommand({ UserName: principal.name, PolicyArn: policyArn }));
          }
          case "group": {
            return client.send(new DetachGroupPolicyCommand({ GroupName: principal.name, PolicyArn: policyArn }));
          }
        }
      },
      resource.id,
    );
  }

  private async deleteInlinePolicy(inline: ResourceNode<"IAMInlinePolicy">): Promise<void> {
    const { principal, policyName } = inline.meta;
    await this.call<unknown>(
      `iam:Delete${capitalize(principal.type)}Policy`,
      inline.scope,
      (client) => {
        switch (principal.type) {
          case "role": {
            return client.send(new DeleteRolePolicyCommand({ RoleName: principal.name, PolicyName: policyName }));
          }
          case "user": {
            return client.send(new DeleteUserPolicyCommand({ UserName: principal.name, PolicyName: policyName }));
          }
          case "group": {
            return client.send(new DeleteGroupPolicyCommand({ GroupName: principal.name, PolicyName: policyName }));
          }
        }
      },
      inline.id,
    );
  }

  /**
   * Deactivate an MFA device; virtual devices are deleted as well
   */
  private async deactivateMfaDevice(device: ResourceNode<"IAMMfaDevice">): Promise<void> {
    const { userName, serialNumber } = device.meta;

    await this.call(
      "iam:DeactivateMFADevice",
      device.scope,
      (client) =>
        client.send(new DeactivateMFADeviceCommand({ UserName: userName, SerialNumber: serialNumber })),
      device.id,
    );

    if (serialNumber.startsWith("arn:")) {
      await this.call(
        "iam:DeleteVirtualMFADevice",
        device.scope,
        (client) => client.send(new DeleteVirtualMFADeviceCommand({ SerialNumber: serialNumber })),
        device.id,
      );
    }
  }

  private async delete(
    operation: string,
    resource: Resource,
    request: (client: IAMClient) => Promise<unknown>,
  ): Promise<void> {
    await this.call(operation, resource.scope, request, resource.id);
  }

  /**
   * Tags of one entity, or undefined when it was deleted after being listed
   */
  private async fetchTags(
    operation: string,
    scope: Scope,
    request: (client: IAMClient) => Promise<{ Tags?: AwsTag[] | undefined }>,
  ): Promise<Record<string, string> | undefined> {
    try {
      const response = await this.call(operation, scope, request);
      return tagListToRecord(response.Tags);
    } catch (error) {
      if (error instanceof DeleteNotFoundError) {
        this.logger.debug(`${operation}: entity vanished while listing, skipping`);
        return undefined;
      }
      throw error;
    }
  }

  private groupMembership(groupName: string, userName: string, scope: Scope): ResourceNode<"IAMGroupMembership"> {
    return createResource("IAMGroupMembership", {
      id: `${groupName}:${userName}`,
      name: `${userName} in ${groupName}`,
      scope,
      meta: { userName, groupName },
    });
  }
}

function capitalize(value: string): string {
  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}
